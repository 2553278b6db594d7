import { ErrorKind, TruncatedError } from '../../types/err';
import { NgError } from '../err';

// Compact type codes as they appear on the wire.
export enum CType {
    STOP = 0x00,
    BOOL = 0x01, // BOOL_TRUE; BOOL_FALSE (0x02) only appears in field headers
    BOOL_FALSE = 0x02,
    BYTE = 0x03,
    I16 = 0x04,
    I32 = 0x05,
    I64 = 0x06,
    DOUBLE = 0x07,
    BINARY = 0x08,
    LIST = 0x09,
    SET = 0x0a,
    MAP = 0x0b,
    STRUCT = 0x0c,
    FLOAT = 0x0d,
}

export const PROTOCOL_VERSION = 2;
// from version 2 on, doubles and floats are written big-endian
const VERSION_DOUBLE_BE = 2;
const MAX_DEPTH = 64;

export type FieldHeader = { id: number; type: CType };
export type CollectionHeader = { elemType: CType; size: number };
export type MapHeader = { keyType: CType; valueType: CType; size: number };

export class CompactWriter {
    private buf = Buffer.alloc(256);
    private pos = 0;
    private lastFieldId = 0;
    private fieldIdStack: number[] = [];
    private pendingBoolField: number | null = null;

    constructor(private readonly version = PROTOCOL_VERSION) { }

    private ensure(n: number): void {
        if (this.pos + n <= this.buf.length) return;
        let size = this.buf.length * 2;
        while (size < this.pos + n) size *= 2;
        const next = Buffer.alloc(size);
        this.buf.copy(next, 0, 0, this.pos);
        this.buf = next;
    }

    writeByte(v: number): void {
        this.ensure(1);
        this.buf.writeInt8(v, this.pos);
        this.pos += 1;
    }

    writeUByte(v: number): void {
        this.ensure(1);
        this.buf[this.pos++] = v & 0xff;
    }

    writeRaw(data: Buffer): void {
        this.ensure(data.length);
        data.copy(this.buf, this.pos);
        this.pos += data.length;
    }

    writeVarint32(v: number): void {
        let n = v >>> 0;
        this.ensure(5);
        while (n > 0x7f) {
            this.buf[this.pos++] = (n & 0x7f) | 0x80;
            n >>>= 7;
        }
        this.buf[this.pos++] = n;
    }

    writeVarint64(v: bigint): void {
        let n = BigInt.asUintN(64, v);
        this.ensure(10);
        while (n > 0x7fn) {
            this.buf[this.pos++] = Number(n & 0x7fn) | 0x80;
            n >>= 7n;
        }
        this.buf[this.pos++] = Number(n);
    }

    writeI16(v: number): void {
        this.writeVarint32(zigzag32(v));
    }

    writeI32(v: number): void {
        this.writeVarint32(zigzag32(v));
    }

    writeI64(v: bigint): void {
        this.writeVarint64(zigzag64(v));
    }

    writeDouble(v: number): void {
        this.ensure(8);
        if (this.version >= VERSION_DOUBLE_BE) this.buf.writeDoubleBE(v, this.pos);
        else this.buf.writeDoubleLE(v, this.pos);
        this.pos += 8;
    }

    writeFloat(v: number): void {
        this.ensure(4);
        if (this.version >= VERSION_DOUBLE_BE) this.buf.writeFloatBE(v, this.pos);
        else this.buf.writeFloatLE(v, this.pos);
        this.pos += 4;
    }

    writeBinary(data: Buffer): void {
        this.writeVarint32(data.length);
        this.writeRaw(data);
    }

    writeString(s: string): void {
        this.writeBinary(Buffer.from(s, 'utf8'));
    }

    writeBool(v: boolean): void {
        if (this.pendingBoolField !== null) {
            // the value rides in the field header
            this.writeFieldHeader(this.pendingBoolField, v ? CType.BOOL : CType.BOOL_FALSE);
            this.pendingBoolField = null;
            return;
        }
        this.writeUByte(v ? CType.BOOL : CType.BOOL_FALSE);
    }

    writeStructBegin(): void {
        this.fieldIdStack.push(this.lastFieldId);
        this.lastFieldId = 0;
    }

    writeStructEnd(): void {
        this.lastFieldId = this.fieldIdStack.pop() ?? 0;
    }

    writeFieldBegin(id: number, type: CType): void {
        if (type === CType.BOOL) {
            this.pendingBoolField = id;
            return;
        }
        this.writeFieldHeader(id, type);
    }

    writeFieldStop(): void {
        this.writeUByte(CType.STOP);
    }

    writeListBegin(elemType: CType, size: number): void {
        if (size < 15) {
            this.writeUByte((size << 4) | elemType);
        } else {
            this.writeUByte(0xf0 | elemType);
            this.writeVarint32(size);
        }
    }

    writeMapBegin(keyType: CType, valueType: CType, size: number): void {
        this.writeVarint32(size);
        if (size > 0) this.writeUByte((keyType << 4) | valueType);
    }

    private writeFieldHeader(id: number, type: CType): void {
        const delta = id - this.lastFieldId;
        if (delta > 0 && delta <= 15) {
            this.writeUByte((delta << 4) | type);
        } else {
            this.writeUByte(type);
            this.writeI16(id);
        }
        this.lastFieldId = id;
    }

    /** Bytes written so far (copied). */
    finish(): Buffer {
        return Buffer.from(this.buf.subarray(0, this.pos));
    }
}

export class CompactReader {
    private pos = 0;
    private lastFieldId = 0;
    private fieldIdStack: number[] = [];
    private pendingBool: boolean | null = null;
    private depth = 0;

    constructor(private readonly buf: Buffer, public version = PROTOCOL_VERSION) { }

    get offset(): number {
        return this.pos;
    }

    get remaining(): number {
        return this.buf.length - this.pos;
    }

    private need(n: number, what: string): void {
        if (this.pos + n > this.buf.length) {
            throw new TruncatedError(`need ${n} bytes for ${what} at offset ${this.pos}, have ${this.remaining}`, this.pos + n);
        }
    }

    readUByte(): number {
        this.need(1, 'byte');
        return this.buf[this.pos++];
    }

    readByte(): number {
        this.need(1, 'byte');
        const v = this.buf.readInt8(this.pos);
        this.pos += 1;
        return v;
    }

    readRaw(n: number): Buffer {
        this.need(n, 'bytes');
        // copy so decoded records never alias the receive buffer
        const out = Buffer.from(this.buf.subarray(this.pos, this.pos + n));
        this.pos += n;
        return out;
    }

    readVarint32(): number {
        let result = 0;
        let shift = 0;
        for (let i = 0; i < 5; i++) {
            const b = this.readUByte();
            result |= (b & 0x7f) << shift;
            if ((b & 0x80) === 0) return result >>> 0;
            shift += 7;
        }
        throw NgError('varint32 longer than 5 bytes', ErrorKind.Decode);
    }

    readVarint64(): bigint {
        let result = 0n;
        let shift = 0n;
        for (let i = 0; i < 10; i++) {
            const b = this.readUByte();
            result |= BigInt(b & 0x7f) << shift;
            if ((b & 0x80) === 0) return BigInt.asUintN(64, result);
            shift += 7n;
        }
        throw NgError('varint64 longer than 10 bytes', ErrorKind.Decode);
    }

    readI16(): number {
        const v = unzigzag32(this.readVarint32());
        if (v < -0x8000 || v > 0x7fff) throw NgError(`i16 out of range: ${v}`, ErrorKind.Decode);
        return v;
    }

    readI32(): number {
        return unzigzag32(this.readVarint32());
    }

    readI64(): bigint {
        return unzigzag64(this.readVarint64());
    }

    readDouble(): number {
        this.need(8, 'double');
        const v = this.version >= VERSION_DOUBLE_BE ? this.buf.readDoubleBE(this.pos) : this.buf.readDoubleLE(this.pos);
        this.pos += 8;
        return v;
    }

    readFloat(): number {
        this.need(4, 'float');
        const v = this.version >= VERSION_DOUBLE_BE ? this.buf.readFloatBE(this.pos) : this.buf.readFloatLE(this.pos);
        this.pos += 4;
        return v;
    }

    readBinary(): Buffer {
        const len = this.readVarint32();
        return this.readRaw(len);
    }

    readString(): string {
        return this.readBinary().toString('utf8');
    }

    readBool(): boolean {
        if (this.pendingBool !== null) {
            const v = this.pendingBool;
            this.pendingBool = null;
            return v;
        }
        return this.readUByte() === CType.BOOL;
    }

    // structs, lists, sets and maps all count towards MAX_DEPTH
    private enter(what: string): void {
        if (++this.depth > MAX_DEPTH) {
            throw NgError(`${what} nesting deeper than ${MAX_DEPTH}`, ErrorKind.Decode);
        }
    }

    readStructBegin(): void {
        this.enter('struct');
        this.fieldIdStack.push(this.lastFieldId);
        this.lastFieldId = 0;
    }

    readStructEnd(): void {
        this.depth--;
        this.lastFieldId = this.fieldIdStack.pop() ?? 0;
    }

    readFieldBegin(): FieldHeader {
        const b = this.readUByte();
        if (b === CType.STOP) return { id: 0, type: CType.STOP };
        const type = b & 0x0f;
        if (type === CType.STOP) {
            throw NgError(`field header 0x${b.toString(16)} has a delta but no type`, ErrorKind.Decode);
        }

        const delta = (b & 0xf0) >> 4;
        const id = delta === 0 ? this.readI16() : this.lastFieldId + delta;
        this.lastFieldId = id;

        if (type === CType.BOOL || type === CType.BOOL_FALSE) {
            this.pendingBool = type === CType.BOOL;
            return { id, type: CType.BOOL };
        }
        return { id, type: checkType(type) };
    }

    /** Pair every call with readListEnd. */
    readListBegin(): CollectionHeader {
        this.enter('collection');
        const b = this.readUByte();
        let size = (b >> 4) & 0x0f;
        if (size === 15) size = this.readVarint32();
        const elemType = checkElemType(b & 0x0f);
        // every element takes at least one byte
        this.need(size, 'collection elements');
        return { elemType, size };
    }

    readListEnd(): void {
        this.depth--;
    }

    /** Pair every call with readMapEnd. */
    readMapBegin(): MapHeader {
        this.enter('map');
        const size = this.readVarint32();
        if (size === 0) return { keyType: CType.STOP, valueType: CType.STOP, size };
        const b = this.readUByte();
        const keyType = checkElemType((b >> 4) & 0x0f);
        const valueType = checkElemType(b & 0x0f);
        this.need(size, 'map entries');
        return { keyType, valueType, size };
    }

    readMapEnd(): void {
        this.depth--;
    }

    /** Consumes one value of the given type without interpreting it. */
    skip(type: CType): void {
        switch (type) {
            case CType.BOOL:
            case CType.BOOL_FALSE:
                this.readBool();
                return;
            case CType.BYTE:
                this.readUByte();
                return;
            case CType.I16:
            case CType.I32:
                this.readVarint32();
                return;
            case CType.I64:
                this.readVarint64();
                return;
            case CType.DOUBLE:
                this.readRaw(8);
                return;
            case CType.FLOAT:
                this.readRaw(4);
                return;
            case CType.BINARY:
                this.readBinary();
                return;
            case CType.LIST:
            case CType.SET: {
                const { elemType, size } = this.readListBegin();
                for (let i = 0; i < size; i++) this.skip(elemType);
                this.readListEnd();
                return;
            }
            case CType.MAP: {
                const { keyType, valueType, size } = this.readMapBegin();
                for (let i = 0; i < size; i++) {
                    this.skip(keyType);
                    this.skip(valueType);
                }
                this.readMapEnd();
                return;
            }
            case CType.STRUCT:
                this.readStructBegin();
                for (; ;) {
                    const f = this.readFieldBegin();
                    if (f.type === CType.STOP) break;
                    this.skip(f.type);
                }
                this.readStructEnd();
                return;
            default:
                throw NgError(`cannot skip type ${type}`, ErrorKind.Decode);
        }
    }
}

function checkType(t: number): CType {
    if (t > CType.FLOAT) throw NgError(`unknown compact type 0x${t.toString(16)}`, ErrorKind.Decode);
    return t;
}

function checkElemType(t: number): CType {
    // BOOL_FALSE (2) is accepted as a bool element type for lenient peers
    if (t === CType.STOP) throw NgError('collection element type STOP', ErrorKind.Decode);
    if (t === CType.BOOL_FALSE) return CType.BOOL;
    return checkType(t);
}

export function zigzag32(n: number): number {
    return ((n << 1) ^ (n >> 31)) >>> 0;
}

export function unzigzag32(n: number): number {
    return (n >>> 1) ^ -(n & 1);
}

export function zigzag64(n: bigint): bigint {
    const v = BigInt.asIntN(64, n);
    return BigInt.asUintN(64, (v << 1n) ^ (v >> 63n));
}

export function unzigzag64(n: bigint): bigint {
    return BigInt.asIntN(64, (n >> 1n) ^ -(n & 1n));
}
