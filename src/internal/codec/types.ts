import { CompactReader, CompactWriter, CType } from './compact';

const HEX_LIMIT = 128;
const doubleScratch = Buffer.alloc(8);

/**
 * Everything the codec needs to know about one wire type: how to write and
 * read it, and how to compare, hash, copy and print values of it.
 */
export interface TypeDesc<V> {
    readonly ctype: CType;
    readonly label: string;
    write(w: CompactWriter, v: V): void;
    // undefined when the value on the wire had another shape and was skipped
    read(r: CompactReader): V | undefined;
    compare(a: V, b: V): number;
    hash(h: Hasher, v: V): void;
    copy(v: V): V;
    format(v: V, indent: number): string;
}

// 37 * h + x over 32-bit ints, so equal values give equal hashes.
export class Hasher {
    private h = 17;

    mix(n: number): void {
        this.h = (Math.imul(this.h, 37) + (n | 0)) | 0;
    }

    mixBigInt(n: bigint): void {
        const v = BigInt.asUintN(64, n);
        this.mix(Number(v & 0xffffffffn));
        this.mix(Number(v >> 32n));
    }

    mixDouble(n: number): void {
        // -0 and 0 compare equal, so they must hash alike
        doubleScratch.writeDoubleBE(n === 0 ? 0 : n);
        this.mix(doubleScratch.readInt32BE(0));
        this.mix(doubleScratch.readInt32BE(4));
    }

    value(): number {
        return this.h;
    }
}

function cmp<T extends number | bigint>(a: T, b: T): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function compareFloat(a: number, b: number): number {
    // NaN sorts after every number and equals itself
    if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
    if (Number.isNaN(b)) return -1;
    return cmp(a, b);
}

function intDesc(ctype: CType, label: string, min: number, max: number,
    write: (w: CompactWriter, v: number) => void,
    read: (r: CompactReader) => number): TypeDesc<number> {
    return {
        ctype,
        label,
        write(w, v) {
            if (!Number.isInteger(v) || v < min || v > max) {
                throw new RangeError(`${label} out of range: ${v}`);
            }
            write(w, v);
        },
        read,
        compare: cmp,
        hash: (h, v) => h.mix(v),
        copy: (v) => v,
        format: (v) => String(v),
    };
}

export const bool: TypeDesc<boolean> = {
    ctype: CType.BOOL,
    label: 'bool',
    write: (w, v) => w.writeBool(v),
    read: (r) => r.readBool(),
    compare: (a, b) => (a === b ? 0 : a ? 1 : -1),
    hash: (h, v) => h.mix(v ? 1231 : 1237),
    copy: (v) => v,
    format: (v) => String(v),
};

export const byte = intDesc(CType.BYTE, 'byte', -0x80, 0x7f, (w, v) => w.writeByte(v), (r) => r.readByte());
export const i16 = intDesc(CType.I16, 'i16', -0x8000, 0x7fff, (w, v) => w.writeI16(v), (r) => r.readI16());
export const i32 = intDesc(CType.I32, 'i32', -0x80000000, 0x7fffffff, (w, v) => w.writeI32(v), (r) => r.readI32());

export const i64: TypeDesc<bigint> = {
    ctype: CType.I64,
    label: 'i64',
    write: (w, v) => w.writeI64(v),
    read: (r) => r.readI64(),
    compare: cmp,
    hash: (h, v) => h.mixBigInt(v),
    copy: (v) => v,
    format: (v) => v.toString(),
};

export const double: TypeDesc<number> = {
    ctype: CType.DOUBLE,
    label: 'double',
    write: (w, v) => w.writeDouble(v),
    read: (r) => r.readDouble(),
    compare: compareFloat,
    hash: (h, v) => h.mixDouble(v),
    copy: (v) => v,
    format: (v) => String(v),
};

export const float: TypeDesc<number> = {
    ...double,
    ctype: CType.FLOAT,
    label: 'float',
    write(w, v) {
        // only values float32 holds exactly
        if (!Number.isNaN(v) && Math.fround(v) !== v) {
            throw new RangeError(`float out of range: ${v}`);
        }
        w.writeFloat(v);
    },
    read: (r) => r.readFloat(),
};

export const binary: TypeDesc<Buffer> = {
    ctype: CType.BINARY,
    label: 'binary',
    write: (w, v) => w.writeBinary(v),
    read: (r) => r.readBinary(),
    compare: (a, b) => Buffer.compare(a, b),
    hash(h, v) {
        h.mix(v.length);
        for (const b of v) h.mix(b);
    },
    copy: (v) => Buffer.from(v),
    format: formatHex,
};

export function list<E>(elem: TypeDesc<E>): TypeDesc<E[]> {
    return {
        ctype: CType.LIST,
        label: `list<${elem.label}>`,
        write(w, v) {
            w.writeListBegin(elem.ctype, v.length);
            for (const e of v) elem.write(w, e);
        },
        read(r) {
            const { elemType, size } = r.readListBegin();
            if (elemType !== elem.ctype) {
                for (let i = 0; i < size; i++) r.skip(elemType);
                r.readListEnd();
                return undefined;
            }
            const out: E[] = [];
            for (let i = 0; i < size; i++) {
                const e = elem.read(r);
                if (e !== undefined) out.push(e);
            }
            r.readListEnd();
            return out;
        },
        compare(a, b) {
            if (a.length !== b.length) return cmp(a.length, b.length);
            for (let i = 0; i < a.length; i++) {
                const c = elem.compare(a[i], b[i]);
                if (c !== 0) return c;
            }
            return 0;
        },
        hash(h, v) {
            h.mix(v.length);
            for (const e of v) elem.hash(h, e);
        },
        copy: (v) => v.map((e) => elem.copy(e)),
        format: (v, indent) => `[${v.map((e) => elem.format(e, indent)).join(', ')}]`,
    };
}

/** Space-separated uppercase hex pairs, cut after the first 128 bytes. */
export function formatHex(v: Buffer): string {
    const pairs: string[] = [];
    const n = Math.min(v.length, HEX_LIMIT);
    for (let i = 0; i < n; i++) {
        pairs.push(v[i].toString(16).toUpperCase().padStart(2, '0'));
    }
    let out = pairs.join(' ');
    if (v.length > HEX_LIMIT) out += ' ...';
    return out;
}
