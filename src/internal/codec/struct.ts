import { ErrorKind } from '../../types/err';
import { NgError } from '../err';
import { CompactReader, CompactWriter, CType, PROTOCOL_VERSION } from './compact';
import { Hasher, TypeDesc } from './types';

/**
 * One row of a record's field table, with every per-field operation closed
 * over the property it reads and writes.
 */
export interface FieldDef<T> {
    readonly id: number;
    readonly name: string;
    readonly type: string;
    readonly ctype: CType;
    readonly required: boolean;
    isSet(v: T): boolean;
    write(w: CompactWriter, v: T): void;
    read(r: CompactReader, into: T): void;
    compare(a: T, b: T): number;
    hash(h: Hasher, v: T): void;
    copy(from: T, into: T): void;
    format(v: T, indent: number): string;
}

export type FieldOptions = { required?: boolean };

function present<V>(v: V): v is NonNullable<V> {
    return v !== undefined && v !== null;
}

/**
 * Returns a field constructor bound to record type T, so names are checked
 * against T and each field's TypeDesc against the property's type.
 */
export function fieldsOf<T>() {
    return function field<K extends keyof T & string>(
        id: number,
        name: K,
        type: TypeDesc<NonNullable<T[K]>>,
        opts: FieldOptions = {},
    ): FieldDef<T> {
        return {
            id,
            name,
            type: type.label,
            ctype: type.ctype,
            required: opts.required ?? false,
            isSet: (v) => present(v[name]),
            write(w, v) {
                const value = v[name];
                if (!present(value)) return;
                w.writeFieldBegin(id, type.ctype);
                type.write(w, value);
            },
            read(r, into) {
                const value = type.read(r);
                if (value !== undefined) into[name] = value;
            },
            compare(a, b) {
                const x = a[name];
                const y = b[name];
                const xs = present(x);
                const ys = present(y);
                if (xs !== ys) return xs ? 1 : -1;
                if (!present(x) || !present(y)) return 0;
                return type.compare(x, y);
            },
            hash(h, v) {
                const value = v[name];
                h.mix(present(value) ? 1 : 0);
                if (present(value)) type.hash(h, value);
            },
            copy(from, into) {
                const value = from[name];
                if (present(value)) into[name] = type.copy(value);
            },
            format(v, indent) {
                const value = v[name];
                return present(value) ? type.format(value, indent) : 'null';
            },
        };
    };
}

export interface StructCodec<T> extends TypeDesc<T> {
    readonly name: string;
    readonly fields: ReadonlyArray<FieldDef<T>>;
    create(): T;
    read(r: CompactReader): T;
    encode(v: T): Buffer;
    decode(buf: Buffer): T;
    decodePrefix(buf: Buffer, version?: number): [T, number];
    equals(a: T, b: T): boolean;
    hashCode(v: T): number;
    deepCopy(v: T): T;
    stringify(v: T): string;
    validate(v: T): void;
}

export type StructOptions<T> = {
    // extra per-record rule, run together with the required-field check
    check?: (v: T) => string | undefined;
};

/**
 * Builds the codec for one record schema from its field table. Fields are
 * written, compared and printed in ascending tag order.
 */
export function defineStruct<T extends object>(
    name: string,
    create: () => T,
    fieldDefs: ReadonlyArray<FieldDef<T>>,
    opts: StructOptions<T> = {},
): StructCodec<T> {
    const fields = [...fieldDefs].sort((a, b) => a.id - b.id);
    const byId = new Map<number, FieldDef<T>>();
    for (const f of fields) {
        if (byId.has(f.id)) throw new Error(`${name}: duplicate field id ${f.id}`);
        byId.set(f.id, f);
    }

    const validate = (v: T): void => {
        const missing = fields.filter((f) => f.required && !f.isSet(v)).map((f) => f.name);
        if (missing.length > 0) {
            throw NgError(`${name}: required field(s) not set: ${missing.join(', ')}`, ErrorKind.Decode);
        }
        const problem = opts.check?.(v);
        if (problem) throw NgError(`${name}: ${problem}`, ErrorKind.Decode);
    };

    const write = (w: CompactWriter, v: T): void => {
        validate(v);
        w.writeStructBegin();
        for (const f of fields) f.write(w, v);
        w.writeFieldStop();
        w.writeStructEnd();
    };

    const read = (r: CompactReader): T => {
        const out = create();
        r.readStructBegin();
        for (; ;) {
            const header = r.readFieldBegin();
            if (header.type === CType.STOP) break;
            const f = byId.get(header.id);
            if (f && f.ctype === header.type) {
                f.read(r, out);
            } else {
                // unknown tag or wire type mismatch
                r.skip(header.type);
            }
        }
        r.readStructEnd();
        validate(out);
        return out;
    };

    const compare = (a: T, b: T): number => {
        if (a === b) return 0;
        for (const f of fields) {
            const c = f.compare(a, b);
            if (c !== 0) return c;
        }
        return 0;
    };

    const hash = (h: Hasher, v: T): void => {
        for (const f of fields) f.hash(h, v);
    };

    const copy = (v: T): T => {
        const out = create();
        for (const f of fields) f.copy(v, out);
        return out;
    };

    const decodePrefix = (buf: Buffer, version = PROTOCOL_VERSION): [T, number] => {
        const r = new CompactReader(buf, version);
        const v = read(r);
        return [v, r.offset];
    };

    // Name (
    //   field : value,
    //   other : null
    // )
    const format = (v: T, indent: number): string => {
        const pad = '  '.repeat(indent);
        const lines = fields.map((f) => `${pad}${f.name} : ${f.format(v, indent + 1)}`);
        return `${name} (\n${lines.join(',\n')}\n${'  '.repeat(indent - 1)})`;
    };

    return {
        ctype: CType.STRUCT,
        label: name,
        name,
        fields,
        create,
        write,
        read,
        compare,
        hash,
        copy,
        format,
        validate,
        encode(v) {
            const w = new CompactWriter();
            write(w, v);
            return w.finish();
        },
        decode(buf) {
            const [v, used] = decodePrefix(buf);
            if (used !== buf.length) {
                throw NgError(`${name}: ${buf.length - used} trailing bytes after record`, ErrorKind.Decode);
            }
            return v;
        },
        decodePrefix,
        equals: (a, b) => compare(a, b) === 0,
        hashCode(v) {
            const h = new Hasher();
            hash(h, v);
            return h.value();
        },
        deepCopy: copy,
        stringify: (v) => format(v, 1),
    };
}
