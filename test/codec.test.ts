import { describe, test, expect } from '@jest/globals';
import {
    CompactWriter,
    CType,
    defineStruct,
    fieldsOf,
    formatHex,
    i32,
    binary,
} from '../src/internal/codec';
import { zigzag32, unzigzag32, zigzag64, unzigzag64 } from '../src/internal/codec/compact';
import { ScanTag, ScanTagCodec } from '../src/internal/schema/storage';
import {
    ColumnValueCodec,
    ExecutionResponse,
    ExecutionResponseCodec,
    AuthenticateResultCodec,
    ExecuteResultCodec,
} from '../src/internal/schema/graph';
import { IsDecode, TruncatedError } from '../src/types/err';

function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected an exception');
}

describe('compact encoding – primitives', () => {
    test('zigzag maps signed to unsigned and back', () => {
        expect([0, -1, 1, -2, 2147483647, -2147483648].map(zigzag32))
            .toEqual([0, 1, 2, 3, 4294967294, 4294967295]);
        expect([0, 1, 2, 3, 4294967294, 4294967295].map(unzigzag32))
            .toEqual([0, -1, 1, -2, 2147483647, -2147483648]);
        expect(zigzag64(-1n)).toBe(1n);
        expect(zigzag64(-9223372036854775808n)).toBe(18446744073709551615n);
        expect(unzigzag64(18446744073709551614n)).toBe(9223372036854775807n);
    });

    test('varints are little-endian base 128', () => {
        const w = new CompactWriter();
        w.writeVarint32(300);
        w.writeVarint32(1);
        expect([...w.finish()]).toEqual([0xac, 0x02, 0x01]);
    });
});

describe('compact encoding – records', () => {
    test('short field headers carry the tag delta', () => {
        expect([...ScanTagCodec.encode({ tagId: 1 })]).toEqual([0x15, 0x02, 0x00]);
        expect([...ScanTagCodec.encode({ tagId: 1, key: Buffer.from('ab') })])
            .toEqual([0x15, 0x02, 0x18, 0x02, 0x61, 0x62, 0x00]);
        // absent fields are not written at all
        expect([...ScanTagCodec.encode({ value: Buffer.from([0xff]) })])
            .toEqual([0x38, 0x01, 0xff, 0x00]);
    });

    test('field 0 uses the long header form', () => {
        expect([...ExecuteResultCodec.encode({ success: { errorCode: 0 } })])
            .toEqual([0x0c, 0x00, 0x15, 0x00, 0x00, 0x00]);
    });

    test('bool values ride in the field header', () => {
        expect([...ColumnValueCodec.encode({ boolVal: true })]).toEqual([0x11, 0x00]);
        expect([...ColumnValueCodec.encode({ boolVal: false })]).toEqual([0x12, 0x00]);
        expect(ColumnValueCodec.decode(Buffer.from([0x12, 0x00]))).toEqual({ boolVal: false });
    });

    test('doubles are written big-endian', () => {
        expect([...ColumnValueCodec.encode({ doublePrecision: 1.5 })])
            .toEqual([0x57, 0x3f, 0xf8, 0, 0, 0, 0, 0, 0, 0x00]);
    });

    test('round-trips every combination of present fields', () => {
        const full: ScanTag = { tagId: -7, key: Buffer.from('vertex:1'), value: Buffer.from([0, 1, 2, 255]) };
        const names = ['tagId', 'key', 'value'] as const;

        for (let mask = 0; mask < 8; mask++) {
            const v: ScanTag = {};
            if (mask & 1) v.tagId = full.tagId;
            if (mask & 2) v.key = full.key;
            if (mask & 4) v.value = full.value;

            const back = ScanTagCodec.decode(ScanTagCodec.encode(v));
            expect(ScanTagCodec.equals(back, v)).toBe(true);
            for (const [i, name] of names.entries()) {
                expect(back[name] !== undefined).toBe((mask & (1 << i)) !== 0);
            }
        }
    });

    test('round-trips a query response with every column kind', () => {
        const resp: ExecutionResponse = {
            errorCode: 0,
            latencyInUs: 1250,
            columnNames: [Buffer.from('name'), Buffer.from('age')],
            rows: [
                {
                    columns: [
                        { boolVal: true },
                        { integer: -9007199254740993n },
                        { id: 9223372036854775807n },
                        { singlePrecision: 2.5 },
                        { doublePrecision: -0.125 },
                        { str: Buffer.from('Tim Duncan') },
                        { timestamp: 1560000000n },
                        { year: 2019 },
                        { month: { year: 2019, month: 6 } },
                        { date: { year: 2019, month: 6, day: 30 } },
                        { datetime: { year: 2019, month: 6, day: 30, hour: 23, minute: 59, second: 58, millisec: 999, microsec: 1 } },
                        {},
                    ],
                },
                { columns: [] },
            ],
            spaceName: Buffer.from('nba'),
            warningMsg: Buffer.from(''),
        };

        const back = ExecutionResponseCodec.decode(ExecutionResponseCodec.encode(resp));
        expect(back).toEqual(resp);
        expect(ExecutionResponseCodec.equals(back, resp)).toBe(true);
    });
});

describe('compact encoding – forward compatibility', () => {
    test('unknown tags and mismatched wire types are skipped', () => {
        const w = new CompactWriter();
        w.writeStructBegin();
        w.writeFieldBegin(1, CType.I32);
        w.writeI32(5);
        w.writeFieldBegin(2, CType.I32); // key is binary
        w.writeI32(7);
        w.writeFieldBegin(3, CType.BINARY);
        w.writeString('v');
        w.writeFieldBegin(5, CType.BOOL);
        w.writeBool(true);
        w.writeFieldBegin(7, CType.LIST);
        w.writeListBegin(CType.I32, 2);
        w.writeI32(1);
        w.writeI32(2);
        w.writeFieldBegin(8, CType.STRUCT);
        w.writeStructBegin();
        w.writeFieldBegin(1, CType.I64);
        w.writeI64(9n);
        w.writeFieldStop();
        w.writeStructEnd();
        w.writeFieldBegin(40, CType.DOUBLE);
        w.writeDouble(3.25);
        w.writeFieldStop();
        w.writeStructEnd();

        expect(ScanTagCodec.decode(w.finish())).toEqual({ tagId: 5, value: Buffer.from('v') });
    });

    test('a list with the wrong element type reads as absent', () => {
        const w = new CompactWriter();
        w.writeStructBegin();
        w.writeFieldBegin(1, CType.I32);
        w.writeI32(0);
        w.writeFieldBegin(4, CType.LIST);
        w.writeListBegin(CType.I32, 1);
        w.writeI32(3);
        w.writeFieldStop();
        w.writeStructEnd();

        const resp = ExecutionResponseCodec.decode(w.finish());
        expect(resp).toEqual({ errorCode: 0 });
        expect(resp.columnNames).toBeUndefined();
    });
});

describe('compact encoding – malformed input', () => {
    test('every strict prefix of a record is reported as truncated', () => {
        const enc = ScanTagCodec.encode({ tagId: 300, key: Buffer.from('key'), value: Buffer.from('value') });
        for (let n = 0; n < enc.length; n++) {
            expect(thrown(() => ScanTagCodec.decode(enc.subarray(0, n)))).toBeInstanceOf(TruncatedError);
        }
    });

    test('trailing bytes after a record are rejected', () => {
        const enc = Buffer.concat([ScanTagCodec.encode({ tagId: 1 }), Buffer.from([0x00])]);
        const err = thrown(() => ScanTagCodec.decode(enc));
        expect(IsDecode(err)).toBe(true);
        expect(err).not.toBeInstanceOf(TruncatedError);
    });

    test('overlong varints are rejected', () => {
        const err = thrown(() => ScanTagCodec.decode(Buffer.from([0x15, 0xff, 0xff, 0xff, 0xff, 0xff])));
        expect(IsDecode(err)).toBe(true);
        expect(err).not.toBeInstanceOf(TruncatedError);
    });

    test('unknown wire type codes are rejected', () => {
        const err = thrown(() => ScanTagCodec.decode(Buffer.from([0x1e, 0x00])));
        expect(IsDecode(err)).toBe(true);
        expect(err).not.toBeInstanceOf(TruncatedError);
    });

    test('nesting is bounded', () => {
        const err = thrown(() => ScanTagCodec.decode(Buffer.alloc(70, 0x1c)));
        expect(IsDecode(err)).toBe(true);
        expect(err).not.toBeInstanceOf(TruncatedError);
    });

    test('collection nesting is bounded too', () => {
        // unknown field 4 holding a list of lists of lists ...
        const buf = Buffer.from([0x49, ...new Array<number>(20000).fill(0x19), 0x00]);
        const err = thrown(() => ScanTagCodec.decode(buf));
        expect(IsDecode(err)).toBe(true);
        expect(err).toHaveProperty('message', 'DECODE_ERROR:collection nesting deeper than 64');
    });

    test('only the zero byte ends a struct', () => {
        expect(ScanTagCodec.decode(Buffer.from([0x00]))).toEqual({});
        const err = thrown(() => ScanTagCodec.decode(Buffer.from([0x10])));
        expect(IsDecode(err)).toBe(true);
        expect(err).toHaveProperty('message', 'DECODE_ERROR:field header 0x10 has a delta but no type');
    });

    test('floats must be exact in single precision', () => {
        expect(() => ColumnValueCodec.encode({ singlePrecision: 0.1 })).toThrow(RangeError);

        for (const singlePrecision of [0.5, -3.25, Math.fround(0.1), NaN, Infinity]) {
            const back = ColumnValueCodec.decode(ColumnValueCodec.encode({ singlePrecision }));
            expect(back).toEqual({ singlePrecision });
            expect(ColumnValueCodec.equals(back, { singlePrecision })).toBe(true);
        }
    });

    test('a truncation reports the length it needed', () => {
        const enc = ScanTagCodec.encode({ key: Buffer.from('vertex:1') });
        const err = thrown(() => ScanTagCodec.decode(enc.subarray(0, 4)));
        expect(err).toBeInstanceOf(TruncatedError);
        // header byte, length byte, then the 8 key bytes
        expect(err).toHaveProperty('needed', 10);
    });

    test('out of range integers are refused on encode', () => {
        expect(() => ScanTagCodec.encode({ tagId: 2 ** 31 })).toThrow(RangeError);
        expect(() => ScanTagCodec.encode({ tagId: 1.5 })).toThrow(RangeError);
    });
});

describe('record semantics', () => {
    test('absent differs from present-but-zero', () => {
        const zero: ScanTag = { tagId: 0 };
        const none: ScanTag = {};
        expect(ScanTagCodec.equals(zero, none)).toBe(false);
        expect(ScanTagCodec.compare(none, zero)).toBeLessThan(0);
        expect(ScanTagCodec.compare(zero, none)).toBeGreaterThan(0);
        expect(ScanTagCodec.equals({ key: Buffer.alloc(0) }, {})).toBe(false);
    });

    test('byte strings compare as unsigned bytes', () => {
        expect(ScanTagCodec.compare({ key: Buffer.from([0x80]) }, { key: Buffer.from([0x7f]) })).toBeGreaterThan(0);
        expect(ScanTagCodec.compare({ key: Buffer.from([0x01]) }, { key: Buffer.from([0x01, 0x00]) })).toBeLessThan(0);
    });

    test('fields compare in tag order, first difference wins', () => {
        expect(ScanTagCodec.compare({ tagId: 1, key: Buffer.from('z') }, { tagId: 2, key: Buffer.from('a') })).toBeLessThan(0);
        expect(ScanTagCodec.compare({ tagId: 2, key: Buffer.from('a') }, { tagId: 2, key: Buffer.from('b') })).toBeLessThan(0);
    });

    test('ordering is antisymmetric and agrees with equals and hashCode', () => {
        const samples: ScanTag[] = [
            {},
            { tagId: 0 },
            { tagId: 1 },
            { tagId: -1 },
            { tagId: 1, key: Buffer.from([0x01]) },
            { tagId: 1, key: Buffer.from([0x01, 0x00]) },
            { tagId: 1, key: Buffer.from([0x02]) },
            { key: Buffer.alloc(0) },
            { tagId: 1, key: Buffer.from([0x01]) },
            { value: Buffer.from('x') },
        ];

        for (const a of samples) {
            for (const b of samples) {
                const ab = Math.sign(ScanTagCodec.compare(a, b));
                const ba = Math.sign(ScanTagCodec.compare(b, a));
                expect(ab).toBe(-ba);
                expect(ab === 0).toBe(ScanTagCodec.equals(a, b));
                if (ab === 0) expect(ScanTagCodec.hashCode(a)).toBe(ScanTagCodec.hashCode(b));
            }
        }
    });

    test('deep copies never alias byte strings or nested records', () => {
        const src: ExecutionResponse = {
            errorCode: 0,
            columnNames: [Buffer.from('a')],
            rows: [{ columns: [{ str: Buffer.from('abc') }] }],
        };
        const copy = ExecutionResponseCodec.deepCopy(src);
        expect(ExecutionResponseCodec.equals(copy, src)).toBe(true);

        const cell = copy.rows?.[0].columns?.[0].str;
        expect(cell).toBeDefined();
        if (cell) cell[0] = 0x7a;
        copy.columnNames?.push(Buffer.from('b'));

        expect(src.rows?.[0].columns?.[0].str?.toString()).toBe('abc');
        expect(src.columnNames).toHaveLength(1);
        expect(ExecutionResponseCodec.equals(copy, src)).toBe(false);
    });
});

describe('record validation', () => {
    type Probe = { id?: number; note?: Buffer };
    const p = fieldsOf<Probe>();
    const ProbeCodec = defineStruct<Probe>('Probe', () => ({}), [
        p(1, 'id', i32, { required: true }),
        p(2, 'note', binary),
    ]);

    test('required fields are checked before encode and after decode', () => {
        expect(() => ProbeCodec.encode({ note: Buffer.from('n') }))
            .toThrow('DECODE_ERROR:Probe: required field(s) not set: id');
        expect(() => ProbeCodec.decode(Buffer.from([0x00])))
            .toThrow('DECODE_ERROR:Probe: required field(s) not set: id');
        expect(ProbeCodec.decode(ProbeCodec.encode({ id: 3 }))).toEqual({ id: 3 });
    });

    test('a column value carries at most one member', () => {
        const err = thrown(() => ColumnValueCodec.encode({ integer: 1n, str: Buffer.from('x') }));
        expect(IsDecode(err)).toBe(true);
        expect(err).toHaveProperty('message', 'DECODE_ERROR:ColumnValue: union has 2 members set: integer, str');

        // integer (tag 2) = 1, then str (tag 6) = "x"
        const twoMembers = Buffer.from([0x26, 0x02, 0x48, 0x01, 0x78, 0x00]);
        expect(IsDecode(thrown(() => ColumnValueCodec.decode(twoMembers)))).toBe(true);
    });

    test('duplicate tags are refused when the schema is built', () => {
        expect(() => defineStruct<Probe>('Dup', () => ({}), [p(1, 'id', i32), p(1, 'note', binary)]))
            .toThrow('Dup: duplicate field id 1');
    });
});

describe('debug rendering', () => {
    test('lists each field with its name, absent ones as null', () => {
        expect(ScanTagCodec.stringify({ tagId: 7, key: Buffer.from([0x0a, 0xff]) }))
            .toBe('ScanTag (\n  tagId : 7,\n  key : 0A FF,\n  value : null\n)');
    });

    test('indents nested records two spaces per level', () => {
        expect(AuthenticateResultCodec.stringify({ success: { errorCode: 0, sessionId: 5n } })).toBe(
            'authenticate_result (\n' +
            '  success : AuthResponse (\n' +
            '    errorCode : 0,\n' +
            '    sessionId : 5,\n' +
            '    errorMsg : null\n' +
            '  )\n' +
            ')',
        );
    });

    test('renders lists inline', () => {
        const text = ExecutionResponseCodec.stringify({ columnNames: [Buffer.from('a'), Buffer.from('bc')] });
        expect(text.split('\n')[4]).toBe('  columnNames : [61, 62 63],');
    });

    test('cuts byte strings after 128 bytes', () => {
        expect(formatHex(Buffer.alloc(130, 0xab))).toBe(Array(128).fill('AB').join(' ') + ' ...');
        expect(formatHex(Buffer.alloc(128, 0x01))).toBe(Array(128).fill('01').join(' '));
        expect(formatHex(Buffer.alloc(0))).toBe('');
    });
});
