// Records exchanged with the graph daemon's GraphService.
import type { StructCodec } from '../codec';
import { defineStruct, fieldsOf, bool, byte, i16, i32, i64, float, double, binary, list } from '../codec';

export type YearMonth = {
    year?: number;
    month?: number;
};

export type DateValue = {
    year?: number;
    month?: number;
    day?: number;
};

export type DateTime = {
    year?: number;
    month?: number;
    day?: number;
    hour?: number;
    minute?: number;
    second?: number;
    millisec?: number;
    microsec?: number;
};

// Union on the wire: at most one member is present.
export type ColumnValue = {
    boolVal?: boolean;
    integer?: bigint;
    id?: bigint;
    singlePrecision?: number;
    doublePrecision?: number;
    str?: Buffer;
    timestamp?: bigint;
    year?: number;
    month?: YearMonth;
    date?: DateValue;
    datetime?: DateTime;
};

export type RowValue = {
    columns?: ColumnValue[];
};

export type AuthResponse = {
    errorCode?: number;
    sessionId?: bigint;
    errorMsg?: Buffer;
};

export type ExecutionResponse = {
    errorCode?: number;
    latencyInUs?: number;
    errorMsg?: Buffer;
    columnNames?: Buffer[];
    rows?: RowValue[];
    spaceName?: Buffer;
    warningMsg?: Buffer;
};

export type AuthenticateArgs = {
    username?: Buffer;
    password?: Buffer;
};

export type ExecuteArgs = {
    sessionId?: bigint;
    stmt?: Buffer;
};

export type SignoutArgs = {
    sessionId?: bigint;
};

// field 0 holds the return value of a call
export type AuthenticateResult = { success?: AuthResponse };
export type ExecuteResult = { success?: ExecutionResponse };

const ym = fieldsOf<YearMonth>();
export const YearMonthCodec = defineStruct<YearMonth>('YearMonth', () => ({}), [
    ym(1, 'year', i16),
    ym(2, 'month', byte),
]);

const d = fieldsOf<DateValue>();
export const DateCodec = defineStruct<DateValue>('Date', () => ({}), [
    d(1, 'year', i16),
    d(2, 'month', byte),
    d(3, 'day', byte),
]);

const dt = fieldsOf<DateTime>();
export const DateTimeCodec = defineStruct<DateTime>('DateTime', () => ({}), [
    dt(1, 'year', i16),
    dt(2, 'month', byte),
    dt(3, 'day', byte),
    dt(4, 'hour', byte),
    dt(5, 'minute', byte),
    dt(6, 'second', byte),
    dt(7, 'millisec', i16),
    dt(8, 'microsec', i16),
]);

const cv = fieldsOf<ColumnValue>();
export const ColumnValueCodec: StructCodec<ColumnValue> = defineStruct<ColumnValue>('ColumnValue', () => ({}), [
    cv(1, 'boolVal', bool),
    cv(2, 'integer', i64),
    cv(3, 'id', i64),
    cv(4, 'singlePrecision', float),
    cv(5, 'doublePrecision', double),
    cv(6, 'str', binary),
    cv(7, 'timestamp', i64),
    cv(8, 'year', i16),
    cv(9, 'month', YearMonthCodec),
    cv(10, 'date', DateCodec),
    cv(11, 'datetime', DateTimeCodec),
], {
    check(v) {
        const set = ColumnValueCodec.fields.filter((f) => f.isSet(v)).map((f) => f.name);
        return set.length > 1 ? `union has ${set.length} members set: ${set.join(', ')}` : undefined;
    },
});

const rv = fieldsOf<RowValue>();
export const RowValueCodec = defineStruct<RowValue>('RowValue', () => ({}), [
    rv(1, 'columns', list(ColumnValueCodec)),
]);

const ar = fieldsOf<AuthResponse>();
export const AuthResponseCodec = defineStruct<AuthResponse>('AuthResponse', () => ({}), [
    ar(1, 'errorCode', i32),
    ar(2, 'sessionId', i64),
    ar(3, 'errorMsg', binary),
]);

const er = fieldsOf<ExecutionResponse>();
export const ExecutionResponseCodec = defineStruct<ExecutionResponse>('ExecutionResponse', () => ({}), [
    er(1, 'errorCode', i32),
    er(2, 'latencyInUs', i32),
    er(3, 'errorMsg', binary),
    er(4, 'columnNames', list(binary)),
    er(5, 'rows', list(RowValueCodec)),
    er(6, 'spaceName', binary),
    er(7, 'warningMsg', binary),
]);

const aa = fieldsOf<AuthenticateArgs>();
export const AuthenticateArgsCodec = defineStruct<AuthenticateArgs>('authenticate_args', () => ({}), [
    aa(1, 'username', binary),
    aa(2, 'password', binary),
]);

const ea = fieldsOf<ExecuteArgs>();
export const ExecuteArgsCodec = defineStruct<ExecuteArgs>('execute_args', () => ({}), [
    ea(1, 'sessionId', i64),
    ea(2, 'stmt', binary),
]);

const sa = fieldsOf<SignoutArgs>();
export const SignoutArgsCodec = defineStruct<SignoutArgs>('signout_args', () => ({}), [
    sa(1, 'sessionId', i64),
]);

export const AuthenticateResultCodec = defineStruct<AuthenticateResult>('authenticate_result', () => ({}), [
    fieldsOf<AuthenticateResult>()(0, 'success', AuthResponseCodec),
]);

export const ExecuteResultCodec = defineStruct<ExecuteResult>('execute_result', () => ({}), [
    fieldsOf<ExecuteResult>()(0, 'success', ExecutionResponseCodec),
]);
