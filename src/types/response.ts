import type { YearMonth, DateValue, DateTime } from '../internal/schema/graph';

export type { YearMonth, DateValue, DateTime };

// Value one cell of a row. Integers and vertex ids are 64-bit, so bigint.
export type Value =
    | { type: 'bool'; value: boolean }
    | { type: 'integer'; value: bigint }
    | { type: 'id'; value: bigint }
    | { type: 'float'; value: number }
    | { type: 'double'; value: number }
    | { type: 'string'; value: string; raw: Buffer }
    | { type: 'timestamp'; value: bigint }
    | { type: 'year'; value: number }
    | { type: 'month'; value: YearMonth }
    | { type: 'date'; value: DateValue }
    | { type: 'datetime'; value: DateTime }
    | { type: 'null' };

export type Row = {
    values: Value[];
};

// ResultSet defines the outcome of a successful executeQuery call.
export type ResultSet = {
    columns: string[];
    columnNames: Buffer[]; // as sent by the server
    rows: Row[];
    spaceName?: string;
    latencyInUs?: number;
    warning?: string;
};
