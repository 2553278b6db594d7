import type { ColumnValue, ExecutionResponse } from '../schema/graph';
import type { ResultSet, Row, Value } from '../../types/response';

export function toValue(c: ColumnValue): Value {
    if (c.boolVal !== undefined) return { type: 'bool', value: c.boolVal };
    if (c.integer !== undefined) return { type: 'integer', value: c.integer };
    if (c.id !== undefined) return { type: 'id', value: c.id };
    if (c.singlePrecision !== undefined) return { type: 'float', value: c.singlePrecision };
    if (c.doublePrecision !== undefined) return { type: 'double', value: c.doublePrecision };
    if (c.str !== undefined) return { type: 'string', value: c.str.toString('utf8'), raw: c.str };
    if (c.timestamp !== undefined) return { type: 'timestamp', value: c.timestamp };
    if (c.year !== undefined) return { type: 'year', value: c.year };
    if (c.month !== undefined) return { type: 'month', value: c.month };
    if (c.date !== undefined) return { type: 'date', value: c.date };
    if (c.datetime !== undefined) return { type: 'datetime', value: c.datetime };
    // empty union, or a member this client does not know
    return { type: 'null' };
}

export function toResultSet(resp: ExecutionResponse): ResultSet {
    const columnNames = resp.columnNames ?? [];
    const rows: Row[] = (resp.rows ?? []).map((r) => ({ values: (r.columns ?? []).map(toValue) }));

    return {
        columns: columnNames.map((c) => c.toString('utf8')),
        columnNames,
        rows,
        spaceName: resp.spaceName?.toString('utf8'),
        latencyInUs: resp.latencyInUs,
        warning: resp.warningMsg?.toString('utf8'),
    };
}
