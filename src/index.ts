export { GraphClient } from './graph/api';
export { AsyncGraphClient } from './graph/async';
export {
    Config,
    ConfigBuilder,
    verifyConfig,
    parseAddress,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_CONNECTION_RETRY,
    DEFAULT_EXECUTION_RETRY,
    DEFAULT_BACKOFF_MS,
    DEFAULT_POOL_SIZE,
} from './graph/config';
export type { HostAddress, Logger } from './graph/config';
export type { SessionAPI, StatementAPI, GraphClientAPI, KeyValueAPI } from './api/client';
export { ResultFuture } from './internal/dispatch/pool';
export type { Transport } from './internal/transport/socket';
export type { TransportFactory } from './internal/graph/connection';
export { ErrorCode, errorCodeName } from './types/codes';
export { ErrorKind, NgqlError, TruncatedError, IsClient, IsConnection, IsQuery, IsRpc, IsDecode } from './types/err';
export type { Value, Row, ResultSet, YearMonth, DateValue, DateTime } from './types/response';
export type { ScanTag } from './internal/schema/storage';
export { ScanTagCodec } from './internal/schema/storage';
export type { StructCodec } from './internal/codec';
