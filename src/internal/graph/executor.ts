// src/internal/graph/executor.ts
import type { Config } from '../../graph/config';
import type { ResultSet } from '../../types/response';
import { ErrorCode, errorCodeName } from '../../types/codes';
import { ErrorKind, IsQuery } from '../../types/err';
import { NgError } from '../err';
import { withRetries } from '../retry';
import type { ExecutionResponse } from '../schema/graph';
import type { ConnectionManager } from './connection';
import { toResultSet } from './result';

// Server codes worth another attempt on the same session. Everything else
// (syntax, permission, session state) fails the same way again.
export const RETRYABLE_CODES: ReadonlySet<number> = new Set<number>([
    ErrorCode.E_EXECUTION_ERROR,
]);

/**
 * Issues statements on the session held by a ConnectionManager. An RPC fault
 * leaves the byte stream in an unknown state, so it closes the Transport and
 * is never retried.
 */
export class ExecutionEngine {
    constructor(private readonly conn: ConnectionManager, private readonly cfg: Config) { }

    async execute(statement: string): Promise<number> {
        const log = this.cfg.logger;
        const session = this.conn.current();
        if (!session) {
            log.error('[graph] execute: not connected');
            return ErrorCode.E_DISCONNECTED;
        }

        try {
            return await withRetries({
                maxAttempts: this.cfg.executionRetry,
                backoffMs: this.cfg.backoff,
                isRetryable: (err) => IsQuery(err) && err.errorCode !== undefined && RETRYABLE_CODES.has(err.errorCode),
                onRetry: (err, attempt, delay) => {
                    const msg = err instanceof Error ? err.message : String(err);
                    log.warn(`[graph] execute attempt ${attempt} failed: ${msg}; retrying in ${delay}ms`);
                },
            }, async () => {
                const resp = await session.service.execute(session.id, statement);
                const code = resp.errorCode ?? ErrorCode.E_RPC_FAILURE;
                if (code !== ErrorCode.SUCCEEDED && RETRYABLE_CODES.has(code)) {
                    throw NgError(resp.errorMsg?.toString('utf8') ?? '', ErrorKind.Query, code);
                }
                if (code !== ErrorCode.SUCCEEDED) {
                    log.error(`[graph] execute error ${errorCodeName(code)}: ${resp.errorMsg?.toString('utf8') ?? ''}`);
                }
                return code;
            });
        } catch (err) {
            if (IsQuery(err) && err.errorCode !== undefined) {
                log.error(`[graph] execute error ${err.message}`);
                return err.errorCode;
            }
            const msg = err instanceof Error ? err.message : String(err);
            log.error(`[graph] rpc call failed: ${msg}`);
            this.conn.drop();
            return ErrorCode.E_RPC_FAILURE;
        }
    }

    /** Makes `space` the session default. An empty name is a CLIENT error. */
    async switchSpace(space: string): Promise<number> {
        if (space.trim() === '') throw NgError('space name must not be empty', ErrorKind.Client);
        return this.execute(`USE ${space}`);
    }

    async executeQuery(statement: string): Promise<ResultSet> {
        const log = this.cfg.logger;
        const session = this.conn.current();
        if (!session) {
            log.error('[graph] executeQuery: not connected');
            throw NgError('not connected', ErrorKind.Connection, ErrorCode.E_DISCONNECTED);
        }

        let resp: ExecutionResponse;
        try {
            resp = await session.service.execute(session.id, statement);
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            log.error(`[graph] rpc call failed: ${msg}`);
            this.conn.drop();
            throw NgError(`rpc call failed: ${msg}`, ErrorKind.Connection, ErrorCode.E_RPC_FAILURE);
        }

        const code = resp.errorCode ?? ErrorCode.E_RPC_FAILURE;
        if (code !== ErrorCode.SUCCEEDED) {
            const msg = resp.errorMsg?.toString('utf8') ?? '';
            log.error(`[graph] execute error ${errorCodeName(code)}: ${msg}`);
            throw NgError(msg, ErrorKind.Query, code);
        }
        return toResultSet(resp);
    }
}
