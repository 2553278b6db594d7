import type { ResultSet } from '../types/response';

// Every call resolves to a PromiseLike so that awaited clients (Promise) and
// pool-dispatched ones (ResultFuture) share the same capability interfaces.

export interface SessionAPI {
    /**
     * Authenticate against one of the configured hosts.
     * Resolves to SUCCEEDED, E_BAD_USERNAME_PASSWORD or E_FAIL_TO_CONNECT.
     */
    connect(username: string, password: string): PromiseLike<number>;

    /**
     * Sign out and release the connection. Safe to call more than once.
     */
    close(): PromiseLike<void>;
}

export interface StatementAPI {
    /**
     * Make `space` the default graph space of the session
     */
    switchSpace(space: string): PromiseLike<number>;

    /**
     * Run a statement whose only outcome is a status code
     */
    execute(statement: string): PromiseLike<number>;

    /**
     * Run a query; rejects with a QUERY error carrying the server code on failure
     */
    executeQuery(statement: string): PromiseLike<ResultSet>;
}

export type GraphClientAPI = SessionAPI & StatementAPI;

/**
 * Key/value access to a storage host. Values are integers keyed by string
 * within a graph space; every call resolves to a status code or the value.
 */
export interface KeyValueAPI {
    put(space: number, key: string, value: number): PromiseLike<number>;

    get(space: number, key: string): PromiseLike<number>;

    /**
     * Compare-and-set: writes `value` only when the stored value equals `expected`
     */
    cas(space: number, key: string, expected: number, value: number): PromiseLike<number>;
}
