// src/graph/api.ts
import { ConnectionManager, TransportFactory, socketTransport } from '../internal/graph/connection';
import { ExecutionEngine } from '../internal/graph/executor';
import { NgError } from '../internal/err';
import { verifyConfig } from './config';
import type { Config } from './config';
import type { GraphClientAPI } from '../api/client';
import type { ResultSet } from '../types/response';
import { ErrorCode, errorCodeName } from '../types/codes';
import { ErrorKind } from '../types/err';

export class GraphClient implements GraphClientAPI {
    private readonly conn: ConnectionManager;
    private readonly engine: ExecutionEngine;

    /**
     * Validates cfg and throws a CLIENT error listing every problem. No I/O
     * happens until connect().
     */
    constructor(readonly cfg: Config, newTransport: TransportFactory = socketTransport) {
        if (!cfg) throw NgError('cfg must not be null', ErrorKind.Client);
        const [valid, errMsg] = verifyConfig(cfg);
        if (!valid) throw NgError(errMsg, ErrorKind.Client);

        this.conn = new ConnectionManager(cfg, newTransport);
        this.engine = new ExecutionEngine(this.conn, cfg);
    }

    /** Builds a client and connects it; rejects with a CONNECTION error on failure. */
    static async create(cfg: Config, username: string, password: string, newTransport?: TransportFactory): Promise<GraphClient> {
        const client = new GraphClient(cfg, newTransport);
        const code = await client.connect(username, password);
        if (code !== ErrorCode.SUCCEEDED) {
            throw NgError(`connect failed: ${errorCodeName(code)}`, ErrorKind.Connection, code);
        }
        return client;
    }

    connect(username: string, password: string): Promise<number> {
        return this.conn.connect(username, password);
    }

    /** True while the session's Transport is open. */
    isConnected(): boolean {
        return this.conn.current() !== null;
    }

    switchSpace(space: string): Promise<number> {
        return this.engine.switchSpace(space);
    }

    execute(statement: string): Promise<number> {
        return this.engine.execute(statement);
    }

    executeQuery(statement: string): Promise<ResultSet> {
        return this.engine.executeQuery(statement);
    }

    close(): Promise<void> {
        return this.conn.close();
    }
}
