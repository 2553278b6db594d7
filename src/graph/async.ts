// src/graph/async.ts
import { GraphClient } from './api';
import type { Config } from './config';
import type { GraphClientAPI } from '../api/client';
import type { TransportFactory } from '../internal/graph/connection';
import { ResultFuture, WorkerPool } from '../internal/dispatch/pool';
import type { ResultSet } from '../types/response';

/**
 * Same calls as GraphClient, dispatched on a worker pool of cfg.poolSize.
 * Submissions are not ordered relative to each other: await one future
 * before submitting a call that depends on it.
 */
export class AsyncGraphClient implements GraphClientAPI {
    private readonly client: GraphClient;
    private readonly pool: WorkerPool;

    constructor(cfg: Config, newTransport?: TransportFactory) {
        this.client = new GraphClient(cfg, newTransport);
        this.pool = new WorkerPool(cfg.poolSize);
    }

    connect(username: string, password: string): ResultFuture<number> {
        return this.pool.submit(() => this.client.connect(username, password));
    }

    switchSpace(space: string): ResultFuture<number> {
        return this.pool.submit(() => this.client.switchSpace(space));
    }

    execute(statement: string): ResultFuture<number> {
        return this.pool.submit(() => this.client.execute(statement));
    }

    executeQuery(statement: string): ResultFuture<ResultSet> {
        return this.pool.submit(() => this.client.executeQuery(statement));
    }

    /** Runs directly, not on the pool, so it is never queued behind pending calls. */
    close(): Promise<void> {
        return this.client.close();
    }
}
