// src/internal/dispatch/pool.ts
import { Semaphore } from 'async-mutex';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Handle to a call submitted to a WorkerPool. Awaitable like a promise; a
 * rejection is never reported as unhandled just because nobody awaited it.
 */
export class ResultFuture<T> implements PromiseLike<T> {
    private outcome: Outcome<T> | undefined;

    constructor(private readonly promise: Promise<T>) {
        void promise.then(
            (value) => { this.outcome = { ok: true, value }; },
            (error: unknown) => { this.outcome = { ok: false, error }; },
        );
    }

    /** True once the call has resolved or rejected. */
    isDone(): boolean {
        return this.outcome !== undefined;
    }

    /** Waits for the call and returns its value, or rethrows its failure. */
    get(): Promise<T> {
        return this.promise;
    }

    then<R1 = T, R2 = never>(
        onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
        onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
    ): Promise<R1 | R2> {
        return this.promise.then(onfulfilled, onrejected);
    }
}

/** Runs submitted calls with at most `size` of them in flight. */
export class WorkerPool {
    private readonly sem: Semaphore;
    private running = 0;

    constructor(readonly size: number) {
        this.sem = new Semaphore(size);
    }

    submit<T>(fn: () => Promise<T>): ResultFuture<T> {
        return new ResultFuture(this.sem.runExclusive(async () => {
            this.running++;
            try {
                return await fn();
            } finally {
                this.running--;
            }
        }));
    }

    /** Calls currently executing, not counting queued ones. */
    inFlight(): number {
        return this.running;
    }
}
