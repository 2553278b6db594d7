const MAX_BACKOFF_MS = 2_000;

export interface RetryPolicy {
    /** Total attempts, including the first one. */
    maxAttempts: number;
    /** Base delay for exponential backoff; 0 retries immediately. */
    backoffMs: number;
    isRetryable: (err: unknown) => boolean;
    onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/** Exponential backoff with full jitter, capped at two seconds. */
export function calculateDelay(attempt: number, baseDelayMs: number): number {
    if (baseDelayMs <= 0) return 0;
    const delay = Math.min(baseDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS);
    return Math.floor(delay / 2 + Math.random() * (delay / 2));
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs fn until it resolves, it throws something isRetryable rejects, or
 * maxAttempts attempts have been made. The last error is rethrown.
 */
export async function withRetries<T>(policy: RetryPolicy, fn: (attempt: number) => Promise<T>): Promise<T> {
    const attempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            if (attempt + 1 >= attempts || !policy.isRetryable(err)) throw err;

            const delay = calculateDelay(attempt, policy.backoffMs);
            policy.onRetry?.(err, attempt + 1, delay);
            if (delay > 0) await sleep(delay);
        }
    }
}
