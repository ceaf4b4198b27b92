/**
 * Retry primitives with exponential backoff.
 *
 * delay(attempt) = min(initialDelayMs * factor^(attempt - 1), maxDelayMs),
 * plus up to `jitterPercent` percent of random extra delay.
 */

export interface RetryOptions {
    /** Total number of calls, including the first one (1 = no retries) */
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs?: number;
    factor?: number;
    /** 0-100, default 0 */
    jitterPercent?: number;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (info: { error: unknown; attempt: number; delayMs: number }) => void;
}

export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_BACKOFF_FACTOR = 2;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateBackoffDelay(
    attempt: number,
    opts: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "factor" | "jitterPercent">,
    random: () => number = Math.random
): number {
    const factor = opts.factor ?? DEFAULT_BACKOFF_FACTOR;
    const cap = opts.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    const base = Math.min(opts.initialDelayMs * factor ** Math.max(0, attempt - 1), cap);
    const jitter = opts.jitterPercent ? (base * random() * opts.jitterPercent) / 100 : 0;
    return Math.round(base + jitter);
}

/**
 * Calls `fn` until it resolves, the error is not retryable, or attempts run
 * out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
    const maxAttempts = Math.max(1, opts.maxAttempts);
    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            const retryable = opts.shouldRetry ? opts.shouldRetry(err, attempt) : true;
            if (!retryable || attempt >= maxAttempts) throw err;
            const delayMs = calculateBackoffDelay(attempt, opts);
            opts.onRetry?.({ error: err, attempt, delayMs });
            await sleep(delayMs);
        }
    }
}
