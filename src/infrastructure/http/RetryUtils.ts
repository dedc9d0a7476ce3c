/**
 * Retry Utilities
 *
 * Exponential backoff retry logic for transient failures.
 * Used to wrap calls to the image API.
 */

export interface RetryOptions {
    /** Maximum number of attempts, first one included (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 500) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 5000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Decides whether an error is worth another attempt (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 500,
    maxBackoffMs: 5000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { },
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @returns The result of the first successful attempt
 * @throws The last error once attempts run out, or the first non-retryable error
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
