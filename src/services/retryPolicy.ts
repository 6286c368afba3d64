import { ScoringApiError } from '../utils/errors';
import { sleep as realSleep } from '../utils/helpers';

export interface RetryPolicy {
    /** Retries after the first attempt; total attempts = maxRetries + 1 */
    maxRetries: number;
    delayFor(attempt: number, error: unknown): number;
    isRetryable(error: unknown): boolean;
}

export interface BackoffOptions {
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs?: number;
}

export type Sleep = (ms: number) => Promise<void>;

export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number; exhausted: boolean };

export const isTransientScoringError = (error: unknown): boolean =>
    error instanceof ScoringApiError && error.retryable;

/**
 * Exponential backoff: base * 2^attempt (attempt is zero-based), capped.
 * A Retry-After hint from the server raises the delay, still under the cap.
 */
export function createRetryPolicy(options: BackoffOptions): RetryPolicy {
    const cap = options.backoffMaxMs ?? Number.POSITIVE_INFINITY;
    return {
        maxRetries: options.maxRetries,
        isRetryable: isTransientScoringError,
        delayFor(attempt, error) {
            let delay = options.backoffBaseMs * 2 ** attempt;
            if (error instanceof ScoringApiError && error.retryAfterSeconds !== undefined) {
                delay = Math.max(delay, error.retryAfterSeconds * 1000);
            }
            return Math.min(delay, cap);
        },
    };
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of retries. Failures are returned, never thrown.
 */
export async function executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    sleep: Sleep = realSleep,
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void
): Promise<RetryOutcome<T>> {
    for (let attempt = 0; ; attempt++) {
        try {
            const value = await operation(attempt);
            return { ok: true, value, attempts: attempt + 1 };
        } catch (error) {
            if (!policy.isRetryable(error)) {
                return { ok: false, error, attempts: attempt + 1, exhausted: false };
            }
            if (attempt >= policy.maxRetries) {
                return { ok: false, error, attempts: attempt + 1, exhausted: true };
            }
            const delay = policy.delayFor(attempt, error);
            onRetry?.(attempt + 1, delay, error);
            await sleep(delay);
        }
    }
}
