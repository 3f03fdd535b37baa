/**
 * src/utils/retryPolicy.ts
 *
 * Pure retry/backoff decisions for the HTTP client.
 *
 * Backoff formula:
 *   delay = backoffBaseMs × 2^attempt + random() × backoffJitterMs
 *
 * `attempt` is the number of retries already made (0 before the first retry),
 * so with the defaults the waits are ~1 s, ~2 s, ~4 s.
 */

export interface RetryPolicy {
    /** Retries after the initial attempt. Total attempts = maxRetries + 1. */
    maxRetries: number;
    backoffBaseMs: number;
    backoffJitterMs: number;
}

export interface RetryDecision {
    shouldRetry: boolean;
    delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 3,
    backoffBaseMs: 1000,
    backoffJitterMs: 1000,
};

export function planRetry(
    attempt: number,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    random: () => number = Math.random
): RetryDecision {
    if (attempt >= policy.maxRetries) {
        return { shouldRetry: false, delayMs: 0 };
    }
    const delayMs = policy.backoffBaseMs * 2 ** attempt + random() * policy.backoffJitterMs;
    return { shouldRetry: true, delayMs };
}
