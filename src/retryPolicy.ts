export interface RetryPolicy {
    /** Total attempts including the first one. */
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
    /** Fraction of the delay added or removed at random (0.2 = ±20%). */
    jitter: number
    /** Extra factor applied to the delay after a rate-limit signal. */
    rateLimitMultiplier: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 30_000,
    jitter: 0.2,
    rateLimitMultiplier: 4,
})

export const ZERO_DELAY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 3,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitter: 0,
    rateLimitMultiplier: 1,
})

export interface RetryDecision {
    retryable: boolean
    rateLimited?: boolean
    retryAfterMs?: number
}

export interface RetryHooks {
    /** Classifies a failure; defaults to "retry everything". */
    classify?: (error: unknown) => RetryDecision
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void | Promise<void>
    sleep?: (ms: number) => Promise<void>
    random?: () => number
}

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number }

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export function computeBackoffDelay(
    policy: RetryPolicy,
    attempt: number,
    decision: RetryDecision = { retryable: true },
    random: () => number = Math.random,
): number {
    const exponential = policy.baseDelayMs * 2 ** (attempt - 1)
    let delay = Math.min(exponential, policy.maxDelayMs)
    if (decision.rateLimited) {
        delay = Math.max(delay * policy.rateLimitMultiplier, decision.retryAfterMs ?? 0)
    }
    if (policy.jitter > 0 && delay > 0) {
        const spread = delay * policy.jitter
        delay += (random() * 2 - 1) * spread
    }
    return Math.max(0, Math.round(delay))
}

/**
 * Calls `fn(attempt)` until it succeeds, a failure is classified as not retryable, or
 * `policy.maxAttempts` attempts have been made. Never throws the step's error: the caller gets
 * a tagged result with the last error and the number of attempts used.
 */
export async function retryWithBackoff<T>(
    policy: RetryPolicy,
    fn: (attempt: number, previousError: unknown) => Promise<T>,
    hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))
    const sleep = hooks.sleep ?? defaultSleep
    let previousError: unknown

    for (let attempt = 1; ; attempt += 1) {
        try {
            const value = await fn(attempt, previousError)
            return { ok: true, value, attempts: attempt }
        } catch (error) {
            previousError = error
            const decision = hooks.classify?.(error) ?? { retryable: true }
            if (!decision.retryable || attempt >= maxAttempts) {
                return { ok: false, error, attempts: attempt }
            }
            const delayMs = computeBackoffDelay(policy, attempt, decision, hooks.random)
            await hooks.onRetry?.({ attempt, delayMs, error })
            if (delayMs > 0) {
                await sleep(delayMs)
            }
        }
    }
}
