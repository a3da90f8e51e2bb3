import assert from "node:assert/strict"
import { test } from "node:test"
import { DEFAULT_RETRY_POLICY, computeBackoffDelay, retryWithBackoff } from "../src/retryPolicy.js"

const NO_JITTER = { ...DEFAULT_RETRY_POLICY, jitter: 0 }

test("computeBackoffDelay doubles from the base and stops at the cap", () => {
    assert.deepEqual(
        [1, 2, 3, 4, 5, 6, 7].map((attempt) => computeBackoffDelay(NO_JITTER, attempt)),
        [1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000],
    )
})

test("computeBackoffDelay stretches the delay after a rate-limit signal", () => {
    assert.equal(computeBackoffDelay(NO_JITTER, 1, { retryable: true, rateLimited: true }), 4_000)
    assert.equal(computeBackoffDelay(NO_JITTER, 1, { retryable: true, rateLimited: true, retryAfterMs: 60_000 }), 60_000)
})

test("computeBackoffDelay applies jitter symmetrically", () => {
    assert.equal(computeBackoffDelay(DEFAULT_RETRY_POLICY, 1, undefined, () => 0), 800)
    assert.equal(computeBackoffDelay(DEFAULT_RETRY_POLICY, 1, undefined, () => 1), 1_200)
    assert.equal(computeBackoffDelay(DEFAULT_RETRY_POLICY, 1, undefined, () => 0.5), 1_000)
})

test("retryWithBackoff returns the first success with the attempt count", async () => {
    const sleeps: number[] = []
    const seen: unknown[] = []
    const result = await retryWithBackoff(
        NO_JITTER,
        async (attempt, previousError) => {
            seen.push(previousError)
            if (attempt < 3) throw new Error(`fail ${attempt}`)
            return "ok"
        },
        {
            sleep: async (ms) => {
                sleeps.push(ms)
            },
        },
    )

    assert.deepEqual(result, { ok: true, value: "ok", attempts: 3 })
    assert.deepEqual(sleeps, [1_000, 2_000])
    assert.equal(seen[0], undefined)
    assert.equal(seen[2] instanceof Error ? seen[2].message : null, "fail 2")
})

test("retryWithBackoff stops at maxAttempts and hands back the last error", async () => {
    let calls = 0
    const result = await retryWithBackoff(
        { ...NO_JITTER, maxAttempts: 2 },
        async () => {
            calls += 1
            throw new Error(`boom ${calls}`)
        },
        { sleep: async () => {} },
    )

    assert.equal(calls, 2)
    assert.equal(result.ok, false)
    assert.equal(result.attempts, 2)
    assert.equal(!result.ok && result.error instanceof Error ? result.error.message : null, "boom 2")
})

test("retryWithBackoff does not retry failures classified as permanent", async () => {
    const retries: number[] = []
    const result = await retryWithBackoff(
        NO_JITTER,
        async () => {
            throw new Error("conflict")
        },
        {
            classify: () => ({ retryable: false }),
            onRetry: ({ attempt }) => {
                retries.push(attempt)
            },
        },
    )

    assert.equal(result.attempts, 1)
    assert.deepEqual(retries, [])
})
