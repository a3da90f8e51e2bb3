import assert from "node:assert/strict"
import { test } from "node:test"
import { Notifier, buildCallbackPayload } from "../src/notifier/notifier.js"
import { DEFAULT_RETRY_POLICY } from "../src/retryPolicy.js"
import { failedOutcome, succeededOutcome } from "../src/taskTypes.js"
import { makeTask } from "./support/fixtures.js"

const POLICY = { ...DEFAULT_RETRY_POLICY, maxAttempts: 6, jitter: 0 }

function recordingFetch(responses: Array<Response | Error>) {
    const requests: Array<{ url: string; init: RequestInit | undefined }> = []
    const fetchFn: typeof fetch = async (input, init) => {
        requests.push({ url: String(input), init })
        const next = responses.shift() ?? new Response("ok", { status: 200 })
        if (next instanceof Error) throw next
        return next
    }
    return { fetchFn, requests }
}

const deployment = {
    repositoryName: "llm-app-markdown-viewer-r1-abcdef12",
    repositoryUrl: "https://github.com/test-owner/llm-app-markdown-viewer-r1-abcdef12",
    pagesUrl: "https://test-owner.github.io/llm-app-markdown-viewer-r1-abcdef12/",
    commitSha: "c0ffee",
    pagesStatus: "pending" as const,
}

test("buildCallbackPayload carries the deployment for a success", () => {
    const task = makeTask()
    assert.deepEqual(buildCallbackPayload(task, succeededOutcome(task.id, deployment)), {
        email: "student@example.com",
        task: "markdown-viewer",
        round: 1,
        nonce: "nonce-1",
        task_id: task.id,
        status: "succeeded",
        repo_url: deployment.repositoryUrl,
        commit_sha: "c0ffee",
        pages_url: deployment.pagesUrl,
        pages_status: "pending",
        error_kind: null,
        error_detail: null,
    })
})

test("buildCallbackPayload carries the error for a failure", () => {
    const task = makeTask()
    const payload = buildCallbackPayload(task, failedOutcome(task.id, "generation-failed", "upstream-timeout: slow"))
    assert.equal(payload.status, "failed")
    assert.equal(payload.repo_url, null)
    assert.equal(payload.error_kind, "generation-failed")
    assert.equal(payload.error_detail, "upstream-timeout: slow")
})

test("notify posts JSON to the evaluation URL", async () => {
    const { fetchFn, requests } = recordingFetch([new Response("", { status: 200 })])
    const task = makeTask()
    const notifier = new Notifier({ policy: POLICY, timeoutMs: 1_000, fetchFn })

    const result = await notifier.notify(succeededOutcome(task.id, deployment), task.evaluationUrl, { task })

    assert.deepEqual(result, { delivered: true, attempts: 1 })
    assert.equal(requests.length, 1)
    assert.equal(requests[0].url, "https://evaluator.example.com/notify")
    assert.equal(requests[0].init?.method, "POST")
    assert.deepEqual(requests[0].init?.headers, { "Content-Type": "application/json" })
    assert.equal(JSON.parse(String(requests[0].init?.body)).commit_sha, "c0ffee")
})

test("notify retries non-2xx responses on a doubling schedule", async () => {
    const { fetchFn, requests } = recordingFetch([
        new Response("busy", { status: 503 }),
        new Error("fetch failed"),
        new Response("created", { status: 201 }),
    ])
    const sleeps: number[] = []
    const task = makeTask()
    const notifier = new Notifier({
        policy: POLICY,
        timeoutMs: 1_000,
        fetchFn,
        sleep: async (ms) => {
            sleeps.push(ms)
        },
    })

    const result = await notifier.notify(succeededOutcome(task.id, deployment), task.evaluationUrl, { task })

    assert.deepEqual(result, { delivered: true, attempts: 3 })
    assert.equal(requests.length, 3)
    assert.deepEqual(sleeps, [1_000, 2_000])
})

test("notify gives up after the retry budget and reports the last error", async () => {
    const responses = Array.from({ length: 6 }, () => new Response("busy", { status: 503 }))
    const { fetchFn, requests } = recordingFetch(responses)
    const sleeps: number[] = []
    const task = makeTask()
    const notifier = new Notifier({
        policy: POLICY,
        timeoutMs: 1_000,
        fetchFn,
        sleep: async (ms) => {
            sleeps.push(ms)
        },
    })

    const result = await notifier.notify(failedOutcome(task.id, "publish-failed", "x"), task.evaluationUrl, { task })

    assert.equal(result.delivered, false)
    assert.equal(result.attempts, 6)
    assert.equal(result.lastError?.kind, "upstream-error")
    assert.equal(result.lastError?.message, "Callback responded with status 503: busy")
    assert.equal(requests.length, 6)
    assert.deepEqual(sleeps, [1_000, 2_000, 4_000, 8_000, 16_000])
})

test("a callback that hangs past the deadline is an upstream-timeout", async () => {
    const fetchFn: typeof fetch = (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")))
        })
    const task = makeTask()
    const notifier = new Notifier({ policy: { ...POLICY, maxAttempts: 1 }, timeoutMs: 20, fetchFn })

    const result = await notifier.notify(failedOutcome(task.id, "publish-failed", "x"), task.evaluationUrl, { task })

    assert.equal(result.delivered, false)
    assert.equal(result.lastError?.kind, "upstream-timeout")
    assert.equal(result.lastError?.message, "callback POST https://evaluator.example.com/notify timed out after 20ms")
})
