import assert from "node:assert/strict"
import { once } from "node:events"
import { test } from "node:test"
import { TaskStore } from "../src/db/taskStore.js"
import { SERVICE_NAME, SERVICE_VERSION, createApp, resolveCorsOrigin } from "../src/server.js"
import { deriveTaskId, failedOutcome, type Task } from "../src/taskTypes.js"
import { makeTask } from "./support/fixtures.js"

test("resolveCorsOrigin allows everything with a wildcard", () => {
    assert.equal(resolveCorsOrigin("https://any.example", ["*"]), "*")
    assert.equal(resolveCorsOrigin(undefined, ["*"]), "*")
})

test("resolveCorsOrigin echoes only listed origins", () => {
    const allowList = ["https://dash.example.com", "http://localhost:5173"]
    assert.equal(resolveCorsOrigin("http://localhost:5173", allowList), "http://localhost:5173")
    assert.equal(resolveCorsOrigin("https://evil.example", allowList), null)
    assert.equal(resolveCorsOrigin(undefined, allowList), null)
})

type Deps = Parameters<typeof createApp>[0]

async function withApp(overrides: Partial<Deps>, fn: (baseUrl: string, enqueued: Task[]) => Promise<void>) {
    const enqueued: Task[] = []
    const app = createApp({
        allowOrigins: ["*"],
        store: null,
        acceptedSecrets: ["test-secret"],
        enqueue: (task) => {
            enqueued.push(task)
            return {
                taskId: task.id,
                duplicate: false,
                done: Promise.resolve(failedOutcome(task.id, "generation-failed", "not run")),
            }
        },
        ...overrides,
    })
    const server = app.listen(0)
    await once(server, "listening")
    const address = server.address()
    assert.ok(address !== null && typeof address === "object")
    try {
        await fn(`http://127.0.0.1:${address.port}`, enqueued)
    } finally {
        server.close()
        await once(server, "close")
    }
}

const SUBMISSION = {
    email: "student@example.com",
    secret: "test-secret",
    task: "markdown-viewer",
    round: 1,
    nonce: "nonce-1",
    brief: "Render markdown",
    evaluation_url: "https://evaluator.example.com/notify",
}

function postJson(url: string, body: string, headers: Record<string, string> = {}) {
    return fetch(url, { method: "POST", headers: { "content-type": "application/json", ...headers }, body })
}

test("GET / reports the service health", async () => {
    await withApp({}, async (baseUrl) => {
        const res = await fetch(`${baseUrl}/`)
        assert.equal(res.status, 200)
        assert.deepEqual(await res.json(), { status: "ok", service: SERVICE_NAME, version: SERVICE_VERSION })
    })
})

test("OPTIONS preflight is answered with 204 and the allowed methods", async () => {
    await withApp({}, async (baseUrl) => {
        const res = await fetch(`${baseUrl}/tasks`, {
            method: "OPTIONS",
            headers: { origin: "https://dash.example.com", "access-control-request-method": "POST" },
        })
        assert.equal(res.status, 204)
        assert.equal(res.headers.get("access-control-allow-origin"), "*")
        assert.equal(res.headers.get("access-control-allow-methods"), "GET,POST,OPTIONS")
        assert.equal(res.headers.get("access-control-allow-headers"), "Content-Type")
    })
})

test("POST /tasks accepts a valid submission and enqueues the task", async () => {
    await withApp({}, async (baseUrl, enqueued) => {
        const res = await postJson(`${baseUrl}/tasks`, JSON.stringify(SUBMISSION))
        const taskId = deriveTaskId("student@example.com", 1, "nonce-1")

        assert.equal(res.status, 200)
        assert.deepEqual(await res.json(), {
            status: "accepted",
            task_id: taskId,
            task: "markdown-viewer",
            round: 1,
            nonce: "nonce-1",
            duplicate: false,
        })
        assert.equal(enqueued.length, 1)
        assert.equal(enqueued[0].id, taskId)
        assert.equal(enqueued[0].evaluationUrl, "https://evaluator.example.com/notify")
    })
})

test("POST /tasks rejects a wrong secret with 401 and enqueues nothing", async () => {
    await withApp({}, async (baseUrl, enqueued) => {
        const res = await postJson(`${baseUrl}/tasks`, JSON.stringify({ ...SUBMISSION, secret: "wrong" }))
        assert.equal(res.status, 401)
        assert.deepEqual(await res.json(), { error: "unauthorized", detail: "Invalid secret" })
        assert.equal(enqueued.length, 0)
    })
})

test("POST /tasks answers malformed JSON with 400", async () => {
    await withApp({}, async (baseUrl) => {
        const res = await postJson(`${baseUrl}/tasks`, "{not json")
        assert.equal(res.status, 400)
        assert.deepEqual(await res.json(), {
            error: "invalid_request",
            issues: [{ path: "(body)", message: "Malformed JSON" }],
        })
    })
})

test("POST /tasks keeps the client status of an oversized body", async () => {
    await withApp({}, async (baseUrl, enqueued) => {
        const body = JSON.stringify({ ...SUBMISSION, brief: "x".repeat(11 * 1024 * 1024) })
        const res = await postJson(`${baseUrl}/tasks`, body)
        assert.equal(res.status, 413)
        assert.deepEqual(await res.json(), {
            error: "invalid_request",
            issues: [{ path: "(body)", message: "request entity too large" }],
        })
        assert.equal(enqueued.length, 0)
    })
})

test("POST /tasks answers an unsupported content encoding with 415", async () => {
    await withApp({}, async (baseUrl) => {
        const res = await postJson(`${baseUrl}/tasks`, JSON.stringify(SUBMISSION), { "content-encoding": "x-custom" })
        assert.equal(res.status, 415)
        const body: unknown = await res.json()
        assert.ok(typeof body === "object" && body !== null && "error" in body)
        assert.equal(body.error, "invalid_request")
    })
})

test("GET /tasks/:id returns the stored record or 404", async () => {
    const store = new TaskStore(":memory:")
    const task = makeTask()
    store.beginRun(task)
    try {
        await withApp({ store }, async (baseUrl) => {
            const found = await fetch(`${baseUrl}/tasks/${task.id}`)
            assert.equal(found.status, 200)
            assert.deepEqual(await found.json(), JSON.parse(JSON.stringify(store.readTask(task.id))))

            const missing = await fetch(`${baseUrl}/tasks/0000000000000000`)
            assert.equal(missing.status, 404)
            assert.deepEqual(await missing.json(), { error: "not_found" })
        })
    } finally {
        store.close()
    }
})
