import assert from "node:assert/strict"
import { test } from "node:test"
import { TaskStore } from "../src/db/taskStore.js"
import { failedOutcome, markNotified } from "../src/taskTypes.js"
import { makeTask } from "./support/fixtures.js"

test("TaskStore keeps run states moving forward only", () => {
    const store = new TaskStore(":memory:")
    const task = makeTask()
    const run = store.beginRun(task)

    assert.equal(run, 1)
    assert.equal(store.markState(task.id, run, "generating"), true)
    assert.equal(store.markState(task.id, run, "publishing"), true)
    assert.equal(store.markState(task.id, run, "generating"), false)
    assert.equal(store.markState(task.id, run, "publishing"), false)
    assert.equal(store.readTask(task.id)?.state, "publishing")
    assert.equal(store.readTask(task.id)?.finishedAt, null)

    assert.equal(store.markState(task.id, run, "done"), true)
    assert.ok(store.readTask(task.id)?.finishedAt)
    store.close()
})

test("TaskStore numbers runs per task and reports the latest", () => {
    const store = new TaskStore(":memory:")
    const task = makeTask()

    assert.equal(store.beginRun(task), 1)
    assert.equal(store.beginRun(task), 2)
    assert.equal(store.beginRun(makeTask({ nonce: "other" })), 1)

    const record = store.readTask(task.id)
    assert.equal(record?.run, 2)
    assert.equal(record?.state, "received")
    assert.equal(record?.email, "student@example.com")
    assert.equal(record?.outcome, null)
    store.close()
})

test("TaskStore stores the outcome once and only flips notified afterwards", () => {
    const store = new TaskStore(":memory:")
    const task = makeTask()
    const run = store.beginRun(task)
    const outcome = failedOutcome(task.id, "publish-failed", "naming-conflict: taken (after 1 attempt)")

    store.recordOutcome(run, outcome)
    store.recordOutcome(run, markNotified(failedOutcome(task.id, "generation-failed", "other")))

    let stored = store.readTask(task.id)?.outcome
    assert.equal(stored?.errorKind, "publish-failed")
    assert.equal(stored?.errorDetail, "naming-conflict: taken (after 1 attempt)")
    assert.equal(stored?.notified, false)

    store.markNotified(task.id, run)
    stored = store.readTask(task.id)?.outcome
    assert.equal(stored?.notified, true)
    store.close()
})

test("TaskStore keeps the event trail of a run in order", () => {
    const store = new TaskStore(":memory:")
    const task = makeTask()
    const run = store.beginRun(task)

    store.recordEvent(task.id, run, "retry", { step: "generate", attempt: 1 })
    store.recordEvent(task.id, run, "generated", { files: ["index.html"] })

    assert.deepEqual(
        store.readEvents(task.id, run).map((event) => [event.type, event.data]),
        [
            ["retry", { step: "generate", attempt: 1 }],
            ["generated", { files: ["index.html"] }],
        ],
    )
    store.close()
})

test("TaskStore reports unknown tasks as null", () => {
    const store = new TaskStore(":memory:")
    assert.equal(store.readTask("0000000000000000"), null)
    assert.equal(store.markState("0000000000000000", 1, "generating"), false)
    store.close()
})
