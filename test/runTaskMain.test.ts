import assert from "node:assert/strict"
import { test } from "node:test"
import { parseArgs, parseTaskFile } from "../src/runTaskMain.js"

test("parseArgs reads --file in both forms and --dry-run", () => {
    assert.deepEqual(parseArgs(["--file", "task.json"]), { file: "task.json", dryRun: false })
    assert.deepEqual(parseArgs(["--file=task.json", "--dry-run"]), { file: "task.json", dryRun: true })
    assert.deepEqual(parseArgs(["-f", "t.json"]), { file: "t.json", dryRun: false })
})

test("parseArgs rejects missing and unknown arguments", () => {
    assert.throws(() => parseArgs([]), { message: "--file is required" })
    assert.throws(() => parseArgs(["--file"]), { message: "Missing value for --file" })
    assert.throws(() => parseArgs(["--file", "a.json", "--push"]), { message: "Unknown argument: --push" })
})

test("parseTaskFile builds a task without needing a secret", () => {
    const task = parseTaskFile(
        JSON.stringify({
            email: "student@example.com",
            task: "sum-of-sales",
            round: 2,
            nonce: "n-1",
            evaluation_url: "https://evaluator.example.com/notify",
        }),
    )
    assert.equal(task.task, "sum-of-sales")
    assert.equal(task.round, 2)
    assert.equal(task.brief, "")
    assert.deepEqual(task.checks, [])
})

test("parseTaskFile reports invalid fields", () => {
    assert.throws(() => parseTaskFile(JSON.stringify({ email: "nope", task: "x", round: 0, nonce: "n" })), {
        message: "Invalid task file: email: Invalid email; evaluation_url: Required",
    })
})
