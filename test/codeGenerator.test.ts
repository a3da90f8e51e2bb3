import assert from "node:assert/strict"
import { test } from "node:test"
import { GenerationError } from "../src/errors.js"
import { CodeGenerator, GENERATOR_INSTRUCTIONS, buildGenerationPrompt, readRateLimit } from "../src/generator/codeGenerator.js"
import type { CompletionClient, CompletionRequest } from "../src/generator/completionClient.js"
import { makeTask } from "./support/fixtures.js"

function completion(answer: (request: CompletionRequest) => Promise<string>) {
    const requests: CompletionRequest[] = []
    const client: CompletionClient = {
        complete: (request) => {
            requests.push(request)
            return answer(request)
        },
    }
    return { client, requests }
}

test("buildGenerationPrompt lists brief, numbered checks and attachments", () => {
    const task = makeTask({
        brief: "Show the CSV as a table",
        checks: ["Has a <table>", "Title is Sales"],
        attachments: [
            { name: "data.csv", url: "data:text/csv;base64,YSxiCjEsMgo=" },
            { name: "logo.png", url: "data:image/png;base64,iVBORw0KGgo=" },
            { name: "notes", url: "https://example.com/notes.md" },
        ],
    })

    assert.equal(
        buildGenerationPrompt(task),
        [
            "App brief:",
            "Show the CSV as a table",
            "",
            "The app will be evaluated against these checks:",
            "1. Has a <table>",
            "2. Title is Sales",
            "",
            "Attachments:",
            "- data.csv (text/csv):\n```\na,b\n1,2\n\n```",
            "- logo.png: inline image/png (8 bytes, embed it as a data URI if needed)",
            "- notes: https://example.com/notes.md",
            "",
            "Task: markdown-viewer (round 1)",
        ].join("\n"),
    )
})

test("buildGenerationPrompt includes the previous failure when regenerating", () => {
    const prompt = buildGenerationPrompt(makeTask({ brief: "", checks: [] }), {
        previousFailure: "Duplicate file path: index.html",
    })
    assert.equal(
        prompt,
        [
            "App brief:",
            "(no brief provided)",
            "",
            "The previous attempt for this app was rejected:",
            "Duplicate file path: index.html",
            "Fix that problem and return the full file listing again.",
            "",
            "Task: markdown-viewer (round 1)",
        ].join("\n"),
    )
})

test("generate returns the parsed file set", async () => {
    const { client, requests } = completion(async () =>
        JSON.stringify({ files: [{ path: "index.html", content: "<h1>Hello</h1>" }] }),
    )
    const generator = new CodeGenerator({ completion: client, timeoutMs: 1_000 })

    const files = await generator.generate(makeTask())

    assert.deepEqual(files.paths, ["index.html"])
    assert.equal(requests[0].instructions, GENERATOR_INSTRUCTIONS)
})

test("generate maps an unusable answer to malformed-response", async () => {
    const { client } = completion(async () => "Sorry, I can't help with that.")
    const generator = new CodeGenerator({ completion: client, timeoutMs: 1_000 })

    await assert.rejects(generator.generate(makeTask()), (error: unknown) => {
        assert.ok(error instanceof GenerationError)
        assert.equal(error.kind, "malformed-response")
        assert.equal(error.message, "No JSON object found in model output")
        return true
    })
})

test("generate maps a client failure to upstream-error", async () => {
    const { client } = completion(async () => {
        throw new Error("401 Incorrect API key provided")
    })
    const generator = new CodeGenerator({ completion: client, timeoutMs: 1_000 })

    await assert.rejects(generator.generate(makeTask()), (error: unknown) => {
        assert.ok(error instanceof GenerationError)
        assert.equal(error.kind, "upstream-error")
        assert.equal(error.message, "Completion request failed: 401 Incorrect API key provided")
        return true
    })
})

test("generate flags a 429 from the completion API as rate limited", async () => {
    const { client } = completion(async () => {
        throw Object.assign(new Error("429 Rate limit reached"), {
            status: 429,
            headers: new Headers({ "retry-after": "3" }),
        })
    })
    const generator = new CodeGenerator({ completion: client, timeoutMs: 1_000 })

    await assert.rejects(generator.generate(makeTask()), (error: unknown) => {
        assert.ok(error instanceof GenerationError)
        assert.equal(error.kind, "upstream-error")
        assert.equal(error.rateLimited, true)
        assert.equal(error.retryAfterMs, 3_000)
        assert.equal(error.message, "Completion request was rate limited: 429 Rate limit reached")
        return true
    })
})

test("readRateLimit reads retry-after from plain header records and ignores other statuses", () => {
    assert.deepEqual(readRateLimit({ status: 429, headers: { "retry-after": "2" } }), { retryAfterMs: 2_000 })
    assert.deepEqual(readRateLimit({ status: 429 }), {})
    assert.equal(readRateLimit({ status: 500, headers: { "retry-after": "2" } }), null)
    assert.equal(readRateLimit(new Error("network down")), null)
})

test("generate gives up at the deadline and aborts the request", async () => {
    let aborted = false
    const { client } = completion(
        (request) =>
            new Promise<string>((_resolve, reject) => {
                request.signal.addEventListener("abort", () => {
                    aborted = true
                    reject(new Error("aborted"))
                })
            }),
    )
    const generator = new CodeGenerator({ completion: client, timeoutMs: 20 })

    await assert.rejects(generator.generate(makeTask()), (error: unknown) => {
        assert.ok(error instanceof GenerationError)
        assert.equal(error.kind, "upstream-timeout")
        assert.equal(error.message, "completion timed out after 20ms")
        return true
    })
    assert.equal(aborted, true)
})
