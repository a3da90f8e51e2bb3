import assert from "node:assert/strict"
import { mkdtemp, readFile, rm } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { test } from "node:test"
import { createTaskLogger, resolveTaskLogPath } from "../src/taskLog.js"

test("task logger appends every line to <logDir>/<taskId>.log in order", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "task-log-"))
    try {
        const logger = createTaskLogger({ taskId: "abc123", logDir: path.join(dir, "logs"), echo: false })
        logger.info("first")
        logger.warn("second")
        logger.error("third")
        await logger.flush()

        const lines = (await readFile(resolveTaskLogPath(path.join(dir, "logs"), "abc123"), "utf8")).trimEnd().split("\n")
        assert.deepEqual(
            lines.map((line) => line.replace(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} /, "")),
            ["INFO first", "WARN second", "ERROR third"],
        )
    } finally {
        await rm(dir, { recursive: true, force: true })
    }
})

test("task logger without a directory only echoes", async () => {
    const logger = createTaskLogger({ taskId: "abc123", logDir: null, echo: false })
    logger.info("nothing to write")
    await logger.flush()
    assert.equal(resolveTaskLogPath("/var/log/deployer", "abc123"), "/var/log/deployer/abc123.log")
})
