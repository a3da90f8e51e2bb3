#!/usr/bin/env node
import fs from "node:fs/promises"
import path from "node:path"
import { pathToFileURL } from "node:url"
import { loadEnv } from "./loadEnv.js"
import { loadConfig } from "./config.js"
import { createDeployer } from "./deployer.js"
import { ConsoleTaskReporter } from "./taskReporter.js"
import { TaskRequestSchema } from "./taskSubmission.js"
import { buildTask, type Task } from "./taskTypes.js"

export type ParsedArgs = {
    file: string
    /** Generate and print the file listing without publishing or notifying. */
    dryRun: boolean
}

function usage(error?: string) {
    const lines = [
        error ? `Error: ${error}` : null,
        "Usage:",
        "  npm run task -- --file <task.json> [--dry-run]",
        "",
        "Options:",
        "  --file, -f <path>   Task request JSON (same body as POST /tasks; secret not needed)",
        "  --dry-run           Only generate the app and list its files",
    ].filter(Boolean)

    console.error(lines.join("\n"))
}

export function parseArgs(argv: string[]): ParsedArgs {
    let file: string | undefined
    let dryRun = false

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i]

        if (arg === "--file" || arg === "-f") {
            const next = argv[i + 1]
            if (!next) {
                throw new Error(`Missing value for ${arg}`)
            }
            file = next
            i += 1
            continue
        }

        if (arg.startsWith("--file=")) {
            file = arg.slice("--file=".length)
            continue
        }

        if (arg === "--dry-run") {
            dryRun = true
            continue
        }

        throw new Error(`Unknown argument: ${arg}`)
    }

    if (!file) {
        throw new Error("--file is required")
    }

    return { file, dryRun }
}

export function parseTaskFile(content: string): Task {
    const parsed = TaskRequestSchema.omit({ secret: true }).safeParse(JSON.parse(content))
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        throw new Error(`Invalid task file: ${issues.join("; ")}`)
    }
    const request = parsed.data
    return buildTask({
        email: request.email,
        task: request.task,
        round: request.round,
        nonce: request.nonce,
        brief: request.brief,
        checks: request.checks,
        attachments: request.attachments,
        evaluationUrl: request.evaluation_url,
    })
}

export async function main(argv = process.argv.slice(2)) {
    let args: ParsedArgs
    try {
        args = parseArgs(argv)
    } catch (error) {
        usage(error instanceof Error ? error.message : String(error))
        process.exit(1)
    }

    loadEnv()
    const config = loadConfig()
    const task = parseTaskFile(await fs.readFile(path.resolve(args.file), "utf8"))
    const deployer = createDeployer(config, new ConsoleTaskReporter())

    try {
        if (args.dryRun) {
            const files = await deployer.generator.generate(task)
            for (const file of files.files) {
                console.log(`${file.path} (${file.encoding}, ${file.content.length} chars)`)
            }
            return
        }

        const outcome = await deployer.orchestrator.runTask(task)
        console.log(JSON.stringify(outcome, null, 2))
        if (outcome.status === "failed") {
            process.exitCode = 1
        }
    } finally {
        deployer.close()
    }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main().catch((error) => {
        console.error("Task run failed:", error)
        process.exit(1)
    })
}
