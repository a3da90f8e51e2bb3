import { GeneratedFileSet } from "../../src/generator/fileSet.js"
import { buildTask, type Task, type TaskAttachment } from "../../src/taskTypes.js"

export function makeTask(
    overrides: Partial<{
        email: string
        task: string
        round: number
        nonce: string
        brief: string
        checks: string[]
        attachments: TaskAttachment[]
        evaluationUrl: string
    }> = {},
): Task {
    return buildTask({
        email: "student@example.com",
        task: "markdown-viewer",
        round: 1,
        nonce: "nonce-1",
        brief: "Render a markdown file passed as ?url=",
        checks: ["Page has a #content element"],
        attachments: [],
        evaluationUrl: "https://evaluator.example.com/notify",
        ...overrides,
    })
}

export function makeFiles(entries: Array<{ path: string; content: string; encoding?: string }>): GeneratedFileSet {
    const parsed = GeneratedFileSet.from(entries)
    if (!parsed.ok) throw new Error(parsed.reason)
    return parsed.files
}

export const SAMPLE_FILES = [
    { path: "index.html", content: "<!doctype html><div id=\"content\"></div>" },
    { path: "README.md", content: "# Markdown viewer\n" },
    { path: "LICENSE", content: "MIT License\n" },
]
