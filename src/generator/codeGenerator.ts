import type { Task, TaskAttachment } from "../taskTypes.js"
import { withDeadline } from "../deadline.js"
import { DeadlineExceededError, GenerationError, describeError } from "../errors.js"
import type { CompletionClient } from "./completionClient.js"
import { type GeneratedFileSet, parseFileListing } from "./fileSet.js"

const ATTACHMENT_EXCERPT_LIMIT = 2000

export const GENERATOR_INSTRUCTIONS = [
    "You generate complete, self-contained static web applications that run on GitHub Pages.",
    "Use only files that a static host can serve (HTML, CSS, JavaScript, JSON, images).",
    "Always include index.html at the repository root, a README.md and an MIT LICENSE.",
    "",
    "Answer with VALID JSON only, matching this schema:",
    "",
    "{",
    '  "files": [',
    '    { "path": "relative/path.ext", "content": "file contents", "encoding": "utf-8 | base64" }',
    "  ]",
    "}",
    "",
    "Paths are relative to the repository root. Do not write anything except the JSON.",
].join("\n")

/**
 * Recognises a 429 from the completion API. The OpenAI client raises errors carrying `status`
 * and `headers`; the headers are a fetch `Headers` or a plain record depending on its version.
 */
export function readRateLimit(error: unknown): { retryAfterMs?: number } | null {
    if (typeof error !== "object" || error === null || !("status" in error) || error.status !== 429) {
        return null
    }
    const headers = "headers" in error ? error.headers : undefined
    let retryAfter: unknown
    if (headers instanceof Headers) {
        retryAfter = headers.get("retry-after")
    } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
        retryAfter = headers["retry-after"]
    }
    const seconds = typeof retryAfter === "string" && retryAfter.trim() ? Number(retryAfter) : NaN
    return Number.isFinite(seconds) && seconds >= 0 ? { retryAfterMs: seconds * 1000 } : {}
}

export interface GenerateOptions {
    /**
     * Why the previous attempt for this task was rejected; steers the regeneration.
     */
    previousFailure?: string
}

export interface CodeGeneratorOptions {
    completion: CompletionClient
    timeoutMs: number
}

interface DataUri {
    mimeType: string
    base64: boolean
    payload: string
}

function parseDataUri(url: string): DataUri | null {
    const match = /^data:([^,]*?),(.*)$/s.exec(url)
    if (!match) return null
    const meta = match[1].split(";")
    const base64 = meta.includes("base64")
    const mimeType = meta[0] || "text/plain"
    return { mimeType, base64, payload: match[2] }
}

function decodePayload(dataUri: DataUri): Buffer {
    if (dataUri.base64) {
        return Buffer.from(dataUri.payload, "base64")
    }
    try {
        return Buffer.from(decodeURIComponent(dataUri.payload), "utf8")
    } catch {
        // malformed percent-escapes: keep the raw text
        return Buffer.from(dataUri.payload, "utf8")
    }
}

function isTextual(mimeType: string): boolean {
    return (
        mimeType.startsWith("text/") ||
        mimeType === "application/json" ||
        mimeType === "application/xml" ||
        mimeType === "image/svg+xml"
    )
}

function describeAttachment(attachment: TaskAttachment): string {
    const dataUri = parseDataUri(attachment.url)
    if (!dataUri) {
        return `- ${attachment.name}: ${attachment.url}`
    }

    const bytes = decodePayload(dataUri)

    if (!isTextual(dataUri.mimeType)) {
        return `- ${attachment.name}: inline ${dataUri.mimeType} (${bytes.length} bytes, embed it as a data URI if needed)`
    }

    const text = bytes.toString("utf8")
    const excerpt =
        text.length > ATTACHMENT_EXCERPT_LIMIT
            ? `${text.slice(0, ATTACHMENT_EXCERPT_LIMIT)}\n[truncated ${text.length - ATTACHMENT_EXCERPT_LIMIT} chars]`
            : text
    return [`- ${attachment.name} (${dataUri.mimeType}):`, "```", excerpt, "```"].join("\n")
}

export function buildGenerationPrompt(task: Task, options: GenerateOptions = {}): string {
    const lines = ["App brief:", task.brief.trim() || "(no brief provided)", ""]

    if (task.checks.length > 0) {
        lines.push("The app will be evaluated against these checks:")
        task.checks.forEach((check, idx) => lines.push(`${idx + 1}. ${check}`))
        lines.push("")
    }

    if (task.attachments.length > 0) {
        lines.push("Attachments:")
        for (const attachment of task.attachments) {
            lines.push(describeAttachment(attachment))
        }
        lines.push("")
    }

    if (options.previousFailure) {
        lines.push(
            "The previous attempt for this app was rejected:",
            options.previousFailure,
            "Fix that problem and return the full file listing again.",
            "",
        )
    }

    lines.push(`Task: ${task.task} (round ${task.round})`)
    return lines.join("\n")
}

/**
 * Turns a task into a file set with one model call. Stateless: retries belong to the caller.
 */
export class CodeGenerator {
    private readonly completion: CompletionClient
    private readonly timeoutMs: number

    constructor(options: CodeGeneratorOptions) {
        this.completion = options.completion
        this.timeoutMs = options.timeoutMs
    }

    async generate(task: Task, options: GenerateOptions = {}): Promise<GeneratedFileSet> {
        const prompt = buildGenerationPrompt(task, options)

        let output: string
        try {
            output = await withDeadline(this.timeoutMs, "completion", (signal) =>
                this.completion.complete({ instructions: GENERATOR_INSTRUCTIONS, prompt, signal }),
            )
        } catch (error) {
            if (error instanceof DeadlineExceededError) {
                throw new GenerationError("upstream-timeout", error.message, { cause: error })
            }
            const rateLimit = readRateLimit(error)
            if (rateLimit) {
                throw new GenerationError("upstream-error", `Completion request was rate limited: ${describeError(error)}`, {
                    cause: error,
                    rateLimited: true,
                    retryAfterMs: rateLimit.retryAfterMs,
                })
            }
            throw new GenerationError("upstream-error", `Completion request failed: ${describeError(error)}`, {
                cause: error,
            })
        }

        const parsed = parseFileListing(output)
        if (!parsed.ok) {
            throw new GenerationError("malformed-response", parsed.reason)
        }
        return parsed.files
    }
}
