import { z } from "zod"

export type FileEncoding = "utf-8" | "base64"

export interface GeneratedFile {
    readonly path: string
    readonly content: string
    readonly encoding: FileEncoding
}

export type ParsedFileSet = { ok: true; files: GeneratedFileSet }
export type ParseFailure = { ok: false; reason: string }
export type FileSetParseResult = ParsedFileSet | ParseFailure

const FileEntrySchema = z.object({
    path: z.string(),
    content: z.string(),
    encoding: z.enum(["utf-8", "utf8", "base64"]).optional(),
})

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

export function isBase64(content: string): boolean {
    const compact = content.replace(/\s+/g, "")
    return compact.length % 4 === 0 && BASE64_PATTERN.test(compact)
}

const FileListingSchema = z.object({
    files: z.array(FileEntrySchema),
})

/**
 * Normalizes a repository-relative path, or returns null when the path is empty, absolute,
 * escapes the repository root, or points into `.git`.
 */
export function normalizeRepoPath(raw: string): string | null {
    if (raw.includes("\0")) return null
    let candidate = raw.trim().replace(/\\/g, "/")
    while (candidate.startsWith("./")) {
        candidate = candidate.slice(2)
    }
    if (!candidate) return null
    if (candidate.startsWith("/") || /^[A-Za-z]:/.test(candidate)) return null

    const segments = candidate.split("/")
    if (segments.some((segment) => segment === "" || segment === "." || segment === "..")) {
        return null
    }
    if (segments.some((segment) => segment.toLowerCase() === ".git")) return null

    return segments.join("/")
}

/**
 * Immutable, validated set of files destined for one commit. Only obtainable through
 * `GeneratedFileSet.from`, so every instance has at least one file and only safe paths.
 */
export class GeneratedFileSet {
    readonly files: readonly GeneratedFile[]

    private constructor(files: GeneratedFile[]) {
        this.files = Object.freeze(files.map((file) => Object.freeze({ ...file })))
    }

    static from(
        entries: ReadonlyArray<{ path: string; content: string; encoding?: string }>,
    ): FileSetParseResult {
        const files: GeneratedFile[] = []
        const seen = new Set<string>()

        for (const entry of entries) {
            const normalized = normalizeRepoPath(entry.path)
            if (!normalized) {
                return { ok: false, reason: `Invalid file path: ${JSON.stringify(entry.path)}` }
            }
            if (seen.has(normalized)) {
                return { ok: false, reason: `Duplicate file path: ${normalized}` }
            }
            seen.add(normalized)

            if (!entry.content.trim()) {
                continue
            }
            const encoding: FileEncoding = entry.encoding === "base64" ? "base64" : "utf-8"
            if (encoding === "base64" && !isBase64(entry.content)) {
                return { ok: false, reason: `Invalid base64 content: ${normalized}` }
            }
            files.push({ path: normalized, content: entry.content, encoding })
        }

        if (files.length === 0) {
            return { ok: false, reason: "File listing contains no non-empty files" }
        }

        return { ok: true, files: new GeneratedFileSet(files) }
    }

    get paths(): string[] {
        return this.files.map((file) => file.path)
    }

    get size(): number {
        return this.files.length
    }
}

function tryParseJson(text: string): unknown | null {
    try {
        return JSON.parse(text)
    } catch {
        return null
    }
}

function extractJsonObject(text: string): unknown | null {
    const trimmed = text.trim()
    if (!trimmed) return null

    const direct = tryParseJson(trimmed)
    if (direct !== null) return direct

    const first = trimmed.indexOf("{")
    const last = trimmed.lastIndexOf("}")
    if (first === -1 || last <= first) return null

    return tryParseJson(trimmed.slice(first, last + 1))
}

/**
 * Turns the model's raw answer into a file set. The answer must contain a JSON object of the
 * form `{ "files": [{ "path", "content", "encoding"? }] }`, optionally wrapped in prose or a
 * code fence.
 */
export function parseFileListing(text: string): FileSetParseResult {
    const raw = extractJsonObject(text)
    if (raw === null) {
        return { ok: false, reason: text.trim() ? "No JSON object found in model output" : "Model output is empty" }
    }

    const parsed = FileListingSchema.safeParse(raw)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue?.path.join(".") || "(root)"
        return { ok: false, reason: `File listing does not match schema at ${where}: ${issue?.message ?? "invalid"}` }
    }

    return GeneratedFileSet.from(parsed.data.files)
}
