import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

let loadedFrom: string | null = null

export interface LoadEnvOptions {
    /** Defaults to `.env` at the project root. */
    envFilePath?: string
    /** Target environment; defaults to process.env. */
    env?: NodeJS.ProcessEnv
    /** Read the file again even if an earlier call already did. */
    force?: boolean
}

/**
 * Load variables from a .env file once. Values already present in the environment win.
 * Returns the path that was read, or null when there was nothing to read.
 */
export function loadEnv(options: LoadEnvOptions = {}): string | null {
    if (loadedFrom && !options.force) return loadedFrom

    const resolvedPath =
        options.envFilePath ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", ".env")
    const env = options.env ?? process.env

    if (!fs.existsSync(resolvedPath)) {
        return null
    }

    try {
        const values = parseEnvFile(fs.readFileSync(resolvedPath, "utf8"))
        for (const [key, value] of Object.entries(values)) {
            if (env[key] === undefined) {
                env[key] = value
            }
        }
        loadedFrom = resolvedPath
        return resolvedPath
    } catch (error) {
        console.warn(`[env] Failed to load ${resolvedPath}:`, error)
        return null
    }
}

/** Parses .env content; later duplicates override earlier ones. */
export function parseEnvFile(content: string): Record<string, string> {
    const values: Record<string, string> = {}
    for (const line of content.split(/\r?\n/)) {
        const parsed = parseLine(line)
        if (parsed) values[parsed.key] = parsed.value
    }
    return values
}

function parseLine(line: string): { key: string; value: string } | null {
    const trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith("#")) {
        return null
    }

    const cleaned = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed
    const eqIndex = cleaned.indexOf("=")
    if (eqIndex === -1) {
        return null
    }

    const key = cleaned.slice(0, eqIndex).trim()
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
        return null
    }

    const rawValue = cleaned.slice(eqIndex + 1).trim()
    return { key, value: unwrap(stripInlineComment(rawValue)) }
}

function stripInlineComment(raw: string): string {
    if (raw.startsWith('"') || raw.startsWith("'")) {
        return raw
    }

    const hashIndex = raw.indexOf(" #")
    return hashIndex === -1 ? raw : raw.slice(0, hashIndex).trimEnd()
}

function unwrap(raw: string): string {
    if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
        const withoutQuotes = raw.slice(1, -1)
        if (raw.startsWith('"')) {
            return withoutQuotes.replace(/\\n/g, "\n").replace(/\\r/g, "\r").replace(/\\t/g, "\t")
        }
        return withoutQuotes
    }

    return raw
}
