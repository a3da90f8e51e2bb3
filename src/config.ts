import path from "node:path"
import { z } from "zod"
import { DEFAULT_REPO_PREFIX } from "./taskTypes.js"
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retryPolicy.js"
import { resolveDbPath } from "./db/taskStore.js"

export interface AppConfig {
    readonly port: number
    /** CORS allow-list; `*` allows every origin. */
    readonly allowOrigins: readonly string[]
    /** Shared secrets accepted on task submission. Empty means every submission is refused. */
    readonly acceptedSecrets: readonly string[]
    readonly maxConcurrentTasks: number
    readonly openai: Readonly<{ apiKey: string; model: string }>
    readonly github: Readonly<{ token: string; owner: string; branch: string; repoPrefix: string }>
    readonly timeouts: Readonly<{ generationMs: number; githubMs: number; notifyMs: number }>
    readonly retry: Readonly<{ generation: RetryPolicy; publish: RetryPolicy; notify: RetryPolicy }>
    readonly dbPath: string
    readonly logDir: string
}

export class InvalidConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join("; ")}`)
        this.name = "InvalidConfigError"
        Object.setPrototypeOf(this, InvalidConfigError.prototype)
    }
}

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value)

const requiredString = z.preprocess(blankToUndefined, z.string({ required_error: "is required" }).trim())
const optionalString = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback))
const positiveInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback))
const nonNegativeInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback))

const EnvSchema = z.object({
    OPENAI_API_KEY: requiredString,
    OPENAI_MODEL: optionalString("gpt-4.1"),
    GITHUB_TOKEN: requiredString,
    GITHUB_OWNER: requiredString,
    ACCEPTED_SECRETS: optionalString(""),
    ALLOW_ORIGINS: optionalString("*"),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(8000)),
    MAX_CONCURRENT_TASKS: positiveInt(4),
    REPO_PREFIX: optionalString(DEFAULT_REPO_PREFIX),
    DEFAULT_BRANCH: optionalString("main"),
    GENERATION_TIMEOUT_MS: positiveInt(120_000),
    GITHUB_TIMEOUT_MS: positiveInt(30_000),
    NOTIFY_TIMEOUT_MS: positiveInt(30_000),
    GENERATION_MAX_ATTEMPTS: positiveInt(3),
    PUBLISH_MAX_ATTEMPTS: positiveInt(3),
    NOTIFY_MAX_ATTEMPTS: positiveInt(6),
    RETRY_BASE_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_POLICY.baseDelayMs),
    TASKS_DB_PATH: optionalString("tasks.db"),
    LOG_DIR: optionalString("logs"),
})

/** Older variable names still honoured; the first one set wins. */
const ALIASES: Record<string, readonly string[]> = {
    GITHUB_OWNER: ["GITHUB_OWNER", "GITHUB_USERNAME"],
    ACCEPTED_SECRETS: ["ACCEPTED_SECRETS", "TDS_ACCEPTED_SECRETS", "TDS_SECRET"],
}

function firstSet(env: NodeJS.ProcessEnv, keys: readonly string[]): string | undefined {
    for (const key of keys) {
        const value = env[key]
        if (value !== undefined && value.trim() !== "") return value
    }
    return undefined
}

function splitList(value: string): string[] {
    return value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw: Record<string, string | undefined> = {}
    for (const key of Object.keys(EnvSchema.shape)) {
        raw[key] = firstSet(env, ALIASES[key] ?? [key])
    }

    const parsed = EnvSchema.safeParse(raw)
    if (!parsed.success) {
        throw new InvalidConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "(env)"}: ${issue.message}`),
        )
    }
    const vars = parsed.data

    const policy = (maxAttempts: number, jitter: number): RetryPolicy =>
        Object.freeze({ ...DEFAULT_RETRY_POLICY, maxAttempts, baseDelayMs: vars.RETRY_BASE_DELAY_MS, jitter })

    return Object.freeze({
        port: vars.PORT,
        allowOrigins: Object.freeze(splitList(vars.ALLOW_ORIGINS)),
        acceptedSecrets: Object.freeze(splitList(vars.ACCEPTED_SECRETS)),
        maxConcurrentTasks: vars.MAX_CONCURRENT_TASKS,
        openai: Object.freeze({ apiKey: vars.OPENAI_API_KEY, model: vars.OPENAI_MODEL }),
        github: Object.freeze({
            token: vars.GITHUB_TOKEN,
            owner: vars.GITHUB_OWNER,
            branch: vars.DEFAULT_BRANCH,
            repoPrefix: vars.REPO_PREFIX,
        }),
        timeouts: Object.freeze({
            generationMs: vars.GENERATION_TIMEOUT_MS,
            githubMs: vars.GITHUB_TIMEOUT_MS,
            notifyMs: vars.NOTIFY_TIMEOUT_MS,
        }),
        retry: Object.freeze({
            generation: policy(vars.GENERATION_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.jitter),
            publish: policy(vars.PUBLISH_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.jitter),
            // Callback schedule is a plain doubling: 1s, 2s, 4s, 8s, 16s.
            notify: policy(vars.NOTIFY_MAX_ATTEMPTS, 0),
        }),
        dbPath: resolveDbPath(vars.TASKS_DB_PATH),
        logDir: path.resolve(vars.LOG_DIR),
    })
}
