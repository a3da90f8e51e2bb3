import express, { type ErrorRequestHandler, type RequestHandler } from "express"
import type { TaskStore } from "./db/taskStore.js"
import { describeError } from "./errors.js"
import { handleSubmission, type SubmissionDeps } from "./taskSubmission.js"

export const SERVICE_NAME = "llm-app-deployer"
export const SERVICE_VERSION = "1.0.0"

export interface AppDeps extends SubmissionDeps {
    allowOrigins: readonly string[]
    store: Pick<TaskStore, "readTask"> | null
}

/**
 * Value for Access-Control-Allow-Origin, or null when the origin is not allowed.
 */
export function resolveCorsOrigin(origin: string | undefined, allowOrigins: readonly string[]): string | null {
    if (allowOrigins.includes("*")) return "*"
    if (origin && allowOrigins.includes(origin)) return origin
    return null
}

function cors(allowOrigins: readonly string[]): RequestHandler {
    return (req, res, next) => {
        const allowed = resolveCorsOrigin(req.headers.origin, allowOrigins)
        if (allowed) {
            res.setHeader("Access-Control-Allow-Origin", allowed)
            if (allowed !== "*") res.setHeader("Vary", "Origin")
            res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS")
            res.setHeader("Access-Control-Allow-Headers", "Content-Type")
        }
        if (req.method === "OPTIONS") {
            res.sendStatus(204)
            return
        }
        next()
    }
}

/** The 4xx status a body-parser error carries (413 too large, 415 bad encoding, ...). */
function clientErrorStatus(error: unknown): number | null {
    if (typeof error !== "object" || error === null || !("status" in error)) return null
    const status = error.status
    return typeof status === "number" && status >= 400 && status < 500 ? status : null
}

const jsonErrors: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
        next(error)
        return
    }
    if (error instanceof SyntaxError) {
        res.status(400).json({ error: "invalid_request", issues: [{ path: "(body)", message: "Malformed JSON" }] })
        return
    }
    const status = clientErrorStatus(error)
    if (status !== null) {
        res.status(status).json({ error: "invalid_request", issues: [{ path: "(body)", message: describeError(error) }] })
        return
    }
    console.error("[server] Request failed:", error)
    res.status(500).json({ error: "internal_error" })
}

export function createApp(deps: AppDeps) {
    const app = express()
    app.disable("x-powered-by")
    app.use(cors(deps.allowOrigins))
    app.use(express.json({ limit: "10mb" }))

    app.get("/", (_req, res) => {
        res.json({ status: "ok", service: SERVICE_NAME, version: SERVICE_VERSION })
    })

    app.post("/tasks", (req, res) => {
        const response = handleSubmission(req.body, deps)
        if (response.status === 200) {
            console.log(`[server] Accepted ${response.body.task} round ${response.body.round} as ${response.body.task_id}`)
        }
        res.status(response.status).json(response.body)
    })

    app.get("/tasks/:id", (req, res) => {
        const record = deps.store?.readTask(req.params.id) ?? null
        if (!record) {
            res.status(404).json({ error: "not_found" })
            return
        }
        res.json(record)
    })

    app.use(jsonErrors)
    return app
}
