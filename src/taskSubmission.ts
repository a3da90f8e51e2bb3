import { createHash, timingSafeEqual } from "node:crypto"
import { z } from "zod"
import { AuthenticationFailure } from "./errors.js"
import { buildTask, type Task } from "./taskTypes.js"
import type { EnqueueResult } from "./taskOrchestrator.js"

const isHttpUrl = (value: string) => /^https?:\/\//i.test(value)

const AttachmentSchema = z.object({
    name: z.string().trim().min(1),
    url: z
        .string()
        .trim()
        .refine((value) => isHttpUrl(value) || value.startsWith("data:"), "must be an http(s) URL or a data: URI"),
})

export const TaskRequestSchema = z.object({
    email: z.string().trim().email(),
    secret: z.string(),
    task: z.string().trim().min(1),
    round: z.number().int().nonnegative(),
    nonce: z.string().min(1),
    brief: z.string().nullish(),
    checks: z.array(z.string()).nullish(),
    evaluation_url: z.string().trim().url().refine(isHttpUrl, "must be an http(s) URL"),
    attachments: z.array(AttachmentSchema).nullish(),
})

export type TaskRequest = z.infer<typeof TaskRequestSchema>

export interface SubmissionIssue {
    path: string
    message: string
}

export type SubmissionResponse =
    | { status: 400; body: { error: "invalid_request"; issues: SubmissionIssue[] } }
    | { status: 401; body: { error: "unauthorized"; detail: string } }
    | {
          status: 200
          body: { status: "accepted"; task_id: string; task: string; round: number; nonce: string; duplicate: boolean }
      }

export interface SubmissionDeps {
    acceptedSecrets: readonly string[]
    enqueue(task: Task): EnqueueResult
}

function digest(value: string): Buffer {
    return createHash("sha256").update(value, "utf8").digest()
}

/**
 * Throws AuthenticationFailure unless `provided` matches one of the accepted secrets. Every
 * candidate is compared on fixed-length digests so timing does not reveal a partial match.
 */
export function verifySecret(provided: string, accepted: readonly string[]): void {
    if (accepted.length === 0) {
        throw new AuthenticationFailure("No server-side secret configured")
    }

    const providedDigest = digest(provided)
    let matched = false
    for (const candidate of accepted) {
        if (timingSafeEqual(providedDigest, digest(candidate))) {
            matched = true
        }
    }
    if (!matched) {
        throw new AuthenticationFailure("Invalid secret")
    }
}

/**
 * Validates and authenticates a submission, then hands the task to the orchestrator. The
 * pipeline runs after this returns; the response only acknowledges receipt.
 */
export function handleSubmission(body: unknown, deps: SubmissionDeps): SubmissionResponse {
    const parsed = TaskRequestSchema.safeParse(body)
    if (!parsed.success) {
        return {
            status: 400,
            body: {
                error: "invalid_request",
                issues: parsed.error.issues.map((issue) => ({
                    path: issue.path.join(".") || "(body)",
                    message: issue.message,
                })),
            },
        }
    }
    const request = parsed.data

    try {
        verifySecret(request.secret, deps.acceptedSecrets)
    } catch (error) {
        if (error instanceof AuthenticationFailure) {
            return { status: 401, body: { error: "unauthorized", detail: error.message } }
        }
        throw error
    }

    const task = buildTask({
        email: request.email,
        task: request.task,
        round: request.round,
        nonce: request.nonce,
        brief: request.brief,
        checks: request.checks,
        attachments: request.attachments,
        evaluationUrl: request.evaluation_url,
    })
    const { taskId, duplicate } = deps.enqueue(task)

    return {
        status: 200,
        body: { status: "accepted", task_id: taskId, task: task.task, round: task.round, nonce: task.nonce, duplicate },
    }
}
