import type { Task, TaskOutcome } from "../taskTypes.js"
import { withDeadline } from "../deadline.js"
import { DeadlineExceededError, NotifyError, describeError } from "../errors.js"
import { retryWithBackoff, type RetryPolicy } from "../retryPolicy.js"
import type { TaskLogger } from "../taskLog.js"

const RESPONSE_SNIPPET_LIMIT = 200

export interface NotifyResult {
    delivered: boolean
    attempts: number
    lastError?: NotifyError
}

export interface NotifierOptions {
    policy: RetryPolicy
    /** Upper bound for each callback POST. */
    timeoutMs: number
    fetchFn?: typeof fetch
    sleep?: (ms: number) => Promise<void>
}

export interface NotifyContext {
    task: Task
    logger?: TaskLogger
}

export interface CallbackPayload {
    email: string
    task: string
    round: number
    nonce: string
    task_id: string
    status: TaskOutcome["status"]
    repo_url: string | null
    commit_sha: string | null
    pages_url: string | null
    pages_status: string | null
    error_kind: string | null
    error_detail: string | null
}

export function buildCallbackPayload(task: Task, outcome: TaskOutcome): CallbackPayload {
    const base = {
        email: task.email,
        task: task.task,
        round: task.round,
        nonce: task.nonce,
        task_id: outcome.taskId,
        status: outcome.status,
    }

    if (outcome.status === "succeeded") {
        return {
            ...base,
            repo_url: outcome.deployment.repositoryUrl,
            commit_sha: outcome.deployment.commitSha,
            pages_url: outcome.deployment.pagesUrl,
            pages_status: outcome.deployment.pagesStatus,
            error_kind: null,
            error_detail: null,
        }
    }

    return {
        ...base,
        repo_url: null,
        commit_sha: null,
        pages_url: null,
        pages_status: null,
        error_kind: outcome.errorKind,
        error_detail: outcome.errorDetail,
    }
}

function toNotifyError(error: unknown): NotifyError {
    if (error instanceof NotifyError) return error
    if (error instanceof DeadlineExceededError) {
        return new NotifyError("upstream-timeout", error.message, { cause: error })
    }
    return new NotifyError("upstream-error", `Callback request failed: ${describeError(error)}`, { cause: error })
}

/**
 * Delivers outcomes to the caller's evaluation URL. Has its own retry budget; a failed delivery
 * is reported in the result, never thrown.
 */
export class Notifier {
    private readonly policy: RetryPolicy
    private readonly timeoutMs: number
    private readonly fetchFn: typeof fetch
    private readonly sleep?: (ms: number) => Promise<void>

    constructor(options: NotifierOptions) {
        this.policy = options.policy
        this.timeoutMs = options.timeoutMs
        this.fetchFn = options.fetchFn ?? fetch
        this.sleep = options.sleep
    }

    async notify(outcome: TaskOutcome, evaluationUrl: string, context: NotifyContext): Promise<NotifyResult> {
        const body = JSON.stringify(buildCallbackPayload(context.task, outcome))
        const logger = context.logger

        const result = await retryWithBackoff(
            this.policy,
            async (attempt) => {
                try {
                    await this.postOnce(evaluationUrl, body)
                } catch (error) {
                    throw toNotifyError(error)
                }
                logger?.info(`[notifier] Delivered ${outcome.status} outcome to ${evaluationUrl} (attempt ${attempt})`)
            },
            {
                sleep: this.sleep,
                onRetry: ({ attempt, delayMs, error }) => {
                    logger?.warn(
                        `[notifier] Attempt ${attempt} to ${evaluationUrl} failed: ${describeError(error)}; retrying in ${delayMs}ms`,
                    )
                },
            },
        )

        if (result.ok) {
            return { delivered: true, attempts: result.attempts }
        }

        const lastError = toNotifyError(result.error)
        logger?.error(
            `[notifier] Giving up on ${evaluationUrl} after ${result.attempts} attempts: ${lastError.message}`,
        )
        return { delivered: false, attempts: result.attempts, lastError }
    }

    private async postOnce(url: string, body: string): Promise<void> {
        await withDeadline(this.timeoutMs, `callback POST ${url}`, async (signal) => {
            const response = await this.fetchFn(url, {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body,
                signal,
            })
            const text = await response.text()
            if (!response.ok) {
                const snippet = text.length > RESPONSE_SNIPPET_LIMIT ? `${text.slice(0, RESPONSE_SNIPPET_LIMIT)}…` : text
                throw new NotifyError(
                    "upstream-error",
                    `Callback responded with status ${response.status}${snippet ? `: ${snippet}` : ""}`,
                )
            }
        })
    }
}
