import {
    TASK_STATE_ORDER,
    failedOutcome,
    markNotified,
    succeededOutcome,
    type Deployment,
    type Task,
    type TaskOutcome,
    type TaskState,
} from "./taskTypes.js"
import type { GeneratedFileSet } from "./generator/fileSet.js"
import type { GenerateOptions } from "./generator/codeGenerator.js"
import type { PublishContext } from "./publisher/repositoryPublisher.js"
import type { NotifyContext, NotifyResult } from "./notifier/notifier.js"
import { GenerationError, PublishError, describeError } from "./errors.js"
import { retryWithBackoff, type RetryDecision, type RetryPolicy } from "./retryPolicy.js"
import type { TaskStore } from "./db/taskStore.js"
import { createTaskLogger, type TaskLogger } from "./taskLog.js"
import type { PipelineStep, TaskReporter } from "./taskReporter.js"
import { WorkerPool } from "./workerPool.js"

export interface TaskGenerator {
    generate(task: Task, options?: GenerateOptions): Promise<GeneratedFileSet>
}

export interface TaskPublisher {
    publish(task: Task, files: GeneratedFileSet, context?: PublishContext): Promise<Deployment>
}

export interface TaskNotifier {
    notify(outcome: TaskOutcome, evaluationUrl: string, context: NotifyContext): Promise<NotifyResult>
}

export interface TaskOrchestratorOptions {
    generator: TaskGenerator
    publisher: TaskPublisher
    notifier: TaskNotifier
    generationPolicy: RetryPolicy
    publishPolicy: RetryPolicy
    /** Global cap on tasks running at once; keeps upstream APIs within their rate limits. */
    maxConcurrentTasks: number
    store?: TaskStore | null
    reporter?: TaskReporter
    /** Directory for per-task log files; null keeps logs on the console. */
    logDir?: string | null
    echoLogs?: boolean
    sleep?: (ms: number) => Promise<void>
}

export interface EnqueueResult {
    taskId: string
    /** True when the same task was already queued or running and this call joined it. */
    duplicate: boolean
    done: Promise<TaskOutcome>
}

interface RunContext {
    task: Task
    run: number
    logger: TaskLogger
    state: TaskState
}

type StepResult<T> = { ok: true; value: T } | { ok: false; detail: string }

function classifyPublishError(error: unknown): RetryDecision {
    if (error instanceof PublishError) {
        if (error.kind === "naming-conflict") return { retryable: false }
        if (error.kind === "rate-limited") {
            return { retryable: true, rateLimited: true, retryAfterMs: error.retryAfterMs }
        }
    }
    return { retryable: true }
}

function classifyGenerationError(error: unknown): RetryDecision {
    if (error instanceof GenerationError && error.rateLimited) {
        return { retryable: true, rateLimited: true, retryAfterMs: error.retryAfterMs }
    }
    return { retryable: true }
}

function describeStepError(error: unknown, attempts: number): string {
    const kind = error instanceof GenerationError || error instanceof PublishError ? `${error.kind}: ` : ""
    const plural = attempts === 1 ? "attempt" : "attempts"
    return `${kind}${describeError(error)} (after ${attempts} ${plural})`
}

/**
 * Drives each task through received → generating → publishing → notifying → done. Tasks run
 * independently inside a bounded worker pool; the only shared state is read-only configuration
 * and the in-flight index used to join duplicate submissions.
 */
export class TaskOrchestrator {
    private readonly options: TaskOrchestratorOptions
    private readonly pool: WorkerPool
    private readonly inFlight = new Map<string, Promise<TaskOutcome>>()

    constructor(options: TaskOrchestratorOptions) {
        this.options = options
        this.pool = new WorkerPool(options.maxConcurrentTasks)
    }

    get activeTasks(): number {
        return this.inFlight.size
    }

    /**
     * Schedules a task and returns immediately. A task whose id is already queued or running is
     * not started twice: the caller gets the pending outcome of the existing run.
     */
    enqueue(task: Task): EnqueueResult {
        const existing = this.inFlight.get(task.id)
        if (existing) {
            return { taskId: task.id, duplicate: true, done: existing }
        }

        const done = this.pool
            .run(() => this.runTask(task))
            .finally(() => {
                this.inFlight.delete(task.id)
            })
        this.inFlight.set(task.id, done)
        return { taskId: task.id, duplicate: false, done }
    }

    /** Waits for every queued and running task. */
    async drain(): Promise<void> {
        await Promise.allSettled([...this.inFlight.values()])
    }

    /**
     * Runs the full pipeline for one task. Never rejects: every failure ends as a TaskOutcome.
     */
    async runTask(task: Task): Promise<TaskOutcome> {
        const run = this.options.store?.beginRun(task) ?? 0
        const logger = createTaskLogger({
            taskId: task.id,
            logDir: this.options.logDir ?? null,
            echo: this.options.echoLogs,
        })
        const ctx: RunContext = { task, run, logger, state: "received" }

        await this.report("onStart", () => this.options.reporter?.onStart?.(task, run))
        logger.info(`[orchestrator] Received ${task.task} round ${task.round} (run ${run})`)

        let outcome = await this.produceOutcome(ctx).catch((error: unknown) => this.crashedOutcome(ctx, error))
        this.options.store?.recordOutcome(run, outcome)
        await this.report("onOutcome", () => this.options.reporter?.onOutcome?.(task, run, outcome))

        await this.transition(ctx, "notifying")
        const notifyResult = await this.deliver(ctx, outcome)
        if (notifyResult.delivered) {
            outcome = markNotified(outcome)
            this.options.store?.markNotified(task.id, run)
        }
        this.options.store?.recordEvent(task.id, run, "notify", {
            delivered: notifyResult.delivered,
            attempts: notifyResult.attempts,
            error: notifyResult.lastError?.message ?? null,
        })
        await this.report("onNotify", () => this.options.reporter?.onNotify?.(task, run, notifyResult))

        await this.transition(ctx, "done")
        logger.info(`[orchestrator] Done: ${outcome.status}${outcome.notified ? "" : " (not notified)"}`)
        await logger.flush()
        return outcome
    }

    private async produceOutcome(ctx: RunContext): Promise<TaskOutcome> {
        const generated = await this.generateStep(ctx)
        if (!generated.ok) {
            return failedOutcome(ctx.task.id, "generation-failed", generated.detail)
        }

        const published = await this.publishStep(ctx, generated.value)
        if (!published.ok) {
            // The generated files are dropped; a resubmission regenerates them.
            return failedOutcome(ctx.task.id, "publish-failed", published.detail)
        }

        return succeededOutcome(ctx.task.id, published.value)
    }

    /** An unexpected throw is charged to the step the task had reached. */
    private crashedOutcome(ctx: RunContext, error: unknown): TaskOutcome {
        const detail = `Internal error: ${describeError(error)}`
        ctx.logger.error(`[orchestrator] Crashed while ${ctx.state}: ${detail}`)
        this.options.store?.recordEvent(ctx.task.id, ctx.run, "crashed", { state: ctx.state, detail })
        const kind = ctx.state === "publishing" ? "publish-failed" : "generation-failed"
        return failedOutcome(ctx.task.id, kind, detail)
    }

    private async generateStep(ctx: RunContext): Promise<StepResult<GeneratedFileSet>> {
        await this.transition(ctx, "generating")

        const result = await retryWithBackoff(
            this.options.generationPolicy,
            (attempt, previousError) => {
                ctx.logger.info(`[orchestrator] Generating (attempt ${attempt})`)
                const hint = previousError === undefined ? {} : { previousFailure: describeError(previousError) }
                return this.options.generator.generate(ctx.task, hint)
            },
            {
                classify: classifyGenerationError,
                sleep: this.options.sleep,
                onRetry: (info) => this.onRetry(ctx, "generate", info),
            },
        )

        if (!result.ok) {
            const detail = describeStepError(result.error, result.attempts)
            ctx.logger.error(`[orchestrator] Generation failed: ${detail}`)
            this.options.store?.recordEvent(ctx.task.id, ctx.run, "generation_failed", { detail })
            return { ok: false, detail }
        }

        ctx.logger.info(`[orchestrator] Generated ${result.value.size} files: ${result.value.paths.join(", ")}`)
        this.options.store?.recordEvent(ctx.task.id, ctx.run, "generated", {
            files: result.value.paths,
            attempts: result.attempts,
        })
        return { ok: true, value: result.value }
    }

    private async publishStep(ctx: RunContext, files: GeneratedFileSet): Promise<StepResult<Deployment>> {
        await this.transition(ctx, "publishing")

        const result = await retryWithBackoff(
            this.options.publishPolicy,
            (attempt) => {
                ctx.logger.info(`[orchestrator] Publishing (attempt ${attempt})`)
                return this.options.publisher.publish(ctx.task, files, { logger: ctx.logger })
            },
            {
                classify: classifyPublishError,
                sleep: this.options.sleep,
                onRetry: (info) => this.onRetry(ctx, "publish", info),
            },
        )

        if (!result.ok) {
            const detail = describeStepError(result.error, result.attempts)
            ctx.logger.error(`[orchestrator] Publish failed: ${detail}`)
            this.options.store?.recordEvent(ctx.task.id, ctx.run, "publish_failed", { detail })
            return { ok: false, detail }
        }

        this.options.store?.recordEvent(ctx.task.id, ctx.run, "published", {
            ...result.value,
            attempts: result.attempts,
        })
        return { ok: true, value: result.value }
    }

    private async deliver(ctx: RunContext, outcome: TaskOutcome): Promise<NotifyResult> {
        try {
            return await this.options.notifier.notify(outcome, ctx.task.evaluationUrl, {
                task: ctx.task,
                logger: ctx.logger,
            })
        } catch (error) {
            ctx.logger.error(`[orchestrator] Notifier raised unexpectedly: ${describeError(error)}`)
            return { delivered: false, attempts: 0 }
        }
    }

    private async onRetry(ctx: RunContext, step: PipelineStep, info: { attempt: number; delayMs: number; error: unknown }) {
        const error = describeError(info.error)
        ctx.logger.warn(`[orchestrator] ${step} attempt ${info.attempt} failed: ${error}; retrying in ${info.delayMs}ms`)
        this.options.store?.recordEvent(ctx.task.id, ctx.run, "retry", { step, attempt: info.attempt, error })
        await this.report("onRetry", () =>
            this.options.reporter?.onRetry?.(ctx.task, ctx.run, { step, attempt: info.attempt, delayMs: info.delayMs, error }),
        )
    }

    private async transition(ctx: RunContext, next: TaskState) {
        const from = TASK_STATE_ORDER.indexOf(ctx.state)
        const to = TASK_STATE_ORDER.indexOf(next)
        if (to <= from) {
            throw new Error(`Illegal task state transition ${ctx.state} -> ${next}`)
        }
        ctx.state = next
        this.options.store?.markState(ctx.task.id, ctx.run, next)
        await this.report("onStateChange", () => this.options.reporter?.onStateChange?.(ctx.task, ctx.run, next))
    }

    private async report(hook: string, fn: () => Promise<void> | void | undefined) {
        try {
            await fn()
        } catch (error) {
            console.warn(`[orchestrator] Reporter ${hook} failed:`, error)
        }
    }
}
