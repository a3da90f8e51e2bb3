export type GenerationErrorKind = "upstream-timeout" | "upstream-error" | "malformed-response"
export type PublishErrorKind = "naming-conflict" | "rate-limited" | "upstream-error" | "partial-commit"
export type NotifyErrorKind = "upstream-timeout" | "upstream-error"

/**
 * Shared shape of the pipeline's typed errors: a semantic `kind` plus the underlying cause.
 */
abstract class PipelineError<K extends string> extends Error {
    readonly kind: K

    protected constructor(name: string, kind: K, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = name
        this.kind = kind
    }
}

export class GenerationError extends PipelineError<GenerationErrorKind> {
    /** Set when the completion API refused the call for rate limiting. */
    readonly rateLimited: boolean
    readonly retryAfterMs?: number

    constructor(
        kind: GenerationErrorKind,
        message: string,
        options?: { cause?: unknown; rateLimited?: boolean; retryAfterMs?: number },
    ) {
        super("GenerationError", kind, message, options)
        this.rateLimited = options?.rateLimited ?? false
        this.retryAfterMs = options?.retryAfterMs
        Object.setPrototypeOf(this, GenerationError.prototype)
    }
}

export class PublishError extends PipelineError<PublishErrorKind> {
    /** Delay the host asked for before the next call, when it said so. */
    readonly retryAfterMs?: number

    constructor(
        kind: PublishErrorKind,
        message: string,
        options?: { cause?: unknown; retryAfterMs?: number },
    ) {
        super("PublishError", kind, message, options)
        this.retryAfterMs = options?.retryAfterMs
        Object.setPrototypeOf(this, PublishError.prototype)
    }
}

export class NotifyError extends PipelineError<NotifyErrorKind> {
    constructor(kind: NotifyErrorKind, message: string, options?: { cause?: unknown }) {
        super("NotifyError", kind, message, options)
        Object.setPrototypeOf(this, NotifyError.prototype)
    }
}

export class AuthenticationFailure extends Error {
    constructor(message: string) {
        super(message)
        this.name = "AuthenticationFailure"
        Object.setPrototypeOf(this, AuthenticationFailure.prototype)
    }
}

/**
 * Raised by the repository host adapter for any non-success HTTP status it does not
 * translate into a return value.
 */
export class RepositoryApiError extends Error {
    constructor(
        message: string,
        public readonly status: number | null,
        public readonly rateLimited: boolean,
        public readonly retryAfterMs?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options)
        this.name = "RepositoryApiError"
        Object.setPrototypeOf(this, RepositoryApiError.prototype)
    }
}

export class DeadlineExceededError extends Error {
    constructor(
        public readonly label: string,
        public readonly timeoutMs: number,
    ) {
        super(`${label} timed out after ${timeoutMs}ms`)
        this.name = "DeadlineExceededError"
        Object.setPrototypeOf(this, DeadlineExceededError.prototype)
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
