import { DeadlineExceededError } from "./errors.js"

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. The returned promise settles no
 * later than the deadline even if `fn` ignores the signal.
 */
export async function withDeadline<T>(
    timeoutMs: number,
    label: string,
    fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined

    const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            const error = new DeadlineExceededError(label, timeoutMs)
            reject(error)
            controller.abort(error)
        }, timeoutMs)
    })

    try {
        return await Promise.race([fn(controller.signal), expired])
    } finally {
        clearTimeout(timer)
    }
}

/**
 * `fetch` wrapper that bounds every request by `timeoutMs`, chaining any signal the caller passed.
 */
export function deadlineFetch(timeoutMs: number, baseFetch: typeof fetch = fetch): typeof fetch {
    return (input, init) =>
        withDeadline(timeoutMs, `fetch ${describeTarget(input)}`, (signal) => {
            const callerSignal = init?.signal
            const combined = callerSignal ? AbortSignal.any([callerSignal, signal]) : signal
            return baseFetch(input, { ...init, signal: combined })
        })
}

function describeTarget(input: Parameters<typeof fetch>[0]): string {
    if (typeof input === "string") return input
    if (input instanceof URL) return input.toString()
    return input.url
}
