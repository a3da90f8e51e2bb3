import path from "node:path"
import { mkdir, appendFile } from "node:fs/promises"

export interface TaskLogger {
    info(message: string): void
    warn(message: string): void
    error(message: string): void
    /** Resolves once every line written so far has reached the log file. */
    flush(): Promise<void>
}

export interface TaskLoggerOptions {
    taskId: string
    /** Directory for `<taskId>.log`; null keeps the log on the console only. */
    logDir: string | null
    /** Echo lines to the console (default true). */
    echo?: boolean
}

type Level = "info" | "warn" | "error"

function formatTimestamp(date: Date = new Date()): string {
    const pad = (value: number) => value.toString().padStart(2, "0")
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(
        date.getHours(),
    )}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function resolveTaskLogPath(logDir: string, taskId: string): string {
    return path.resolve(logDir, `${taskId}.log`)
}

export function createTaskLogger(options: TaskLoggerOptions): TaskLogger {
    const filePath = options.logDir ? resolveTaskLogPath(options.logDir, options.taskId) : null
    const echo = options.echo ?? true
    const prefix = `[task ${options.taskId}]`
    let ready = false
    let pending: Promise<void> = Promise.resolve()

    const writeLine = async (line: string) => {
        if (!filePath) return
        if (!ready) {
            await mkdir(path.dirname(filePath), { recursive: true })
            ready = true
        }
        await appendFile(filePath, `${line}\n`)
    }

    const emit = (level: Level, message: string) => {
        if (echo) {
            const line = `${prefix} ${message}`
            if (level === "error") console.error(line)
            else if (level === "warn") console.warn(line)
            else console.log(line)
        }
        if (!filePath) return
        const line = `${formatTimestamp()} ${level.toUpperCase()} ${message}`
        pending = pending
            .then(() => writeLine(line))
            .catch((error) => {
                console.warn(`${prefix} Failed to write task log ${filePath}:`, error)
            })
    }

    return {
        info: (message) => emit("info", message),
        warn: (message) => emit("warn", message),
        error: (message) => emit("error", message),
        flush: () => pending,
    }
}
