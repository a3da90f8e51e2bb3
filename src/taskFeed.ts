import type { Server } from "node:http"
import { WebSocketServer, type WebSocket } from "ws"
import type { Task, TaskOutcome, TaskState } from "./taskTypes.js"
import type { NotifyResult } from "./notifier/notifier.js"
import type { RetryInfo, TaskReporter } from "./taskReporter.js"

export type TaskEvent =
    | { kind: "started"; taskId: string; run: number; at: string; task: string; round: number }
    | { kind: "state"; taskId: string; run: number; at: string; state: TaskState }
    | ({ kind: "retry"; taskId: string; run: number; at: string } & RetryInfo)
    | { kind: "outcome"; taskId: string; run: number; at: string; outcome: TaskOutcome }
    | { kind: "notify"; taskId: string; run: number; at: string; delivered: boolean; attempts: number }

type Listener = (event: TaskEvent) => void

const RECENT_LIMIT = 50

/**
 * Live lifecycle feed. Acts as a TaskReporter and fans every event out to in-process listeners
 * and to WebSocket clients connected on `/ws`.
 */
export class TaskFeed implements TaskReporter {
    private readonly listeners = new Set<Listener>()
    private readonly recent: TaskEvent[] = []
    private wss: WebSocketServer | null = null

    constructor(private readonly now: () => Date = () => new Date()) {}

    attach(server: Server, path = "/ws") {
        const wss = new WebSocketServer({ server, path })
        wss.on("connection", (socket) => {
            this.send(socket, JSON.stringify({ type: "snapshot", events: this.recent }))
        })
        this.wss = wss
    }

    subscribe(listener: Listener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    get recentEvents(): readonly TaskEvent[] {
        return this.recent
    }

    onStart(task: Task, run: number) {
        this.publish({ kind: "started", taskId: task.id, run, at: this.stamp(), task: task.task, round: task.round })
    }

    onStateChange(task: Task, run: number, state: TaskState) {
        this.publish({ kind: "state", taskId: task.id, run, at: this.stamp(), state })
    }

    onRetry(task: Task, run: number, info: RetryInfo) {
        this.publish({ kind: "retry", taskId: task.id, run, at: this.stamp(), ...info })
    }

    onOutcome(task: Task, run: number, outcome: TaskOutcome) {
        this.publish({ kind: "outcome", taskId: task.id, run, at: this.stamp(), outcome })
    }

    onNotify(task: Task, run: number, result: NotifyResult) {
        this.publish({
            kind: "notify",
            taskId: task.id,
            run,
            at: this.stamp(),
            delivered: result.delivered,
            attempts: result.attempts,
        })
    }

    close(): Promise<void> {
        const wss = this.wss
        this.wss = null
        if (!wss) return Promise.resolve()
        for (const client of wss.clients) client.terminate()
        return new Promise((resolve, reject) => wss.close((error) => (error ? reject(error) : resolve())))
    }

    private stamp() {
        return this.now().toISOString()
    }

    private publish(event: TaskEvent) {
        this.recent.push(event)
        if (this.recent.length > RECENT_LIMIT) this.recent.shift()

        for (const listener of this.listeners) {
            try {
                listener(event)
            } catch (error) {
                console.warn("[feed] Listener failed:", error)
            }
        }

        if (!this.wss) return
        const payload = JSON.stringify({ type: "task_event", event })
        for (const client of this.wss.clients) {
            this.send(client, payload)
        }
    }

    private send(socket: WebSocket, payload: string) {
        if (socket.readyState !== socket.OPEN) return
        socket.send(payload, (error) => {
            if (error) console.warn("[feed] Failed to push event:", error.message)
        })
    }
}
