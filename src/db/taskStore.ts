import path from "node:path"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import { TASK_STATE_ORDER, type Task, type TaskOutcome, type TaskState } from "../taskTypes.js"

export interface TaskOutcomeView {
    status: TaskOutcome["status"]
    repositoryUrl: string | null
    pagesUrl: string | null
    pagesStatus: string | null
    commitSha: string | null
    errorKind: string | null
    errorDetail: string | null
    notified: boolean
    createdAt: string
}

export interface TaskRecordView {
    taskId: string
    email: string
    task: string
    round: number
    nonce: string
    run: number
    state: TaskState
    startedAt: string
    updatedAt: string
    finishedAt: string | null
    outcome: TaskOutcomeView | null
}

export interface TaskEventRecord {
    type: string
    createdAt: string
    data: unknown
}

interface TaskRunRow {
    task_id: string
    email: string
    task: string
    round: number
    nonce: string
    run_no: number
    state: string
    started_at: string
    updated_at: string
    finished_at: string | null
}

interface OutcomeRow {
    status: string
    repository_url: string | null
    pages_url: string | null
    pages_status: string | null
    commit_sha: string | null
    error_kind: string | null
    error_detail: string | null
    notified: number
    created_at: string
}

interface EventRow {
    type: string
    created_at: string
    data: string
}

export function resolveDbPath(fromConfig?: string | null): string {
    const fromEnv = fromConfig ?? process.env.TASKS_DB_PATH
    if (fromEnv?.trim()) {
        return fromEnv.trim() === ":memory:" ? ":memory:" : path.resolve(fromEnv.trim())
    }
    return path.resolve(process.cwd(), "tasks.db")
}

const isoNow = () => new Date().toISOString()
const makeId = () => `${Date.now().toString(36)}-${Math.random().toString(16).slice(2, 8)}`

function stateRank(state: string): number {
    return TASK_STATE_ORDER.findIndex((candidate) => candidate === state)
}

function toTaskState(value: string): TaskState {
    return TASK_STATE_ORDER.find((candidate) => candidate === value) ?? "received"
}

function logDbError(message: string, error: unknown) {
    console.warn(`[db] ${message}: ${error instanceof Error ? error.message : String(error)}`)
}

/**
 * SQLite record of every task run: lifecycle state, outcome and event trail. Writes never throw;
 * a failing store is logged and the pipeline carries on.
 */
export class TaskStore {
    private readonly db: Database.Database

    constructor(dbPath: string = resolveDbPath()) {
        if (dbPath !== ":memory:") {
            mkdirSync(path.dirname(dbPath), { recursive: true })
        }
        this.db = new Database(dbPath)
        this.db.pragma("journal_mode = WAL")
        this.db.pragma("foreign_keys = ON")
        this.migrate()
    }

    private migrate() {
        this.db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      task_id TEXT PRIMARY KEY,
      email TEXT NOT NULL,
      task TEXT NOT NULL,
      round INTEGER NOT NULL,
      nonce TEXT NOT NULL,
      brief TEXT NOT NULL,
      checks TEXT NOT NULL,
      evaluation_url TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS runs (
      task_id TEXT NOT NULL,
      run_no INTEGER NOT NULL,
      state TEXT NOT NULL,
      started_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      finished_at TEXT,
      PRIMARY KEY (task_id, run_no),
      FOREIGN KEY (task_id) REFERENCES tasks(task_id) ON DELETE CASCADE
    );
    CREATE TABLE IF NOT EXISTS outcomes (
      task_id TEXT NOT NULL,
      run_no INTEGER NOT NULL,
      status TEXT NOT NULL,
      repository_url TEXT,
      pages_url TEXT,
      pages_status TEXT,
      commit_sha TEXT,
      error_kind TEXT,
      error_detail TEXT,
      notified INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      PRIMARY KEY (task_id, run_no),
      FOREIGN KEY (task_id, run_no) REFERENCES runs(task_id, run_no) ON DELETE CASCADE
    );
    CREATE TABLE IF NOT EXISTS events (
      id TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      run_no INTEGER NOT NULL,
      type TEXT NOT NULL,
      created_at TEXT NOT NULL,
      data TEXT NOT NULL,
      FOREIGN KEY (task_id) REFERENCES tasks(task_id) ON DELETE CASCADE
    );
  `)
    }

    /**
     * Records the task (first submission wins for its fields) and opens a new run in state
     * `received`. Returns the run number, or 0 when the store is unavailable.
     */
    beginRun(task: Task): number {
        try {
            const now = isoNow()
            const tx = this.db.transaction(() => {
                this.db
                    .prepare(
                        `
        INSERT INTO tasks (task_id, email, task, round, nonce, brief, checks, evaluation_url, created_at, updated_at)
        VALUES (@task_id, @email, @task, @round, @nonce, @brief, @checks, @evaluation_url, @created_at, @updated_at)
        ON CONFLICT(task_id) DO UPDATE SET updated_at=excluded.updated_at
        `,
                    )
                    .run({
                        task_id: task.id,
                        email: task.email,
                        task: task.task,
                        round: task.round,
                        nonce: task.nonce,
                        brief: task.brief,
                        checks: JSON.stringify(task.checks),
                        evaluation_url: task.evaluationUrl,
                        created_at: now,
                        updated_at: now,
                    })
                const row = this.db
                    .prepare<[string], { last: number }>(
                        "SELECT COALESCE(MAX(run_no), 0) AS last FROM runs WHERE task_id = ?",
                    )
                    .get(task.id)
                const runNo = (row?.last ?? 0) + 1
                this.db
                    .prepare(
                        `INSERT INTO runs (task_id, run_no, state, started_at, updated_at)
           VALUES (@task_id, @run_no, 'received', @now, @now)`,
                    )
                    .run({ task_id: task.id, run_no: runNo, now })
                return runNo
            })
            return tx()
        } catch (error) {
            logDbError("beginRun failed", error)
            return 0
        }
    }

    /**
     * Moves a run forward. Backward or repeated transitions are ignored and reported as false.
     */
    markState(taskId: string, runNo: number, state: TaskState): boolean {
        try {
            const row = this.db
                .prepare<[string, number], { state: string }>("SELECT state FROM runs WHERE task_id = ? AND run_no = ?")
                .get(taskId, runNo)
            if (!row) return false
            if (stateRank(state) <= stateRank(row.state)) return false

            const now = isoNow()
            this.db
                .prepare(
                    `UPDATE runs SET state=@state, updated_at=@now, finished_at=CASE WHEN @state = 'done' THEN @now ELSE finished_at END
           WHERE task_id=@task_id AND run_no=@run_no`,
                )
                .run({ task_id: taskId, run_no: runNo, state, now })
            return true
        } catch (error) {
            logDbError("markState failed", error)
            return false
        }
    }

    recordEvent(taskId: string, runNo: number, type: string, data: unknown) {
        try {
            this.db
                .prepare(
                    `INSERT INTO events (id, task_id, run_no, type, created_at, data)
           VALUES (@id, @task_id, @run_no, @type, @created_at, @data)`,
                )
                .run({
                    id: makeId(),
                    task_id: taskId,
                    run_no: runNo,
                    type,
                    created_at: isoNow(),
                    data: JSON.stringify(data ?? null),
                })
        } catch (error) {
            logDbError("recordEvent failed", error)
        }
    }

    recordOutcome(runNo: number, outcome: TaskOutcome) {
        try {
            const deployment = outcome.status === "succeeded" ? outcome.deployment : null
            this.db
                .prepare(
                    `
        INSERT INTO outcomes (task_id, run_no, status, repository_url, pages_url, pages_status, commit_sha, error_kind, error_detail, notified, created_at)
        VALUES (@task_id, @run_no, @status, @repository_url, @pages_url, @pages_status, @commit_sha, @error_kind, @error_detail, @notified, @created_at)
        ON CONFLICT(task_id, run_no) DO NOTHING
        `,
                )
                .run({
                    task_id: outcome.taskId,
                    run_no: runNo,
                    status: outcome.status,
                    repository_url: deployment?.repositoryUrl ?? null,
                    pages_url: deployment?.pagesUrl ?? null,
                    pages_status: deployment?.pagesStatus ?? null,
                    commit_sha: deployment?.commitSha ?? null,
                    error_kind: outcome.status === "failed" ? outcome.errorKind : null,
                    error_detail: outcome.status === "failed" ? outcome.errorDetail : null,
                    notified: outcome.notified ? 1 : 0,
                    created_at: isoNow(),
                })
        } catch (error) {
            logDbError("recordOutcome failed", error)
        }
    }

    /** The one field of a stored outcome that may change. */
    markNotified(taskId: string, runNo: number) {
        try {
            this.db
                .prepare("UPDATE outcomes SET notified = 1 WHERE task_id = ? AND run_no = ?")
                .run(taskId, runNo)
        } catch (error) {
            logDbError("markNotified failed", error)
        }
    }

    /** Latest run of a task with its outcome, or null when the task is unknown. */
    readTask(taskId: string): TaskRecordView | null {
        const run = this.db
            .prepare<[string], TaskRunRow>(
                `
      SELECT t.task_id, t.email, t.task, t.round, t.nonce, r.run_no, r.state, r.started_at, r.updated_at, r.finished_at
      FROM tasks t JOIN runs r ON r.task_id = t.task_id
      WHERE t.task_id = ?
      ORDER BY r.run_no DESC
      LIMIT 1
      `,
            )
            .get(taskId)
        if (!run) return null

        const outcome = this.db
            .prepare<[string, number], OutcomeRow>(
                `SELECT status, repository_url, pages_url, pages_status, commit_sha, error_kind, error_detail, notified, created_at
         FROM outcomes WHERE task_id = ? AND run_no = ?`,
            )
            .get(taskId, run.run_no)

        return {
            taskId: run.task_id,
            email: run.email,
            task: run.task,
            round: run.round,
            nonce: run.nonce,
            run: run.run_no,
            state: toTaskState(run.state),
            startedAt: run.started_at,
            updatedAt: run.updated_at,
            finishedAt: run.finished_at,
            outcome: outcome
                ? {
                      status: outcome.status === "succeeded" ? "succeeded" : "failed",
                      repositoryUrl: outcome.repository_url,
                      pagesUrl: outcome.pages_url,
                      pagesStatus: outcome.pages_status,
                      commitSha: outcome.commit_sha,
                      errorKind: outcome.error_kind,
                      errorDetail: outcome.error_detail,
                      notified: outcome.notified === 1,
                      createdAt: outcome.created_at,
                  }
                : null,
        }
    }

    readEvents(taskId: string, runNo: number): TaskEventRecord[] {
        const rows = this.db
            .prepare<[string, number], EventRow>(
                "SELECT type, created_at, data FROM events WHERE task_id = ? AND run_no = ? ORDER BY rowid",
            )
            .all(taskId, runNo)
        return rows.map((row) => ({ type: row.type, createdAt: row.created_at, data: JSON.parse(row.data) }))
    }

    close() {
        this.db.close()
    }
}
