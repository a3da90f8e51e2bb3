import fs from "node:fs/promises";
import path from "node:path";
import type { Task, TaskOutcome, TaskState } from "./taskTypes.js";
import type { NotifyResult } from "./notifier/notifier.js";

export type PipelineStep = "generate" | "publish";

export interface RetryInfo {
  step: PipelineStep;
  attempt: number;
  delayMs: number;
  error: string;
}

/**
 * Lifecycle hooks for a task run (logging, live feed, metrics). Hooks must not throw; the
 * orchestrator logs and ignores failures.
 */
export interface TaskReporter {
  onStart?(task: Task, run: number): Promise<void> | void;
  onStateChange?(task: Task, run: number, state: TaskState): Promise<void> | void;
  onRetry?(task: Task, run: number, info: RetryInfo): Promise<void> | void;
  onOutcome?(task: Task, run: number, outcome: TaskOutcome): Promise<void> | void;
  onNotify?(task: Task, run: number, result: NotifyResult): Promise<void> | void;
}

export function combineReporters(...reporters: TaskReporter[]): TaskReporter {
  return {
    async onStart(task, run) {
      for (const r of reporters) await r.onStart?.(task, run);
    },
    async onStateChange(task, run, state) {
      for (const r of reporters) await r.onStateChange?.(task, run, state);
    },
    async onRetry(task, run, info) {
      for (const r of reporters) await r.onRetry?.(task, run, info);
    },
    async onOutcome(task, run, outcome) {
      for (const r of reporters) await r.onOutcome?.(task, run, outcome);
    },
    async onNotify(task, run, result) {
      for (const r of reporters) await r.onNotify?.(task, run, result);
    },
  };
}

export class ConsoleTaskReporter implements TaskReporter {
  private readonly logFilePath: string | null;

  constructor(options: { logFilePath?: string | null } = {}) {
    this.logFilePath =
      options.logFilePath === undefined ? path.resolve(process.cwd(), "deployer.log") : options.logFilePath;
  }

  private taskLabel(task: Task, run: number) {
    return `${task.task}#${task.round}:${task.id} run ${run}`;
  }

  private async emit(message: string) {
    console.log(message);

    if (!this.logFilePath) return;

    const timestamp = new Date().toISOString();
    try {
      await fs.appendFile(this.logFilePath, `[${timestamp}] ${message}\n`);
    } catch (error) {
      console.warn("[deployer] Failed to write deployer log:", error);
    }
  }

  async onStart(task: Task, run: number) {
    await this.emit(`[deployer] Starting ${this.taskLabel(task, run)} for ${task.email}`);
  }

  async onStateChange(task: Task, run: number, state: TaskState) {
    await this.emit(`[deployer] ${this.taskLabel(task, run)} -> ${state}`);
  }

  async onRetry(task: Task, run: number, info: RetryInfo) {
    await this.emit(
      `[deployer] ${this.taskLabel(task, run)} ${info.step} attempt ${info.attempt} failed (${info.error}); retrying in ${info.delayMs}ms`,
    );
  }

  async onOutcome(task: Task, run: number, outcome: TaskOutcome) {
    if (outcome.status === "succeeded") {
      await this.emit(
        `[deployer] ✅ ${this.taskLabel(task, run)} deployed ${outcome.deployment.pagesUrl} (pages ${outcome.deployment.pagesStatus})`,
      );
    } else {
      await this.emit(`[deployer] ❌ ${this.taskLabel(task, run)} ${outcome.errorKind}: ${outcome.errorDetail}`);
    }
  }

  async onNotify(task: Task, run: number, result: NotifyResult) {
    await this.emit(
      result.delivered
        ? `[deployer] Notified ${task.evaluationUrl} for ${this.taskLabel(task, run)}`
        : `[deployer] ⚠️ Could not notify ${task.evaluationUrl} for ${this.taskLabel(task, run)} after ${result.attempts} attempts`,
    );
  }
}
