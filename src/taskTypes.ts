import { createHash } from "node:crypto";

export interface TaskAttachment {
  name: string;
  /**
   * http(s) URL or a data: URI carrying the attachment inline.
   */
  url: string;
}

/**
 * One accepted request to generate and deploy an application. Frozen once built; retries
 * always see this exact value.
 */
export interface Task {
  /**
   * Idempotency key derived from (email, round, nonce).
   */
  readonly id: string;
  readonly email: string;
  /**
   * Caller's task label (e.g. "captcha-solver"), used for repository naming.
   */
  readonly task: string;
  readonly round: number;
  readonly nonce: string;
  readonly brief: string;
  readonly checks: readonly string[];
  readonly attachments: readonly Readonly<TaskAttachment>[];
  readonly evaluationUrl: string;
}

export type PagesStatus = "pending" | "live" | "unknown";

export interface Deployment {
  readonly repositoryName: string;
  readonly repositoryUrl: string;
  readonly pagesUrl: string;
  readonly commitSha: string;
  readonly pagesStatus: PagesStatus;
}

export type OutcomeErrorKind = "generation-failed" | "publish-failed";

export type TaskOutcome =
  | {
      readonly taskId: string;
      readonly status: "succeeded";
      readonly deployment: Deployment;
      readonly notified: boolean;
    }
  | {
      readonly taskId: string;
      readonly status: "failed";
      readonly errorKind: OutcomeErrorKind;
      readonly errorDetail: string;
      readonly notified: boolean;
    };

export type TaskState = "received" | "generating" | "publishing" | "notifying" | "done";

export const TASK_STATE_ORDER: readonly TaskState[] = [
  "received",
  "generating",
  "publishing",
  "notifying",
  "done",
];

export const DEFAULT_REPO_PREFIX = "llm-app";
const MAX_REPO_NAME_LENGTH = 100;

export function deriveTaskId(email: string, round: number, nonce: string): string {
  return createHash("sha256")
    .update(`${email.trim().toLowerCase()}\n${round}\n${nonce}`)
    .digest("hex")
    .slice(0, 16);
}

function slugify(value: string, fallback: string): string {
  const cleaned = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return cleaned || fallback;
}

/**
 * Repository name for a task. Depends only on the task identity, so every attempt for the same
 * task targets the same repository.
 */
export function deriveRepositoryName(task: Pick<Task, "id" | "task" | "round">, prefix = DEFAULT_REPO_PREFIX): string {
  const safePrefix = slugify(prefix, DEFAULT_REPO_PREFIX);
  const suffix = `-r${task.round}-${task.id.slice(0, 8)}`;
  const room = MAX_REPO_NAME_LENGTH - safePrefix.length - suffix.length - 1;
  const slug = slugify(task.task, "app").slice(0, Math.max(room, 1)).replace(/-+$/g, "") || "app";
  return `${safePrefix}-${slug}${suffix}`;
}

export function buildTask(input: {
  email: string;
  task: string;
  round: number;
  nonce: string;
  brief?: string | null;
  checks?: readonly string[] | null;
  attachments?: readonly TaskAttachment[] | null;
  evaluationUrl: string;
}): Task {
  const attachments = (input.attachments ?? []).map((a) => Object.freeze({ name: a.name, url: a.url }));
  return Object.freeze({
    id: deriveTaskId(input.email, input.round, input.nonce),
    email: input.email.trim(),
    task: input.task,
    round: input.round,
    nonce: input.nonce,
    brief: input.brief ?? "",
    checks: Object.freeze([...(input.checks ?? [])]),
    attachments: Object.freeze(attachments),
    evaluationUrl: input.evaluationUrl,
  });
}

export function succeededOutcome(taskId: string, deployment: Deployment): TaskOutcome {
  return Object.freeze({ taskId, status: "succeeded", deployment: Object.freeze({ ...deployment }), notified: false });
}

export function failedOutcome(taskId: string, errorKind: OutcomeErrorKind, errorDetail: string): TaskOutcome {
  return Object.freeze({ taskId, status: "failed", errorKind, errorDetail, notified: false });
}

/**
 * The only change an outcome may go through after creation.
 */
export function markNotified(outcome: TaskOutcome): TaskOutcome {
  return Object.freeze({ ...outcome, notified: true });
}
