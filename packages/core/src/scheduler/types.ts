import type { CoreError } from "../errors/catalog.js";

export interface ScheduledTaskDefinition {
  id: string;
  intervalSeconds: number;
  /** Default: true */
  enabled?: boolean;
  /** Upper bound for one run. Default: 30 */
  timeoutSeconds?: number;
  /** Run once right away instead of waiting a full interval. */
  immediate?: boolean;
}

/** One unit of recurring work. Must honour `signal` to be stoppable. */
export type TaskFn = (signal: AbortSignal) => Promise<void>;

/** Credential or lease renewal. Rejects when the renewal failed. */
export type RenewFunc = TaskFn;

export type TaskState = "idle" | "running" | "disabled";

export interface ScheduledTaskInfo {
  id: string;
  intervalSeconds: number;
  timeoutSeconds: number;
  enabled: boolean;
  state: TaskState;
  lastRunAt: Date | null;
  lastError: string | null;
  nextDueAt: Date | null;
  runCount: number;
  failureCount: number;
  consecutiveFailures: number;
}

export type TaskRunOutcome =
  | { ok: true; id: string; durationMs: number }
  | { ok: false; id: string; error: CoreError; durationMs: number };

export interface TaskRunnerEvents {
  "task-succeeded": [id: string];
  "task-failed": [id: string, error: CoreError];
}
