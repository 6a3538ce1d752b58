/**
 * Independent periodic tasks (token renewal, lease renewal, status polling).
 *
 * Every task owns its timer. A run never overlaps the previous run of the
 * same task, and the next run is armed one interval after a run finishes,
 * whatever its outcome. A failing task records the failure and keeps its
 * schedule; it never touches another task's timer.
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  CancellationRequestedError,
  DuplicateTaskError,
  OperationTimeoutError,
  errorMessage,
  toTransportError,
} from "../errors/catalog.js";
import { componentLogger } from "../logger/index.js";
import { MAX_TIMER_MS, createDeadline, raceSignal } from "../signals/deadline.js";
import type {
  ScheduledTaskDefinition,
  ScheduledTaskInfo,
  TaskFn,
  TaskRunOutcome,
  TaskRunnerEvents,
} from "./types.js";

export interface ScheduledTaskRunnerOptions {
  logger: Logger;
  /** Register tasks without arming them until start(). Default: false */
  startPaused?: boolean;
}

interface Task {
  id: string;
  intervalMs: number;
  timeoutMs: number;
  enabled: boolean;
  fn: TaskFn;
  immediate: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  nextDueAt: number | null;
  running: Promise<TaskRunOutcome> | null;
  lastRunAt: number | null;
  lastError: string | null;
  runCount: number;
  failureCount: number;
  consecutiveFailures: number;
}

const DEFAULT_TIMEOUT_SECONDS = 30;

export class ScheduledTaskRunner extends EventEmitter<TaskRunnerEvents> {
  private readonly tasks = new Map<string, Task>();
  private readonly logger: Logger;
  private readonly stopController = new AbortController();
  private stopped = false;
  private paused: boolean;

  constructor(options: ScheduledTaskRunnerOptions) {
    super();
    this.logger = componentLogger(options.logger, "task-runner");
    this.paused = options.startPaused ?? false;
  }

  /** Arm every enabled task registered while paused. */
  start(): void {
    if (!this.paused || this.stopped) return;
    this.paused = false;
    for (const task of this.tasks.values()) {
      if (task.enabled && !task.running) this.begin(task);
    }
  }

  /** Register a recurring unit of work. Throws on a duplicate id. */
  schedule(definition: ScheduledTaskDefinition, fn: TaskFn): void {
    if (this.stopped) {
      throw new Error("Task runner is stopped");
    }
    if (this.tasks.has(definition.id)) {
      throw new DuplicateTaskError({ id: definition.id });
    }

    const task: Task = {
      id: definition.id,
      intervalMs: definition.intervalSeconds * 1000,
      timeoutMs: (definition.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
      enabled: definition.enabled ?? true,
      fn,
      immediate: definition.immediate ?? false,
      timer: null,
      nextDueAt: null,
      running: null,
      lastRunAt: null,
      lastError: null,
      runCount: 0,
      failureCount: 0,
      consecutiveFailures: 0,
    };
    this.tasks.set(task.id, task);

    this.logger.debug(
      { task: task.id, intervalMs: task.intervalMs, enabled: task.enabled },
      "Task scheduled",
    );

    if (task.enabled && !this.paused) this.begin(task);
  }

  /** Remove a task. A run in progress finishes but is not rescheduled. */
  unschedule(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    this.clearTimer(task);
    this.tasks.delete(id);
    return true;
  }

  /**
   * Enable or disable a task. Disabling drops the pending firing (a run in
   * progress continues) and keeps the history; enabling arms the next run
   * one interval from now. Returns false for an unknown id.
   */
  setEnabled(id: string, enabled: boolean): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    if (task.enabled === enabled) return true;

    task.enabled = enabled;
    if (enabled) {
      if (!task.running && !this.stopped && !this.paused) this.arm(task);
    } else {
      this.clearTimer(task);
    }

    this.logger.info({ task: id, enabled }, "Task toggled");
    return true;
  }

  /**
   * Run a task now, ignoring its schedule and enabled flag. Joins a run
   * already in progress. Resolves undefined for an unknown id.
   */
  async trigger(id: string): Promise<TaskRunOutcome | undefined> {
    const task = this.tasks.get(id);
    if (!task || this.stopped) return undefined;
    if (task.running) return task.running;

    this.clearTimer(task);
    return this.execute(task);
  }

  getTask(id: string): ScheduledTaskInfo | undefined {
    const task = this.tasks.get(id);
    return task ? this.info(task) : undefined;
  }

  listTasks(): ScheduledTaskInfo[] {
    return [...this.tasks.values()].map((task) => this.info(task));
  }

  /** Cancel every timer and running execution, then wait for them to settle. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    const running: Promise<TaskRunOutcome>[] = [];
    for (const task of this.tasks.values()) {
      this.clearTimer(task);
      if (task.running) running.push(task.running);
    }

    this.stopController.abort(new CancellationRequestedError({ reason: "stop" }));
    await Promise.all(running);
    this.logger.debug({ tasks: this.tasks.size }, "Task runner stopped");
  }

  private execute(task: Task): Promise<TaskRunOutcome> {
    const run = this.runOnce(task);
    task.running = run;
    return run;
  }

  private async runOnce(task: Task): Promise<TaskRunOutcome> {
    const deadline = createDeadline(
      task.timeoutMs,
      () => new OperationTimeoutError({ task: task.id, timeoutMs: task.timeoutMs }),
      this.stopController.signal,
    );
    const startedAt = Date.now();
    task.lastRunAt = startedAt;

    let outcome: TaskRunOutcome;
    try {
      await raceSignal(
        Promise.resolve().then(() => task.fn(deadline.signal)),
        deadline.signal,
      );
      outcome = { ok: true, id: task.id, durationMs: Date.now() - startedAt };
    } catch (err) {
      outcome = {
        ok: false,
        id: task.id,
        error: toTransportError(err),
        durationMs: Date.now() - startedAt,
      };
    } finally {
      deadline.dispose();
      task.runCount++;
      task.running = null;
    }

    // Aborted by stop(): not a task failure
    if (this.stopped) return outcome;

    if (outcome.ok) {
      task.lastError = null;
      task.consecutiveFailures = 0;
      this.logger.debug({ task: task.id }, "Task run succeeded");
    } else {
      task.lastError = errorMessage(outcome.error);
      task.failureCount++;
      task.consecutiveFailures++;
      this.logger.warn(
        {
          task: task.id,
          error: outcome.error.message,
          consecutiveFailures: task.consecutiveFailures,
        },
        "Task run failed",
      );
    }

    if (!this.paused && task.enabled && this.tasks.get(task.id) === task) {
      this.arm(task);
    }
    this.notify(outcome);
    return outcome;
  }

  /** Listener errors are logged; they never affect the task's schedule. */
  private notify(outcome: TaskRunOutcome): void {
    try {
      if (outcome.ok) {
        this.emit("task-succeeded", outcome.id);
      } else {
        this.emit("task-failed", outcome.id, outcome.error);
      }
    } catch (err) {
      this.logger.error(
        { task: outcome.id, error: errorMessage(err) },
        "Task listener threw",
      );
    }
  }

  private begin(task: Task): void {
    if (task.immediate) {
      this.detach(task);
    } else {
      this.arm(task);
    }
  }

  private detach(task: Task): void {
    this.execute(task).catch((err: unknown) => {
      this.logger.error(
        { task: task.id, error: errorMessage(err) },
        "Task run aborted unexpectedly",
      );
    });
  }

  private arm(task: Task): void {
    this.clearTimer(task);
    const delayMs = Math.min(task.intervalMs, MAX_TIMER_MS);
    task.nextDueAt = Date.now() + delayMs;
    task.timer = setTimeout(() => {
      task.timer = null;
      task.nextDueAt = null;
      this.detach(task);
    }, delayMs);
  }

  private clearTimer(task: Task): void {
    if (task.timer !== null) {
      clearTimeout(task.timer);
      task.timer = null;
    }
    task.nextDueAt = null;
  }

  private info(task: Task): ScheduledTaskInfo {
    return {
      id: task.id,
      intervalSeconds: task.intervalMs / 1000,
      timeoutSeconds: task.timeoutMs / 1000,
      enabled: task.enabled,
      state: task.running ? "running" : task.enabled ? "idle" : "disabled",
      lastRunAt: task.lastRunAt !== null ? new Date(task.lastRunAt) : null,
      lastError: task.lastError,
      nextDueAt: task.nextDueAt !== null ? new Date(task.nextDueAt) : null,
      runCount: task.runCount,
      failureCount: task.failureCount,
      consecutiveFailures: task.consecutiveFailures,
    };
  }
}
