/**
 * Registry of long-running operations (builds, connects, applies).
 *
 * Each submitted operation runs detached from the caller and ends in
 * exactly one terminal status. Cancellation is cooperative: cancel() only
 * aborts the operation's signal, and the handle becomes `cancelled` when
 * the operation gives up by rejecting. Terminal handles are kept for a
 * retention window so callers can still read their outcome.
 */

import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  CancellationRequestedError,
  OperationTimeoutError,
  errorMessage,
  toTransportError,
} from "../errors/catalog.js";
import { componentLogger } from "../logger/index.js";
import { abortReason, createDeadline } from "../signals/deadline.js";
import { assertTransition, isTerminal } from "./transitions.js";
import type {
  CancelRejection,
  LongOperationFn,
  ProcessFilter,
  ProcessHandle,
  ProcessRegistryEvents,
  ProcessStatus,
  SubmitOptions,
} from "./types.js";

export interface ProcessRegistryOptions {
  logger: Logger;
  /** How long terminal handles survive sweep(). Default: 1 hour */
  retentionMs?: number;
}

interface ProcessEntry {
  handle: ProcessHandle;
  timeoutMs: number;
  controller: AbortController;
  done: Promise<ProcessHandle>;
  resolveDone: (handle: ProcessHandle) => void;
}

const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export class ProcessRegistry extends EventEmitter<ProcessRegistryEvents> {
  private readonly entries = new Map<string, ProcessEntry>();
  private readonly logger: Logger;
  private readonly retentionMs: number;

  constructor(options: ProcessRegistryOptions) {
    super();
    this.logger = componentLogger(options.logger, "process-registry");
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
  }

  /**
   * Start `fn` and return its handle, already running. The operation never
   * runs on the caller's stack, so even a synchronous throw surfaces as a
   * failed handle.
   */
  submit<T>(options: SubmitOptions, fn: LongOperationFn<T>): ProcessHandle {
    const handle: ProcessHandle = {
      id: randomUUID(),
      name: options.name,
      description: options.description ?? "",
      status: "pending",
      submittedAt: new Date(),
      startedAt: null,
      finishedAt: null,
      cancellable: options.cancellable ?? true,
      cancelRequested: false,
      progress: null,
    };

    let resolveDone: (handle: ProcessHandle) => void = () => {};
    const done = new Promise<ProcessHandle>((resolve) => {
      resolveDone = resolve;
    });

    const entry: ProcessEntry = {
      handle,
      timeoutMs: options.timeoutMs ?? 0,
      controller: new AbortController(),
      done,
      resolveDone,
    };
    this.entries.set(handle.id, entry);
    this.emitChange(entry);

    this.move(entry, "running");
    this.emitChange(entry);
    this.logger.info(
      { process: handle.id, name: handle.name, cancellable: handle.cancellable },
      "Process started",
    );

    this.run(entry, fn).catch((err: unknown) => {
      this.logger.error(
        { process: handle.id, error: errorMessage(err) },
        "Process run aborted unexpectedly",
      );
    });
    return copy(handle);
  }

  /**
   * Request cancellation. Returns false, logs and emits `cancel-rejected`
   * for unknown, terminal or non-cancellable handles.
   */
  cancel(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return this.reject(id, "unknown");
    }
    const { handle } = entry;
    if (isTerminal(handle.status)) {
      return this.reject(id, "terminal");
    }
    if (!handle.cancellable) {
      return this.reject(id, "not-cancellable");
    }
    if (handle.cancelRequested) return true;

    handle.cancelRequested = true;
    entry.controller.abort(new CancellationRequestedError({ process: id }));
    this.logger.info({ process: id, name: handle.name }, "Cancellation requested");
    this.emitChange(entry);
    return true;
  }

  /** Cancel every cancellable operation still in progress. */
  cancelAll(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      const { handle } = entry;
      if (!isTerminal(handle.status) && handle.cancellable && !handle.cancelRequested) {
        if (this.cancel(handle.id)) count++;
      }
    }
    return count;
  }

  get(id: string): ProcessHandle | undefined {
    const entry = this.entries.get(id);
    return entry ? copy(entry.handle) : undefined;
  }

  /** Handles in submission order, optionally filtered by status. */
  list(filter?: ProcessFilter): ProcessHandle[] {
    const wanted = filter?.status;
    const statuses: ReadonlySet<ProcessStatus> | null =
      wanted === undefined
        ? null
        : new Set(typeof wanted === "string" ? [wanted] : wanted);

    const handles: ProcessHandle[] = [];
    for (const { handle } of this.entries.values()) {
      if (!statuses || statuses.has(handle.status)) {
        handles.push(copy(handle));
      }
    }
    return handles;
  }

  /** The `limit` most recently submitted handles, newest first. */
  recent(limit = 10): ProcessHandle[] {
    return this.list().reverse().slice(0, Math.max(0, limit));
  }

  /** Resolves with the terminal handle, or undefined for an unknown id. */
  async wait(id: string): Promise<ProcessHandle | undefined> {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    return copy(await entry.done);
  }

  /**
   * Drop handles that have been terminal for longer than the retention
   * window. Handles still in progress are kept whatever their age.
   * Returns the removed ids.
   */
  sweep(now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [id, { handle }] of this.entries) {
      if (
        isTerminal(handle.status) &&
        handle.finishedAt !== null &&
        now - handle.finishedAt.getTime() > this.retentionMs
      ) {
        this.entries.delete(id);
        removed.push(id);
      }
    }

    if (removed.length > 0) {
      this.logger.debug({ removed: removed.length }, "Swept finished processes");
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private async run<T>(entry: ProcessEntry, fn: LongOperationFn<T>): Promise<void> {
    const { handle } = entry;
    const deadline = createDeadline(
      entry.timeoutMs,
      () => new OperationTimeoutError({ process: handle.id, timeoutMs: entry.timeoutMs }),
      entry.controller.signal,
    );

    const reportProgress = (percent: number): void => {
      if (isTerminal(handle.status) || !Number.isFinite(percent)) return;
      handle.progress = Math.min(100, Math.max(0, percent));
      this.emitChange(entry);
    };

    let outcome: Outcome<T>;
    try {
      // fn starts on a later microtask; a cancel() issued right after
      // submit() settles the handle without starting it.
      await Promise.resolve();
      if (entry.controller.signal.aborted) {
        outcome = {
          ok: false,
          status: "cancelled",
          error: abortReason(entry.controller.signal),
        };
      } else {
        const result = await fn({ signal: deadline.signal, reportProgress });
        outcome = { ok: true, result };
      }
    } catch (err) {
      outcome = this.classify(entry, deadline.signal, err);
    } finally {
      deadline.dispose();
    }

    if (outcome.ok) {
      handle.result = outcome.result;
      this.finish(entry, "completed");
    } else {
      this.fail(entry, outcome.status, outcome.error);
    }
  }

  /**
   * A rejection counts as cancelled or timed out only when it is the abort
   * itself. Any other error is the operation's own failure.
   */
  private classify(
    entry: ProcessEntry,
    deadline: AbortSignal,
    err: unknown,
  ): Outcome<never> {
    const cancel = entry.controller.signal;
    if (cancel.aborted && isAbortOf(cancel, err, CancellationRequestedError)) {
      return { ok: false, status: "cancelled", error: abortReason(cancel) };
    }
    if (deadline.aborted && isAbortOf(deadline, err, OperationTimeoutError)) {
      return { ok: false, status: "failed", error: abortReason(deadline) };
    }
    return { ok: false, status: "failed", error: err };
  }

  private fail(entry: ProcessEntry, status: ProcessStatus, err: unknown): void {
    const error = toTransportError(err);
    entry.handle.error = errorMessage(error);
    entry.handle.errorCode = error.errorCode;
    this.finish(entry, status);
  }

  /** Single terminal transition point. */
  private finish(entry: ProcessEntry, status: ProcessStatus): void {
    const { handle } = entry;
    this.move(entry, status);

    const fields = { process: handle.id, name: handle.name, status };
    if (status === "completed") {
      this.logger.info(fields, "Process finished");
    } else {
      this.logger.warn({ ...fields, error: handle.error }, "Process finished");
    }
    entry.resolveDone(copy(handle));
    this.emitChange(entry);
  }

  private move(entry: ProcessEntry, to: ProcessStatus): void {
    const { handle } = entry;
    assertTransition(handle.id, handle.status, to);

    handle.status = to;
    const now = new Date();
    if (to === "running") handle.startedAt = now;
    if (isTerminal(to)) handle.finishedAt = now;
  }

  private reject(id: string, reason: CancelRejection): false {
    this.logger.info({ process: id, reason }, "Cancellation rejected");
    try {
      this.emit("cancel-rejected", id, reason);
    } catch (err) {
      this.logger.error(
        { process: id, error: errorMessage(err) },
        "cancel-rejected listener threw",
      );
    }
    return false;
  }

  /** Listener errors are logged; they never reach the run or the caller. */
  private emitChange(entry: ProcessEntry): void {
    try {
      this.emit("process-changed", copy(entry.handle));
    } catch (err) {
      this.logger.error(
        { process: entry.handle.id, error: errorMessage(err) },
        "process-changed listener threw",
      );
    }
  }
}

type Outcome<T> =
  | { ok: true; result: T }
  | { ok: false; status: ProcessStatus; error: unknown };

function isAbortOf(
  signal: AbortSignal,
  err: unknown,
  kind: new (...args: never[]) => Error,
): boolean {
  return (
    err === signal.reason ||
    err instanceof kind ||
    (err instanceof Error && err.name === "AbortError")
  );
}

function copy(handle: ProcessHandle): ProcessHandle {
  return { ...handle };
}
