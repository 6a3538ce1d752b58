/**
 * Facade over the core components.
 *
 * Owns one ResourceTree per namespace, the scheduled task runner, the
 * process registry and the lease tracker, and re-emits their events for
 * the presentation layer. Task intervals, TTLs and retention come from
 * the core config.
 */

import { EventEmitter } from "node:events";
import {
  ChangeDetector,
  type Alert,
  type AlertPolicy,
  type PollFunc,
} from "@opentongchi/core/alerts";
import {
  createClientFactory,
  type ClientFactory,
} from "@opentongchi/core/clients";
import { UnknownNamespaceError } from "@opentongchi/core/errors";
import {
  LeaseTracker,
  type RenewLeaseFunc,
} from "@opentongchi/core/leases";
import {
  RuntimeStateMachine,
  type RuntimeState,
  type StateTransitionEvent,
} from "@opentongchi/core/lifecycle";
import { componentLogger, type Logger } from "@opentongchi/core/logger";
import {
  ProcessRegistry,
  type LongOperationFn,
  type ProcessFilter,
  type ProcessHandle,
  type SubmitOptions,
} from "@opentongchi/core/processes";
import {
  ScheduledTaskRunner,
  type RenewFunc,
  type ScheduledTaskInfo,
  type TaskFn,
  type TaskRunOutcome,
} from "@opentongchi/core/scheduler";
import {
  DEFAULTS,
  type CoreConfig,
  type TaskConfig,
} from "@opentongchi/core/schemas";
import {
  ResourceTree,
  type BindOptions,
  type ExpandOptions,
  type ExpandResult,
  type InvalidateOptions,
  type Lister,
  type NodeSnapshot,
} from "@opentongchi/core/tree";

export interface CoordinatorOptions {
  config: CoreConfig;
  logger: Logger;
}

export interface NamespaceOptions {
  /** Overrides the configured TTL of this namespace. */
  ttlSeconds?: number;
}

export interface CoordinatorEvents {
  "node-updated": [namespace: string, path: string, node: NodeSnapshot];
  alert: [alert: Alert];
  "process-changed": [handle: ProcessHandle];
  "task-failed": [id: string, message: string];
  "state-change": [event: StateTransitionEvent];
}

export const PROCESS_SWEEP_TASK = "process-sweep";
export const LEASE_RENEWAL_TASK = "lease-renewal";

export class Coordinator extends EventEmitter<CoordinatorEvents> {
  readonly config: CoreConfig;
  readonly leases: LeaseTracker;

  private readonly logger: Logger;
  private readonly baseLogger: Logger;
  private readonly trees = new Map<string, ResourceTree>();
  private readonly clients = new Set<{ reset(): void }>();
  private readonly runner: ScheduledTaskRunner;
  private readonly registry: ProcessRegistry;
  private readonly stateMachine = new RuntimeStateMachine();

  constructor(options: CoordinatorOptions) {
    super();
    this.config = options.config;
    this.baseLogger = options.logger;
    this.logger = componentLogger(options.logger, "coordinator");

    this.runner = new ScheduledTaskRunner({
      logger: options.logger,
      startPaused: true,
    });
    this.runner.on("task-failed", (id, error) => {
      this.emit("task-failed", id, error.message);
    });

    this.registry = new ProcessRegistry({
      logger: options.logger,
      retentionMs: this.config.processes.retentionSeconds * 1000,
    });
    this.registry.on("process-changed", (handle) => {
      this.emit("process-changed", handle);
    });

    this.leases = new LeaseTracker({
      logger: options.logger,
      renewWithinSeconds: this.config.leases.renewWithinSeconds,
    });

    this.stateMachine.onStateChange((event) => {
      this.logger.info(
        { from: event.from, to: event.to, reason: event.reason },
        "Coordinator state changed",
      );
      this.emit("state-change", event);
    });

    this.scheduleTask(PROCESS_SWEEP_TASK, async () => {
      this.registry.sweep();
    });
  }

  get state(): RuntimeState {
    return this.stateMachine.getState();
  }

  // --- Resource trees ---

  /**
   * The ResourceTree of a logical namespace, created on first use. The TTL
   * is fixed at creation: options, then `trees[name]`, then `tree`.
   */
  namespace(name: string, options?: NamespaceOptions): ResourceTree {
    const existing = this.trees.get(name);
    if (existing) return existing;

    const ttlSeconds =
      options?.ttlSeconds ??
      this.config.trees[name]?.ttlSeconds ??
      this.config.tree.ttlSeconds;

    const tree = new ResourceTree({
      logger: this.baseLogger,
      name,
      ttlMs: ttlSeconds * 1000,
      listerTimeoutMs: this.config.tree.listerTimeoutSeconds * 1000,
    });
    tree.on("node-updated", (path, node) => {
      this.emit("node-updated", name, path, node);
    });
    this.trees.set(name, tree);
    return tree;
  }

  bindLister(
    namespace: string,
    prefix: string,
    lister: Lister,
    options?: BindOptions,
  ): () => void {
    return this.namespace(namespace).bind(prefix, lister, options);
  }

  async expand(
    namespace: string,
    path: string,
    options?: ExpandOptions,
  ): Promise<ExpandResult> {
    const tree = this.trees.get(namespace);
    if (!tree) {
      return {
        ok: false,
        error: new UnknownNamespaceError({ namespace }),
        node: unloaded(path),
      };
    }
    return tree.expand(path, options);
  }

  peek(namespace: string, path: string): NodeSnapshot {
    return this.trees.get(namespace)?.peek(path) ?? unloaded(path);
  }

  invalidate(
    namespace: string,
    path: string,
    options?: InvalidateOptions,
  ): number {
    return this.trees.get(namespace)?.invalidate(path, options) ?? 0;
  }

  prune(namespace: string, path: string): number {
    return this.trees.get(namespace)?.prune(path) ?? 0;
  }

  // --- Clients ---

  /**
   * Lazily built backend client that reconfigure() rebuilds. Listers and
   * tasks should call `get()` on every use.
   */
  createClient<T>(build: () => T): ClientFactory<T> {
    const factory = createClientFactory(build);
    this.clients.add(factory);
    return factory;
  }

  /**
   * Apply changed settings: every client is rebuilt on next use and every
   * cached listing reloads on next expand.
   */
  reconfigure(): void {
    for (const client of this.clients) {
      client.reset();
    }
    let invalidated = 0;
    for (const tree of this.trees.values()) {
      invalidated += tree.invalidateAll();
    }
    this.logger.info(
      { clients: this.clients.size, invalidated },
      "Reconfigured",
    );
  }

  // --- Background tasks ---

  /** Periodic credential renewal under the `tasks[id]` settings. */
  addRenewal(id: string, renew: RenewFunc): void {
    this.scheduleTask(id, renew);
  }

  /** Periodic renewal of the leases held in `leases`. */
  addLeaseRenewal(renewLease: RenewLeaseFunc): void {
    this.scheduleTask(LEASE_RENEWAL_TASK, this.leases.toRenewFunc(renewLease));
  }

  /**
   * Poll a status snapshot on the `tasks[id]` schedule and turn changes
   * into `alert` events. A failed poll is a task failure; it leaves the
   * detector's snapshot untouched.
   */
  addWatch(
    id: string,
    poll: PollFunc,
    policy?: Partial<AlertPolicy>,
  ): ChangeDetector {
    const detector = new ChangeDetector({
      failureStatuses: this.config.alerts.failureStatuses,
      startStatuses: this.config.alerts.startStatuses,
      alertOnRemoval: this.config.alerts.alertOnRemoval,
      ...policy,
    });

    this.scheduleTask(
      id,
      async (signal) => {
        const current = await poll(signal);
        const alerts = detector.observe(current);
        if (!this.config.alerts.enabled) return;

        for (const alert of alerts) {
          this.logger.info(
            { watch: id, resource: alert.resourceId, kind: alert.kind },
            alert.title,
          );
          this.emit("alert", alert);
        }
      },
      true,
    );
    return detector;
  }

  setTaskEnabled(id: string, enabled: boolean): boolean {
    return this.runner.setEnabled(id, enabled);
  }

  triggerTask(id: string): Promise<TaskRunOutcome | undefined> {
    return this.runner.trigger(id);
  }

  listTasks(): ScheduledTaskInfo[] {
    return this.runner.listTasks();
  }

  // --- Long-running operations ---

  submit<T>(options: SubmitOptions, fn: LongOperationFn<T>): ProcessHandle {
    return this.registry.submit(options, fn);
  }

  cancel(id: string): boolean {
    return this.registry.cancel(id);
  }

  getProcess(id: string): ProcessHandle | undefined {
    return this.registry.get(id);
  }

  listProcesses(filter?: ProcessFilter): ProcessHandle[] {
    return this.registry.list(filter);
  }

  recentProcesses(limit?: number): ProcessHandle[] {
    return this.registry.recent(limit);
  }

  waitForProcess(id: string): Promise<ProcessHandle | undefined> {
    return this.registry.wait(id);
  }

  // --- Lifecycle ---

  /** Arm every enabled task. */
  start(): void {
    this.stateMachine.transition("running");
    this.runner.start();
  }

  /**
   * Cancel timers and cancellable operations, then wait for running task
   * executions to settle.
   */
  async stop(): Promise<void> {
    const state = this.stateMachine.getState();
    if (state === "stopping" || state === "stopped") return;

    if (state === "running") {
      this.stateMachine.transition("stopping");
    }
    const cancelled = this.registry.cancelAll();
    await this.runner.stop();
    this.stateMachine.transition("stopped", `cancelled ${cancelled} process(es)`);
  }

  private scheduleTask(id: string, fn: TaskFn, immediate = false): void {
    const settings = this.taskConfig(id);
    this.runner.schedule(
      {
        id,
        intervalSeconds: settings.intervalSeconds,
        timeoutSeconds: settings.timeoutSeconds,
        enabled: settings.enabled,
        immediate,
      },
      fn,
    );
  }

  private taskConfig(id: string): TaskConfig {
    const configured: TaskConfig | undefined = this.config.tasks[id];
    return configured ?? DEFAULTS.task;
  }
}

function unloaded(path: string): NodeSnapshot {
  return {
    path,
    status: "not-loaded",
    children: null,
    loadedAt: null,
    lastError: null,
    stale: false,
  };
}
