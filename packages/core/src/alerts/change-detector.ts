import type { Alert, AlertPolicy, WatchedSnapshot } from "./types.js";

export const DEFAULT_ALERT_POLICY: AlertPolicy = {
  failureStatuses: ["dead", "failed"],
  startStatuses: [],
  alertOnRemoval: true,
  resourceLabel: "Resource",
};

/**
 * Turns consecutive status snapshots into alerts.
 *
 * The detector knows nothing about fetching: a poll cycle whose fetch
 * failed must simply not call observe(). Calls must come from a single
 * poller, one at a time.
 */
export class ChangeDetector {
  private readonly policy: AlertPolicy;
  private readonly failureStatuses: ReadonlySet<string>;
  private readonly startStatuses: ReadonlySet<string>;
  private previous: WatchedSnapshot | null = null;

  constructor(policy?: Partial<AlertPolicy>) {
    this.policy = { ...DEFAULT_ALERT_POLICY, ...policy };
    this.failureStatuses = new Set(this.policy.failureStatuses);
    this.startStatuses = new Set(this.policy.startStatuses);
  }

  /**
   * Diff `current` against the stored snapshot, then replace it. The first
   * call only records a baseline.
   */
  observe(current: ReadonlyMap<string, string> | Record<string, string>): Alert[] {
    const next: WatchedSnapshot = new Map<string, string>(
      current instanceof Map ? current : Object.entries(current),
    );
    const previous = this.previous;
    const alerts: Alert[] = [];

    if (previous) {
      for (const [id, status] of next) {
        const before = previous.get(id);
        if (before === undefined || before === status) continue;

        if (this.failureStatuses.has(status) && !this.failureStatuses.has(before)) {
          alerts.push(this.failedAlert(id, before, status));
        } else if (this.startStatuses.has(status) && !this.startStatuses.has(before)) {
          alerts.push(this.startedAlert(id, before, status));
        }
      }

      if (this.policy.alertOnRemoval) {
        for (const [id, before] of previous) {
          if (!next.has(id)) {
            alerts.push(this.removedAlert(id, before));
          }
        }
      }
    }

    this.previous = next;
    return alerts;
  }

  /** The stored snapshot, or null before the first observation. */
  snapshot(): WatchedSnapshot | null {
    return this.previous;
  }

  /** Forget the stored snapshot; the next observe() is a first observation. */
  reset(): void {
    this.previous = null;
  }

  private failedAlert(id: string, before: string, status: string): Alert {
    const label = this.policy.resourceLabel;
    return {
      kind: "failed",
      resourceId: id,
      title: `${label} Failed: ${id}`,
      message: `${label} ${id} status changed from ${before} to ${status}`,
      previousStatus: before,
      currentStatus: status,
    };
  }

  private startedAlert(id: string, before: string, status: string): Alert {
    const label = this.policy.resourceLabel;
    return {
      kind: "started",
      resourceId: id,
      title: `${label} Started: ${id}`,
      message: `${label} ${id} is now ${status}`,
      previousStatus: before,
      currentStatus: status,
    };
  }

  private removedAlert(id: string, before: string): Alert {
    const label = this.policy.resourceLabel;
    return {
      kind: "removed",
      resourceId: id,
      title: `${label} Removed: ${id}`,
      message: `${label} ${id} has been removed`,
      previousStatus: before,
      currentStatus: null,
    };
  }
}
