export type AlertKind = "failed" | "removed" | "started";

export interface Alert {
  kind: AlertKind;
  resourceId: string;
  title: string;
  message: string;
  previousStatus: string;
  /** null when the resource disappeared. */
  currentStatus: string | null;
}

export interface AlertPolicy {
  /** Statuses that count as a terminal failure. */
  failureStatuses: readonly string[];
  /** Opt-in: alert when a resource enters one of these statuses. */
  startStatuses: readonly string[];
  /** Alert when a resource present in the last snapshot is gone. */
  alertOnRemoval: boolean;
  /** Noun used in alert titles, e.g. "Job". */
  resourceLabel: string;
}

/** Resource id → last observed status. */
export type WatchedSnapshot = ReadonlyMap<string, string>;

/** Fetches a fresh status snapshot. Rejects when the backend is unreachable. */
export type PollFunc = (
  signal: AbortSignal,
) => Promise<Map<string, string> | Record<string, string>>;
