export type ProcessStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed"
  | "cancelled";

export interface ProcessContext {
  /** Aborted on cancel(), on timeout, and when the registry shuts down. */
  signal: AbortSignal;
  /** Report completion in percent (clamped to 0–100). */
  reportProgress(percent: number): void;
}

export type LongOperationFn<T = unknown> = (ctx: ProcessContext) => Promise<T>;

export interface SubmitOptions {
  name: string;
  description?: string;
  /** Default: true */
  cancellable?: boolean;
  /** Abort the operation's signal after this many ms. Default: no timeout */
  timeoutMs?: number;
}

export interface ProcessHandle {
  id: string;
  name: string;
  description: string;
  status: ProcessStatus;
  submittedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  cancellable: boolean;
  cancelRequested: boolean;
  progress: number | null;
  /** Set only once completed. */
  result?: unknown;
  /** Set only once failed or cancelled. */
  error?: string;
  errorCode?: string;
}

export interface ProcessFilter {
  status?: ProcessStatus | readonly ProcessStatus[];
}

export type CancelRejection = "unknown" | "terminal" | "not-cancellable";

export interface ProcessRegistryEvents {
  "process-changed": [handle: ProcessHandle];
  "cancel-rejected": [id: string, reason: CancelRejection];
}
