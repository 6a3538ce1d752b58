import { InternalInvariantViolationError } from "../errors/catalog.js";
import type { ProcessStatus } from "./types.js";

const VALID_TRANSITIONS: Record<ProcessStatus, ReadonlySet<ProcessStatus>> = {
  pending: new Set(["running", "failed", "cancelled"]),
  running: new Set(["completed", "failed", "cancelled"]),
  completed: new Set(),
  failed: new Set(),
  cancelled: new Set(),
};

export function isTerminal(status: ProcessStatus): boolean {
  return VALID_TRANSITIONS[status].size === 0;
}

/** Throws when `from -> to` is not in the transition table. */
export function assertTransition(
  id: string,
  from: ProcessStatus,
  to: ProcessStatus,
): void {
  if (!VALID_TRANSITIONS[from].has(to)) {
    throw new InternalInvariantViolationError(
      `Invalid process transition: ${from} -> ${to}`,
      { id, from, to },
    );
  }
}
