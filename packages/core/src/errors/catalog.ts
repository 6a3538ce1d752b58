/**
 * Typed error catalog shared by every core component.
 *
 * Components report failures as values (results, node snapshots, handle
 * status). These classes give those values a stable `errorCode`.
 */

export class CoreError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Transport: a collaborator could not reach its backend

export class TransportError extends CoreError {
  constructor(message = "Backend unreachable", details?: Record<string, unknown>) {
    super("TRANSPORT_ERROR", message, details);
  }
}

export class ListerTimeoutError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("LISTER_TIMEOUT", "Listing timed out", details);
  }
}

export class OperationTimeoutError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("OPERATION_TIMEOUT", "Operation timed out", details);
  }
}

export class ResourceNotFoundError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("RESOURCE_NOT_FOUND", "Resource not found", details);
  }
}

export class LeaseNotFoundError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("LEASE_NOT_FOUND", "Lease not found or expired", details);
  }
}

export class LeaseRenewalError extends CoreError {
  constructor(failed: string[]) {
    super(
      "LEASE_RENEWAL_FAILED",
      `Failed to renew ${failed.length} lease(s)`,
      { failed },
    );
  }
}

// Configuration of the core itself

export class NoListerError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("NO_LISTER", "No lister bound for path", details);
  }
}

export class UnknownNamespaceError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("UNKNOWN_NAMESPACE", "Unknown namespace", details);
  }
}

export class DuplicateTaskError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("DUPLICATE_TASK", "Task already scheduled", details);
  }
}

// Cancellation and invariants

export class CancellationRequestedError extends CoreError {
  constructor(details?: Record<string, unknown>) {
    super("CANCELLATION_REQUESTED", "Cancellation requested", details);
  }
}

export class InternalInvariantViolationError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INTERNAL_INVARIANT_VIOLATION", message, details);
  }
}

/** Extract a human-readable message from anything thrown by a collaborator. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/**
 * Normalise a collaborator failure. Catalog errors pass through unchanged,
 * anything else becomes a TransportError carrying the original message.
 */
export function toTransportError(err: unknown): CoreError {
  if (err instanceof CoreError) return err;
  return new TransportError(errorMessage(err), {
    cause: err instanceof Error ? err.name : typeof err,
  });
}
