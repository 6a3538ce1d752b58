import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  LeaseNotFoundError,
  LeaseRenewalError,
  errorMessage,
} from "../errors/catalog.js";
import { componentLogger } from "../logger/index.js";
import type { RenewFunc } from "../scheduler/types.js";
import { abortReason } from "../signals/deadline.js";
import type {
  LeaseRenewalSummary,
  LeaseTrackerEvents,
  RenewLeaseFunc,
  TrackedLease,
} from "./types.js";

export interface LeaseTrackerOptions {
  logger: Logger;
  /** Renew leases that expire within this many seconds. Default: 120 */
  renewWithinSeconds?: number;
}

/**
 * Expiry bookkeeping for secret-store leases. The renewal itself is the
 * caller's; this class decides which leases are due and what the outcome
 * means for tracking.
 */
export class LeaseTracker extends EventEmitter<LeaseTrackerEvents> {
  private readonly leases = new Map<string, number>();
  private readonly logger: Logger;
  private readonly renewWithinMs: number;

  constructor(options: LeaseTrackerOptions) {
    super();
    this.logger = componentLogger(options.logger, "lease-tracker");
    this.renewWithinMs = (options.renewWithinSeconds ?? 120) * 1000;
  }

  /** Start tracking `leaseId`, replacing any previous expiry. */
  track(leaseId: string, ttlSeconds: number): void {
    this.leases.set(leaseId, Date.now() + ttlSeconds * 1000);
  }

  untrack(leaseId: string): boolean {
    return this.leases.delete(leaseId);
  }

  list(): TrackedLease[] {
    return [...this.leases].map(([leaseId, expiresAt]) => ({
      leaseId,
      expiresAt: new Date(expiresAt),
    }));
  }

  /**
   * Renew every lease that expires within the renewal window. Leases the
   * backend no longer knows, or will not extend, are dropped as expired.
   * Throws LeaseRenewalError after the pass when any renewal failed.
   */
  async renewDue(
    renewLease: RenewLeaseFunc,
    signal: AbortSignal,
  ): Promise<LeaseRenewalSummary> {
    const summary: LeaseRenewalSummary = { renewed: [], expired: [], failed: [] };
    const horizon = Date.now() + this.renewWithinMs;
    const due = [...this.leases]
      .filter(([, expiresAt]) => expiresAt <= horizon)
      .map(([leaseId]) => leaseId);

    for (const leaseId of due) {
      if (signal.aborted) throw abortReason(signal);

      try {
        const durationSeconds = await renewLease(leaseId, signal);
        if (durationSeconds > 0) {
          const expiresAt = Date.now() + durationSeconds * 1000;
          this.leases.set(leaseId, expiresAt);
          summary.renewed.push(leaseId);
          this.emit("lease-renewed", leaseId, new Date(expiresAt));
        } else {
          this.expire(leaseId, summary);
        }
      } catch (err) {
        if (err instanceof LeaseNotFoundError) {
          this.expire(leaseId, summary);
          continue;
        }
        if (signal.aborted) throw abortReason(signal);

        summary.failed.push(leaseId);
        this.logger.warn({ lease: leaseId, error: errorMessage(err) }, "Lease renewal failed");
        this.emit("lease-failed", leaseId, errorMessage(err));
      }
    }

    if (due.length > 0) {
      this.logger.info(
        {
          renewed: summary.renewed.length,
          expired: summary.expired.length,
          failed: summary.failed.length,
        },
        "Lease renewal pass finished",
      );
    }

    if (summary.failed.length > 0) {
      throw new LeaseRenewalError(summary.failed);
    }
    return summary;
  }

  /** Adapt renewDue() to a scheduled renewal task. */
  toRenewFunc(renewLease: RenewLeaseFunc): RenewFunc {
    return async (signal) => {
      await this.renewDue(renewLease, signal);
    };
  }

  private expire(leaseId: string, summary: LeaseRenewalSummary): void {
    this.leases.delete(leaseId);
    summary.expired.push(leaseId);
    this.logger.info({ lease: leaseId }, "Lease expired");
    this.emit("lease-expired", leaseId);
  }
}
