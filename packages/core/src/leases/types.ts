export interface TrackedLease {
  leaseId: string;
  expiresAt: Date;
}

/**
 * Renews one lease and resolves with its new duration in seconds. A
 * duration of 0 means the backend will not extend it any further.
 */
export type RenewLeaseFunc = (leaseId: string, signal: AbortSignal) => Promise<number>;

export interface LeaseRenewalSummary {
  renewed: string[];
  expired: string[];
  failed: string[];
}

export interface LeaseTrackerEvents {
  "lease-renewed": [leaseId: string, expiresAt: Date];
  "lease-expired": [leaseId: string];
  "lease-failed": [leaseId: string, message: string];
}
