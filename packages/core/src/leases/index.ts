export type {
  LeaseRenewalSummary,
  LeaseTrackerEvents,
  RenewLeaseFunc,
  TrackedLease,
} from "./types.js";
export { LeaseTracker, type LeaseTrackerOptions } from "./lease-tracker.js";
