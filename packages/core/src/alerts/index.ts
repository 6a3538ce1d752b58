export type {
  Alert,
  AlertKind,
  AlertPolicy,
  WatchedSnapshot,
  PollFunc,
} from "./types.js";
export { ChangeDetector, DEFAULT_ALERT_POLICY } from "./change-detector.js";
