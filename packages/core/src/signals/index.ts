export {
  createDeadline,
  abortReason,
  raceSignal,
  MAX_TIMER_MS,
  type Deadline,
} from "./deadline.js";
