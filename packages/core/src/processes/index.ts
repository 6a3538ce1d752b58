export type {
  CancelRejection,
  LongOperationFn,
  ProcessContext,
  ProcessFilter,
  ProcessHandle,
  ProcessRegistryEvents,
  ProcessStatus,
  SubmitOptions,
} from "./types.js";
export { ProcessRegistry, type ProcessRegistryOptions } from "./registry.js";
export { assertTransition, isTerminal } from "./transitions.js";
export { formatRuntime, runtimeMs } from "./format.js";
