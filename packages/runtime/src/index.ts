export {
  Coordinator,
  PROCESS_SWEEP_TASK,
  LEASE_RENEWAL_TASK,
  type CoordinatorOptions,
  type CoordinatorEvents,
  type NamespaceOptions,
} from "./coordinator.js";
export {
  createRuntime,
  type CreateRuntimeOptions,
  type RuntimeContext,
} from "./bootstrap.js";
