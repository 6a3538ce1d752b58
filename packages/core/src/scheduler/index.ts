export type {
  ScheduledTaskDefinition,
  ScheduledTaskInfo,
  TaskFn,
  RenewFunc,
  TaskRunOutcome,
  TaskRunnerEvents,
  TaskState,
} from "./types.js";
export {
  ScheduledTaskRunner,
  type ScheduledTaskRunnerOptions,
} from "./task-runner.js";
