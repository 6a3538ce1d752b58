export {
  DEFAULTS,
  CoreConfigSchema,
  TaskConfigSchema,
  type CoreConfig,
  type LoggingConfig,
  type TaskConfig,
} from "./core-config.js";
