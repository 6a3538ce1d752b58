import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  tree: {
    ttlSeconds: 0,
    listerTimeoutSeconds: 30,
  },
  tasks: {
    "token-renewal": { enabled: true, intervalSeconds: 300, timeoutSeconds: 30 },
    "lease-renewal": { enabled: true, intervalSeconds: 60, timeoutSeconds: 30 },
    "status-poll": { enabled: true, intervalSeconds: 10, timeoutSeconds: 30 },
    "process-sweep": { enabled: true, intervalSeconds: 60, timeoutSeconds: 30 },
  },
  task: {
    enabled: true,
    intervalSeconds: 60,
    timeoutSeconds: 30,
  },
  processes: {
    retentionSeconds: 3600,
  },
  alerts: {
    enabled: true,
    failureStatuses: ["dead", "failed"],
    startStatuses: [] as string[],
    alertOnRemoval: true,
  },
  leases: {
    renewWithinSeconds: 120,
  },
};

/** Whole seconds that still fit a setTimeout delay. */
const MAX_TIMER_SECONDS = 2_147_483;

type TaskDefaults = typeof DEFAULTS.task;

function taskSchema(defaults: TaskDefaults) {
  return z.object({
    enabled: z.boolean().default(defaults.enabled),
    intervalSeconds: z
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_SECONDS)
      .default(defaults.intervalSeconds),
    timeoutSeconds: z
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_SECONDS)
      .default(defaults.timeoutSeconds),
  });
}

export const TaskConfigSchema = taskSchema(DEFAULTS.task);

const TreeConfigSchema = z.object({
  ttlSeconds: z
    .number()
    .nonnegative()
    .describe("Seconds before a loaded listing is stale (0 = never)"),
});

export const CoreConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  tree: z
    .object({
      ttlSeconds: z.number().nonnegative().default(DEFAULTS.tree.ttlSeconds),
      listerTimeoutSeconds: z
        .number()
        .positive()
        .max(MAX_TIMER_SECONDS)
        .default(DEFAULTS.tree.listerTimeoutSeconds),
    })
    .default(DEFAULTS.tree),
  trees: z
    .record(z.string(), TreeConfigSchema)
    .default({})
    .describe("Per-namespace overrides of tree.ttlSeconds"),
  tasks: z
    .object({
      "token-renewal": taskSchema(DEFAULTS.tasks["token-renewal"]).default(
        DEFAULTS.tasks["token-renewal"],
      ),
      "lease-renewal": taskSchema(DEFAULTS.tasks["lease-renewal"]).default(
        DEFAULTS.tasks["lease-renewal"],
      ),
      "status-poll": taskSchema(DEFAULTS.tasks["status-poll"]).default(
        DEFAULTS.tasks["status-poll"],
      ),
      "process-sweep": taskSchema(DEFAULTS.tasks["process-sweep"]).default(
        DEFAULTS.tasks["process-sweep"],
      ),
    })
    .catchall(TaskConfigSchema)
    .default(DEFAULTS.tasks),
  processes: z
    .object({
      retentionSeconds: z
        .number()
        .nonnegative()
        .default(DEFAULTS.processes.retentionSeconds),
    })
    .default(DEFAULTS.processes),
  alerts: z
    .object({
      enabled: z.boolean().default(DEFAULTS.alerts.enabled),
      failureStatuses: z
        .array(z.string())
        .default(DEFAULTS.alerts.failureStatuses),
      startStatuses: z.array(z.string()).default(DEFAULTS.alerts.startStatuses),
      alertOnRemoval: z.boolean().default(DEFAULTS.alerts.alertOnRemoval),
    })
    .default(DEFAULTS.alerts),
  leases: z
    .object({
      renewWithinSeconds: z
        .number()
        .nonnegative()
        .default(DEFAULTS.leases.renewWithinSeconds),
    })
    .default(DEFAULTS.leases),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type LoggingConfig = CoreConfig["logging"];
export type TaskConfig = z.infer<typeof TaskConfigSchema>;
