import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/core-config.js";

export type { Logger } from "pino";

export function createLogger(config: LoggingConfig): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name: "opentongchi",
    level: config.level,
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** Child logger tagged with the owning component. */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}
