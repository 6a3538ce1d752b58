import { join } from "node:path";
import { loadConfig, resolveRootPath } from "@opentongchi/core/config";
import { createLogger, type Logger } from "@opentongchi/core/logger";
import type { CoreConfig } from "@opentongchi/core/schemas";
import { Coordinator } from "./coordinator.js";

export interface RuntimeContext {
  coordinator: Coordinator;
  logger: Logger;
  config: CoreConfig;
  rootPath: string;
  startedAt: Date;
  cleanup: () => Promise<void>;
}

export interface CreateRuntimeOptions {
  rootPath?: string;
  /** Defaults to `<rootPath>/config.json`. */
  configPath?: string;
  /** Skip loading the config file. */
  config?: CoreConfig;
  /** Defaults to a logger built from `config.logging`. */
  logger?: Logger;
}

export async function createRuntime(
  options?: CreateRuntimeOptions,
): Promise<RuntimeContext> {
  const rootPath = resolveRootPath(options?.rootPath);
  const config =
    options?.config ??
    (await loadConfig({
      configPath: options?.configPath ?? join(rootPath, "config.json"),
    }));
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const coordinator = new Coordinator({ config, logger });
  logger.info({ rootPath }, "Runtime created");

  return {
    coordinator,
    logger,
    config,
    rootPath,
    startedAt,
    cleanup: async () => {
      await coordinator.stop();
      logger.info("Runtime stopped");
    },
  };
}
