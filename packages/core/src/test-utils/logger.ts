/**
 * Logger double for component tests. Every method is a spy and `child()`
 * returns the same double, so assertions see calls from child loggers too.
 */

import { vi } from "vitest";
import type { Logger } from "pino";

export function makeMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}
