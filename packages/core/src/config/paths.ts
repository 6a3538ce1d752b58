import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH, ROOT_PATH_ENV } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the root path to an absolute path: explicit input first, then
 * $OPENTONGCHI_HOME, then the default.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[ROOT_PATH_ENV];
  const chosen =
    input ?? (fromEnv !== undefined && fromEnv !== "" ? fromEnv : undefined);
  return resolve(expandHomePath(chosen ?? DEFAULT_ROOT_PATH));
}
