import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".opentongchi");

/** Environment variable that relocates the root directory. */
export const ROOT_PATH_ENV = "OPENTONGCHI_HOME";
