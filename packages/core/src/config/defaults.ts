import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "blogsync");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Overrides the root directory holding config.json */
export const ROOT_PATH_ENV = "BLOGSYNC_ROOT_PATH";
