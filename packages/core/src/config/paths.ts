import { homedir } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import type { AppConfig } from "../schemas/app-config.js";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

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
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

function resolveFrom(baseDir: string, input: string): string {
  const expanded = expandHomePath(input);
  return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
}

/**
 * Returns a copy of the config with every local path made absolute,
 * relative paths being taken from the directory holding config.json.
 */
export function resolveConfigPaths(
  config: AppConfig,
  configPath: string,
): AppConfig {
  const baseDir = dirname(resolve(configPath));
  return {
    ...config,
    sync: {
      ...config.sync,
      localBasePath: resolveFrom(baseDir, config.sync.localBasePath),
    },
    build: {
      ...config.build,
      workingDirectory: resolveFrom(baseDir, config.build.workingDirectory),
    },
    copyRules: config.copyRules.map((rule) => ({
      ...rule,
      source: resolveFrom(baseDir, rule.source),
      destination: resolveFrom(baseDir, rule.destination),
    })),
  };
}
