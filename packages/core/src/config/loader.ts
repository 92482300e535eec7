import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  AppConfigSchema,
  type AppConfig,
} from "../schemas/app-config.js";
import { ROOT_PATH_ENV } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  env?: NodeJS.ProcessEnv;
}

/** An explicit path wins, then the root path option, then BLOGSYNC_ROOT_PATH. */
export function resolveConfigPath(options?: LoadConfigOptions): string {
  if (options?.configPath) {
    return options.configPath;
  }
  const env = options?.env ?? process.env;
  const rootPath = options?.rootPath ?? (env[ROOT_PATH_ENV] || undefined);
  return join(resolveRootPath(rootPath), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<AppConfig> {
  const configPath = resolveConfigPath(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    // A missing file means all defaults
    if (!isMissingFile(err)) {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = AppConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: AppConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = resolveConfigPath(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
