import { loadConfig, resolveConfigPath } from "@blogsync/core/config";

/** Write config.json with every default filled in, keeping existing values. */
export async function initConfigCommand(options: { config?: string }): Promise<void> {
  const configPath = resolveConfigPath({ configPath: options.config });
  await loadConfig({ configPath });
  console.log(`Config written to ${configPath}`);
}
