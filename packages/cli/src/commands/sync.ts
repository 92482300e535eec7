/**
 * Sync Command - run one cycle in the foreground and exit
 */

import { loadConfig, resolveConfigPath } from "@blogsync/core/config";
import type { Logger } from "@blogsync/core/logger";
import type { RemoteSource } from "@blogsync/core/remote";
import type { CycleOutcome } from "@blogsync/core/sync";
import { createServer } from "@blogsync/server";

export interface SyncCommandOptions {
  config?: string;
  full?: boolean;
}

export interface SyncCommandDeps {
  remote?: RemoteSource;
  logger?: Logger;
}

export function formatOutcome(outcome: CycleOutcome): string {
  const report = outcome.report;
  const counts = report
    ? `${report.fetched.length} fetched, ${report.unchanged.length} unchanged, ${report.deleted.length} deleted`
    : "nothing reconciled";
  const skipped =
    outcome.skipped.length > 0 ? ` (skipped ${outcome.skipped.join(", ")})` : "";
  return `Sync ${outcome.status} [${outcome.mode}]: ${counts}, ${outcome.failures.length} failure(s)${skipped}`;
}

/** Resolves to the process exit code: 1 when the cycle aborted. */
export async function syncCommand(
  options: SyncCommandOptions,
  deps?: SyncCommandDeps,
): Promise<number> {
  const configPath = resolveConfigPath({ configPath: options.config });
  const config = await loadConfig({ configPath });
  const context = await createServer(config, {
    configPath,
    remote: deps?.remote,
    logger: deps?.logger,
  });

  const outcome = await context.pipeline.run(
    options.full ? { mode: "full" } : { mode: "auto" },
  );

  console.log(formatOutcome(outcome));
  for (const failure of outcome.failures) {
    console.log(`  ${failure.operation} ${failure.path}: ${failure.message}`);
  }
  if (outcome.status === "aborted") {
    console.error(`Aborted at ${outcome.stage}: ${outcome.error ?? "unknown error"}`);
    return 1;
  }
  return 0;
}
