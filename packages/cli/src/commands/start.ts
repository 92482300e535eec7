/**
 * Start Command - run the webhook server, admin API and event loop
 */

import { startServer } from "@blogsync/server";

const DRAIN_TIMEOUT_MS = 5_000;

export async function startCommand(options: { config?: string }): Promise<void> {
  const running = await startServer({ configPath: options.config });
  const { logger } = running.context;

  let stopping = false;
  async function shutdown(signal: string): Promise<void> {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutdown signal received, waiting for sync cycle");

    // Force exit if a build hangs past the drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    try {
      await running.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
