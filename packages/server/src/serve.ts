import { serve, type ServerType } from "@hono/node-server";
import { loadConfig } from "@blogsync/core/config";
import { createServer, type ServerContext } from "./bootstrap.js";

export interface RunningServer {
  context: ServerContext;
  /** Stop the event loop (waiting for a running cycle) and both listeners */
  close: () => Promise<void>;
}

function closeListener(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Load config, listen on the public and admin ports, start syncing. */
export async function startServer(options?: {
  configPath?: string;
}): Promise<RunningServer> {
  const config = await loadConfig({ configPath: options?.configPath });
  const context = await createServer(config, {
    configPath: options?.configPath,
  });
  const { app, adminApp, logger } = context;

  const server = serve(
    {
      fetch: app.fetch,
      hostname: context.config.server.host,
      port: context.config.server.port,
    },
    (info) => {
      logger.info(
        {
          port: info.port,
          webhookPath: context.config.server.webhookPath,
          version: context.version,
        },
        "HTTP server started",
      );
    },
  );

  const adminServer = serve(
    {
      fetch: adminApp.fetch,
      hostname: context.config.server.adminHost,
      port: context.config.server.adminPort,
    },
    (info) => {
      logger.info({ port: info.port }, "Admin server started");
    },
  );

  context.startBackgroundServices();

  return {
    context,
    close: async () => {
      await context.cleanup();
      await Promise.all([closeListener(server), closeListener(adminServer)]);
      logger.info("Server stopped");
    },
  };
}
