import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import type { Hono } from "hono";
import { z } from "zod";
import type { AppConfig } from "@blogsync/core/schemas";
import {
  resolveConfigPath,
  resolveConfigPaths,
} from "@blogsync/core/config";
import {
  componentLogger,
  createLogger,
  type Logger,
} from "@blogsync/core/logger";
import {
  createDropboxClient,
  createEnvTokenProvider,
  type RemoteSource,
} from "@blogsync/core/remote";
import {
  createCursorStore,
  createEventLoop,
  createSyncPipeline,
  type CursorStore,
  type EventLoop,
  type SyncPipeline,
} from "@blogsync/core/sync";
import { createApp } from "./app.js";
import { createAdminApp } from "./admin-app.js";
import type { ConfigSummary } from "./routes/sync.js";

const require = createRequire(import.meta.url);
const pkg = z
  .object({ version: z.string() })
  .parse(require("../package.json"));

export interface ServerContext {
  app: Hono;
  adminApp: Hono;
  logger: Logger;
  /** Config with every local path made absolute */
  config: AppConfig;
  configPath: string;
  version: string;
  startedAt: Date;
  remote: RemoteSource;
  cursorStore: CursorStore;
  pipeline: SyncPipeline;
  eventLoop: EventLoop;
  startBackgroundServices: () => void;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  /** Location of config.json; relative paths in the config resolve against it */
  configPath?: string;
  /** Replaces the HTTP remote client, e.g. with an in-process stand-in */
  remote?: RemoteSource;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export function summarizeConfig(config: AppConfig): ConfigSummary {
  return {
    remoteRoot: config.remote.root,
    localBasePath: config.sync.localBasePath,
    buildCommand: config.build.command,
    copyRules: config.copyRules.length,
    coalesce: config.sync.coalesce,
    fullSyncIntervalMs: config.sync.fullSyncIntervalMs,
  };
}

export async function createServer(
  rawConfig: AppConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const env = options?.env ?? process.env;
  const configPath = options?.configPath ?? resolveConfigPath({ env });
  const config = resolveConfigPaths(rawConfig, configPath);
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  await mkdir(config.sync.localBasePath, { recursive: true });

  let remote = options?.remote;
  if (!remote) {
    if (!env[config.remote.tokenEnv]) {
      logger.warn(
        { tokenEnv: config.remote.tokenEnv },
        "Access token not set; remote calls will fail until it is",
      );
    }
    remote = createDropboxClient({
      tokenProvider: createEnvTokenProvider(config.remote.tokenEnv, env),
      apiUrl: config.remote.apiUrl,
      contentUrl: config.remote.contentUrl,
    });
  }

  const cursorStore = createCursorStore(
    config.sync.localBasePath,
    config.sync.cursorFile,
  );

  const pipeline = createSyncPipeline({
    remote,
    cursorStore,
    logger: componentLogger(logger, "pipeline"),
    basePath: config.sync.localBasePath,
    remoteRoot: config.remote.root,
    build: {
      command: config.build.command,
      workingDirectory: config.build.workingDirectory,
      timeoutMs: config.build.timeoutMs,
      env,
    },
    copyRules: config.copyRules,
  });

  const eventLoop = createEventLoop(
    {
      pipeline,
      cursorStore,
      logger: componentLogger(logger, "event-loop"),
    },
    {
      coalesce: config.sync.coalesce,
      syncOnStart: config.sync.syncOnStart,
      fullSyncIntervalMs: config.sync.fullSyncIntervalMs,
    },
  );

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    webhookPath: config.server.webhookPath,
    events: eventLoop,
  });

  const adminApp = createAdminApp({
    logger,
    eventLoop,
    remote,
    summary: summarizeConfig(config),
  });

  return {
    app,
    adminApp,
    logger,
    config,
    configPath,
    version: pkg.version,
    startedAt,
    remote,
    cursorStore,
    pipeline,
    eventLoop,
    startBackgroundServices: () => {
      eventLoop.start();
    },
    cleanup: async () => {
      await eventLoop.stop();
    },
  };
}
