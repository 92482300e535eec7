import { z } from "zod";

export const DEFAULTS = {
  server: {
    host: "0.0.0.0",
    port: 3000,
    adminHost: "127.0.0.1",
    adminPort: 3001,
    webhookPath: "/webhook",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  remote: {
    root: "/",
    apiUrl: "https://api.dropboxapi.com",
    contentUrl: "https://content.dropboxapi.com",
    tokenEnv: "BLOGSYNC_ACCESS_TOKEN",
  },
  sync: {
    localBasePath: "./sync",
    cursorFile: ".sync_cursor",
    coalesce: true,
    syncOnStart: true,
    fullSyncIntervalMs: null,
  },
  build: {
    command: "zola build",
    workingDirectory: "./sync",
    timeoutMs: 600_000,
  },
  copyRules: [
    {
      source: "./sync/public/**/*",
      destination: "./output",
      recursive: true,
    },
  ],
};

const PortSchema = z.number().int().min(1).max(65535);

export const CopyRuleSchema = z.object({
  source: z.string().min(1).describe("Glob pattern of files to copy"),
  destination: z.string().min(1),
  recursive: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default(DEFAULTS.server.host),
      port: PortSchema.default(DEFAULTS.server.port),
      adminHost: z
        .string()
        .default(DEFAULTS.server.adminHost)
        .describe("Admin API interface, loopback unless exposed deliberately"),
      adminPort: PortSchema.default(DEFAULTS.server.adminPort),
      webhookPath: z
        .string()
        .startsWith("/")
        .default(DEFAULTS.server.webhookPath),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  remote: z
    .object({
      root: z.string().startsWith("/").default(DEFAULTS.remote.root),
      apiUrl: z.url().default(DEFAULTS.remote.apiUrl),
      contentUrl: z.url().default(DEFAULTS.remote.contentUrl),
      tokenEnv: z
        .string()
        .min(1)
        .default(DEFAULTS.remote.tokenEnv)
        .describe("Environment variable holding the access token"),
    })
    .default(DEFAULTS.remote),
  sync: z
    .object({
      localBasePath: z.string().min(1).default(DEFAULTS.sync.localBasePath),
      cursorFile: z.string().min(1).default(DEFAULTS.sync.cursorFile),
      coalesce: z.boolean().default(DEFAULTS.sync.coalesce),
      syncOnStart: z.boolean().default(DEFAULTS.sync.syncOnStart),
      fullSyncIntervalMs: z
        .number()
        .int()
        .positive()
        .nullable()
        .default(DEFAULTS.sync.fullSyncIntervalMs),
    })
    .default(DEFAULTS.sync),
  build: z
    .object({
      command: z
        .string()
        .nullable()
        .default(DEFAULTS.build.command)
        .describe("Shell command; empty or null skips the build"),
      workingDirectory: z
        .string()
        .min(1)
        .default(DEFAULTS.build.workingDirectory),
      timeoutMs: z.number().int().positive().default(DEFAULTS.build.timeoutMs),
    })
    .default(DEFAULTS.build),
  copyRules: z.array(CopyRuleSchema).default(DEFAULTS.copyRules),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LoggingConfig = AppConfig["logging"];
export type CopyRuleConfig = z.infer<typeof CopyRuleSchema>;
