export {
  AppConfigSchema,
  CopyRuleSchema,
  DEFAULTS,
  type AppConfig,
  type CopyRuleConfig,
  type LoggingConfig,
} from "./app-config.js";
