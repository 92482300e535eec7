export {
  createServer,
  summarizeConfig,
  type CreateServerOptions,
  type ServerContext,
} from "./bootstrap.js";
export { createApp, type AppDeps } from "./app.js";
export { createAdminApp, type AdminAppDeps } from "./admin-app.js";
export { startServer, type RunningServer } from "./serve.js";
