export type {
  AccountInfo,
  RemoteEntry,
  ListResult,
  ListPage,
  ChangeSet,
  RemoteSource,
  TokenProvider,
} from "./types.js";
export {
  createDropboxClient,
  httpHeaderSafeJson,
  DEFAULT_API_URL,
  DEFAULT_CONTENT_URL,
  type DropboxClientOptions,
} from "./dropbox.js";
export {
  createStaticTokenProvider,
  createEnvTokenProvider,
  DEFAULT_TOKEN_ENV,
} from "./token.js";
