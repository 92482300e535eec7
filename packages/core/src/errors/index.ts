export {
  SyncEngineError,
  ListingFailedError,
  BuildFailedError,
  RemoteApiError,
  PathOutsideRootError,
  HasherConsumedError,
  HttpError,
  InvalidRequestError,
  RemoteUnavailableError,
  errorMessage,
} from './catalog.js';
