export {
  createInMemoryRemote,
  type InMemoryRemote,
  type InMemoryRemoteOptions,
} from "./remote.js";
