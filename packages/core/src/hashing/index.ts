export {
  BLOCK_SIZE,
  ContentHasher,
  hashBytes,
  hashStream,
  hashFile,
  filesMatch,
} from "./content-hasher.js";
