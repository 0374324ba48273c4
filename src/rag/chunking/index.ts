export { chunkText } from "./window-chunker.js";
export {
  chunkCollection,
  type ChunkSettings,
  type ChunkedCollection,
} from "./record-chunker.js";
