import "dotenv/config";
import minimist from "minimist";
import { exitOnError, loadConfigOrExit, optionalString } from "./cli-utils.js";
import { createEmbeddingClient } from "./rag/embedding-service.js";
import { buildIndex } from "./rag/indexer.js";
import { loadSources } from "./rag/sources.js";
import { openVectorIndex } from "./rag/vector-store.js";

async function main(): Promise<void> {
  const args = minimist(process.argv.slice(2), {
    string: ["config"],
    boolean: ["rebuild"],
  });
  const config = loadConfigOrExit(optionalString(args["config"]));
  const log = (msg: string) => console.log(msg);

  const { collections, skipped: malformed } = await loadSources(config.paths, log);
  const index = await openVectorIndex(config.paths.vectorDir, config.rag.collection);

  const report = await buildIndex(collections, {
    embedder: createEmbeddingClient(config),
    index,
    chunkSize: config.rag.chunkSize,
    chunkOverlap: config.rag.chunkOverlap,
    batchSize: config.rag.embeddingBatchSize,
    reset: args["rebuild"] === true,
    log,
  });

  log(
    `index: done: ${report.records} record(s), ${report.chunks} chunk(s) in ${report.batches} batch(es); ` +
      `${report.skipped.length} record(s) and ${malformed.length} line(s) skipped`,
  );
  log(`index: collection "${index.collection}" now holds ${await index.count()} chunk(s)`);
}

main().catch(exitOnError);
