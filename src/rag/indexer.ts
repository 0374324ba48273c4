import { chunkCollection, type ChunkSettings } from "./chunking/index.js";
import type { EmbeddingClient } from "./embedding-service.js";
import { isTransientError } from "./errors.js";
import { retry, type RetryOptions } from "./retry.js";
import type { IndexedEntry, Log, RecordCollection, SkippedItem, TextChunk } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

export const DEFAULT_EMBEDDING_BATCH_SIZE = 128;

export interface IndexerDeps extends ChunkSettings {
  embedder: EmbeddingClient;
  index: VectorIndex;
  batchSize?: number;
  /** Drop the collection before writing. */
  reset?: boolean;
  retry?: Partial<RetryOptions>;
  log?: Log;
}

export interface IndexReport {
  /** Records that produced chunks. */
  records: number;
  skipped: SkippedItem[];
  /** Chunks embedded and written. */
  chunks: number;
  batches: number;
}

/**
 * Chunks every record, embeds the chunks in fixed-size batches and upserts each
 * batch as soon as it is embedded. A batch that still fails after retries
 * aborts the run; batches written before it stay in the index.
 */
export async function buildIndex(
  collections: RecordCollection[],
  deps: IndexerDeps,
): Promise<IndexReport> {
  const log = deps.log ?? (() => {});
  const batchSize = deps.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`embedding batch size must be a positive integer, got ${batchSize}`);
  }

  const chunks: TextChunk[] = [];
  const skipped: SkippedItem[] = [];
  let records = 0;

  for (const collection of collections) {
    const result = chunkCollection(collection, deps);
    chunks.push(...result.chunks);
    skipped.push(...result.skipped);
    records += result.records;
    log(
      `index: ${collection.family}: ${result.records} record(s), ` +
        `${result.chunks.length} chunk(s), ${result.skipped.length} skipped`,
    );
  }

  if (deps.reset) {
    log(`index: resetting collection "${deps.index.collection}"`);
    await deps.index.reset();
  }

  if (chunks.length === 0) {
    log("index: no chunks to write");
    return { records, skipped, chunks: 0, batches: 0 };
  }

  const totalBatches = Math.ceil(chunks.length / batchSize);
  log(`index: embedding ${chunks.length} chunk(s) in ${totalBatches} batch(es) of ${batchSize}`);

  let written = 0;
  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);
    const batchNumber = i / batchSize + 1;
    const texts = batch.map((c) => c.text);

    const vectors = await retry(() => deps.embedder.embed(texts), {
      ...deps.retry,
      shouldRetry: deps.retry?.shouldRetry ?? isTransientError,
      onRetry: (error, attempt) => {
        log(`index: batch ${batchNumber}/${totalBatches} attempt ${attempt} failed: ${error.message}`);
        deps.retry?.onRetry?.(error, attempt);
      },
    });

    const entries: IndexedEntry[] = batch.map((chunk, j) => {
      const vector = vectors[j];
      if (!vector) {
        throw new Error(`Missing embedding for chunk ${chunk.id}`);
      }
      return { id: chunk.id, vector, document: chunk.text, metadata: chunk.metadata };
    });

    await deps.index.upsert(entries);
    written += entries.length;
    log(`index: batch ${batchNumber}/${totalBatches} written (${written}/${chunks.length})`);
  }

  return { records, skipped, chunks: written, batches: totalBatches };
}
