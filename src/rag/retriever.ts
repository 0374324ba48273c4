import { embedQuery, type EmbeddingClient } from "./embedding-service.js";
import type { RetrievedChunk } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

export interface RetrieverDeps {
  embedder: EmbeddingClient;
  index: VectorIndex;
}

/**
 * Embeds the question with the same client used at index time and returns the
 * `topK` nearest chunks in the index's own order. Nothing is filtered or
 * re-ranked.
 */
export async function retrieve(
  question: string,
  topK: number,
  deps: RetrieverDeps,
): Promise<RetrievedChunk[]> {
  const queryVector = await embedQuery(deps.embedder, question);
  const matches = await deps.index.query(queryVector, topK);

  return matches.slice(0, topK).map((m) => ({
    text: m.document,
    metadata: m.metadata,
    distance: m.distance,
  }));
}
