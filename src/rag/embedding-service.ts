import { z } from "zod";
import type { RagConfig } from "./config.js";
import { ServiceError } from "./errors.js";
import { postJson } from "./http.js";

export interface EmbeddingClient {
  readonly model: string;
  /** Returns one vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().optional(),
    }),
  ),
});

/** Client for an OpenAI-compatible `/embeddings` endpoint. */
export function createEmbeddingClient(config: RagConfig): EmbeddingClient {
  const { apiKey, baseUrl, embedModel, timeoutMs } = config.llm;
  const url = `${baseUrl}/embeddings`;

  return {
    model: embedModel,
    async embed(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) return [];

      const json = await postJson(
        url,
        { model: embedModel, input: texts },
        embeddingResponseSchema,
        { service: "embedding", apiKey, timeoutMs },
      );

      if (json.data.length !== texts.length) {
        throw new ServiceError(
          "embedding",
          `Embedding count mismatch: expected ${texts.length}, got ${json.data.length}`,
        );
      }

      // Items carry their input position; restore it when the backend reorders.
      const ordered = json.data
        .map((item, position) => ({ index: item.index ?? position, embedding: item.embedding }))
        .sort((a, b) => a.index - b.index);
      return ordered.map((item) => item.embedding);
    },
  };
}

export async function embedQuery(client: EmbeddingClient, query: string): Promise<number[]> {
  const [embedding] = await client.embed([query]);
  if (!embedding) {
    throw new ServiceError("embedding", "Embedding API returned no vector for the query");
  }
  return embedding;
}
