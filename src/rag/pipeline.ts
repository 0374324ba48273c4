import type { RagConfig } from "./config.js";
import { assembleContext } from "./context-builder.js";
import { createEmbeddingClient, type EmbeddingClient } from "./embedding-service.js";
import { createGenerationClient, type GenerationClient } from "./generation-client.js";
import { buildPrompt } from "./prompt.js";
import { retrieve } from "./retriever.js";
import type { Answer, Log } from "./types.js";
import { openVectorIndex, type VectorIndex } from "./vector-store.js";

export interface RagPipeline {
  /** Retrieves, assembles context, prompts and generates. Independent per call. */
  answerQuestion(question: string, topK?: number): Promise<Answer>;
  chunkCount(): Promise<number>;
}

export interface PipelineDeps {
  embedder?: EmbeddingClient;
  index?: VectorIndex;
  generator?: GenerationClient;
  log?: Log;
}

export async function createRagPipeline(
  config: RagConfig,
  deps: PipelineDeps = {},
): Promise<RagPipeline> {
  const log = deps.log ?? (() => {});
  const embedder = deps.embedder ?? createEmbeddingClient(config);
  const generator = deps.generator ?? createGenerationClient(config);
  const index =
    deps.index ?? (await openVectorIndex(config.paths.vectorDir, config.rag.collection));

  log(
    `RAG: collection "${index.collection}", embeddings ${embedder.model}, generation ${generator.model}`,
  );

  return {
    async answerQuestion(question: string, topK: number = config.rag.topK) {
      const sources = await retrieve(question, topK, { embedder, index });
      log(`RAG: retrieved ${sources.length} chunk(s)`);

      const context = assembleContext(sources);
      const prompt = buildPrompt(question, context);
      const answer = await generator.generate(prompt);

      return { answer, sources };
    },

    chunkCount() {
      return index.count();
    },
  };
}
