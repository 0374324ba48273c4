import { z } from "zod";
import type { RagConfig } from "./config.js";
import { ServiceError } from "./errors.js";
import { postJson } from "./http.js";

export interface GenerationClient {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export const CHAT_SYSTEM_MESSAGE =
  "You are a helpful assistant for clinical guideline question answering.";

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const responsesResponseSchema = z.object({
  output: z.array(
    z.object({
      type: z.string(),
      content: z
        .array(z.object({ type: z.string(), text: z.string().optional() }))
        .optional(),
    }),
  ),
});

/**
 * Client for an OpenAI-compatible generation endpoint. `llm.api` selects the
 * call shape: `chat` uses /chat/completions, `responses` uses /responses.
 * Errors propagate to the caller; there is no retry or fallback model.
 */
export function createGenerationClient(config: RagConfig): GenerationClient {
  const { apiKey, baseUrl, model, timeoutMs, api } = config.llm;
  const options = { service: "generation" as const, apiKey, timeoutMs };

  if (api === "responses") {
    return {
      model,
      async generate(prompt: string) {
        const json = await postJson(
          `${baseUrl}/responses`,
          { model, input: prompt },
          responsesResponseSchema,
          options,
        );
        const text = json.output
          .filter((item) => item.type === "message")
          .flatMap((item) => item.content ?? [])
          .filter((part) => part.type === "output_text")
          .map((part) => part.text ?? "")
          .join("");
        if (!text) {
          throw new ServiceError("generation", "Responses API returned no output text");
        }
        return text;
      },
    };
  }

  return {
    model,
    async generate(prompt: string) {
      const json = await postJson(
        `${baseUrl}/chat/completions`,
        {
          model,
          messages: [
            { role: "system", content: CHAT_SYSTEM_MESSAGE },
            { role: "user", content: prompt },
          ],
        },
        chatResponseSchema,
        options,
      );
      const content = json.choices[0]?.message.content;
      if (!content) {
        throw new ServiceError("generation", "Chat completion returned no content");
      }
      return content;
    },
  };
}
