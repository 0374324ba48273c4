import { afterEach, describe, it, expect, vi } from "vitest";
import { CHAT_SYSTEM_MESSAGE, createGenerationClient } from "../../src/rag/generation-client.js";
import { ServiceError } from "../../src/rag/errors.js";
import { testConfig } from "../helpers/fakes.js";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createGenerationClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("chat", () => {
    it("sends the prompt as the user message", async () => {
      const fetchMock = vi.fn(async () =>
        jsonResponse({ choices: [{ message: { content: "Answer [source_1]" } }] }),
      );
      vi.stubGlobal("fetch", fetchMock);

      const client = createGenerationClient(testConfig());
      const answer = await client.generate("PROMPT");

      expect(answer).toBe("Answer [source_1]");
      expect(client.model).toBe("gpt-5.1");
      expect(fetchMock).toHaveBeenCalledWith(
        "https://llm.test/v1/chat/completions",
        expect.objectContaining({
          body: JSON.stringify({
            model: "gpt-5.1",
            messages: [
              { role: "system", content: CHAT_SYSTEM_MESSAGE },
              { role: "user", content: "PROMPT" },
            ],
          }),
        }),
      );
    });

    it("fails on empty content", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => jsonResponse({ choices: [{ message: { content: null } }] })),
      );

      await expect(createGenerationClient(testConfig()).generate("p")).rejects.toThrow(
        "Chat completion returned no content",
      );
    });

    it("propagates API errors", async () => {
      vi.stubGlobal("fetch", vi.fn(async () => new Response("model not found", { status: 404 })));

      await expect(createGenerationClient(testConfig()).generate("p")).rejects.toThrow(
        "generation API error (404): model not found",
      );
    });
  });

  describe("responses", () => {
    const config = () => testConfig({ llm: { apiKey: "test-secret", baseUrl: "https://llm.test/v1", api: "responses" } });

    it("joins the output text of message items", async () => {
      const fetchMock = vi.fn(async () =>
        jsonResponse({
          output: [
            { type: "reasoning", content: [{ type: "reasoning_text", text: "hidden" }] },
            {
              type: "message",
              content: [
                { type: "output_text", text: "First part. " },
                { type: "refusal" },
                { type: "output_text", text: "Second part." },
              ],
            },
          ],
        }),
      );
      vi.stubGlobal("fetch", fetchMock);

      const answer = await createGenerationClient(config()).generate("PROMPT");

      expect(answer).toBe("First part. Second part.");
      expect(fetchMock).toHaveBeenCalledWith(
        "https://llm.test/v1/responses",
        expect.objectContaining({ body: JSON.stringify({ model: "gpt-5.1", input: "PROMPT" }) }),
      );
    });

    it("fails when there is no output text", async () => {
      vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ output: [] })));

      await expect(createGenerationClient(config()).generate("p")).rejects.toBeInstanceOf(ServiceError);
    });
  });
});
