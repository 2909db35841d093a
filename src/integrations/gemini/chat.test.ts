import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../../errors.js";
import { testSettings } from "../../test-utils/fakes.js";
import { createChatModel } from "./chat.js";
import { createEmbeddings } from "./embeddings.js";

describe("Gemini factories", () => {
  it("configures the chat model from settings with per-call overrides", () => {
    const llm = createChatModel(testSettings({ chatModel: "gemini-test" }), { temperature: 0.3 });

    expect(llm.model).toBe("gemini-test");
    expect(llm.temperature).toBe(0.3);
    expect(llm.maxOutputTokens).toBe(500);
  });

  it("configures embeddings with the embedding model", () => {
    expect(createEmbeddings(testSettings({ embeddingModel: "embedding-test" })).model).toBe("embedding-test");
  });

  it("requires an API key", () => {
    expect(() => createChatModel(testSettings({ googleApiKey: undefined }))).toThrow(ConfigurationError);
    expect(() => createEmbeddings(testSettings({ googleApiKey: undefined }))).toThrow(
      "GOOGLE_API_KEY is required for this operation"
    );
  });
});
