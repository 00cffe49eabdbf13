import { describe, expect, it } from "vitest";

import { loadSettings } from "./settings.js";

describe("loadSettings", () => {
  it("defaults to a local Ollama setup", () => {
    const settings = loadSettings({});

    expect(settings).toMatchObject({
      provider: "ollama",
      ollamaBaseUrl: "http://localhost:11434",
      chatModel: "llama3",
      embeddingModel: "nomic-embed-text",
      corpusPath: "data/faq.json",
      indexPath: ".faqdesk/index.json",
      matchThreshold: 0.5,
      embedTimeoutMs: 45_000,
      completionTimeoutMs: 60_000,
      indexConcurrency: 4,
      logLevel: "info"
    });
    expect(settings.systemPrompt.length).toBeGreaterThan(0);
  });

  it("switches model defaults for Gemini", () => {
    const settings = loadSettings({ FAQDESK_PROVIDER: "gemini", GEMINI_API_KEY: "test-key" });

    expect(settings.provider).toBe("gemini");
    expect(settings.googleApiKey).toBe("test-key");
    expect(settings.chatModel).toBe("gemini-2.5-flash");
    expect(settings.embeddingModel).toBe("gemini-embedding-001");
  });

  it("requires an API key for Gemini", () => {
    expect(() => loadSettings({ FAQDESK_PROVIDER: "gemini" })).toThrow("GOOGLE_API_KEY is required");
  });

  it("reads overrides", () => {
    const settings = loadSettings({
      FAQDESK_MATCH_THRESHOLD: "0.72",
      FAQDESK_EMBED_TIMEOUT_MS: "30000",
      FAQDESK_INDEX_CONCURRENCY: "1",
      FAQDESK_CHAT_MODEL: "mistral",
      LOG_LEVEL: "DEBUG"
    });

    expect(settings.matchThreshold).toBe(0.72);
    expect(settings.embedTimeoutMs).toBe(30_000);
    expect(settings.indexConcurrency).toBe(1);
    expect(settings.chatModel).toBe("mistral");
    expect(settings.logLevel).toBe("debug");
  });

  it.each([
    [{ FAQDESK_PROVIDER: "openai" }, "FAQDESK_PROVIDER"],
    [{ FAQDESK_MATCH_THRESHOLD: "1.5" }, "FAQDESK_MATCH_THRESHOLD"],
    [{ FAQDESK_MATCH_THRESHOLD: "high" }, "FAQDESK_MATCH_THRESHOLD"],
    [{ FAQDESK_COMPLETION_TIMEOUT_MS: "0" }, "FAQDESK_COMPLETION_TIMEOUT_MS"]
  ])("rejects %j", (env, name) => {
    expect(() => loadSettings(env)).toThrow(name);
  });
});
