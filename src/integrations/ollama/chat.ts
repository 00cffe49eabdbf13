import { ChatOllama } from "@langchain/ollama";

import type { Settings } from "../../config/settings.js";

export function createOllamaChatModel(settings: Settings): ChatOllama {
  return new ChatOllama({
    baseUrl: settings.ollamaBaseUrl,
    model: settings.chatModel,
    temperature: 0.3
  });
}
