import type { Settings } from "../config/settings.js";
import type { CompletionProvider, EmbeddingProvider } from "../retrieval/types.js";
import { createGeminiChatModel } from "./gemini/chat.js";
import { createGeminiEmbeddings } from "./gemini/embeddings.js";
import { completionProviderFrom, embeddingProviderFrom } from "./langchain.js";
import { createOllamaChatModel } from "./ollama/chat.js";
import { createOllamaEmbeddings } from "./ollama/embeddings.js";

export function createEmbeddingProvider(settings: Settings): EmbeddingProvider {
  const embeddings =
    settings.provider === "gemini" ? createGeminiEmbeddings(settings) : createOllamaEmbeddings(settings);
  return embeddingProviderFrom(embeddings);
}

export function createCompletionProvider(settings: Settings): CompletionProvider {
  const llm =
    settings.provider === "gemini" ? createGeminiChatModel(settings) : createOllamaChatModel(settings);
  return completionProviderFrom(llm, { systemPrompt: settings.systemPrompt });
}
