import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import type { CompletionProvider, EmbeddingProvider } from "../retrieval/types.js";

/** Flattens string or block-list message content to plain text. */
export function messageText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content
    .map((part: unknown) => {
      if (typeof part === "string") return part;
      if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
        return part.text;
      }
      return "";
    })
    .join("");
}

/**
 * `embedQuery` takes no AbortSignal, so the signal is only checked before the
 * request starts; an aborted request keeps running until the provider answers.
 */
export function embeddingProviderFrom(embeddings: EmbeddingsInterface): EmbeddingProvider {
  return {
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
      signal?.throwIfAborted();
      return embeddings.embedQuery(text);
    }
  };
}

export function completionProviderFrom(
  llm: BaseChatModel,
  params: { systemPrompt?: string } = {}
): CompletionProvider {
  return {
    async complete(prompt: string, signal?: AbortSignal): Promise<string> {
      const messages = params.systemPrompt
        ? [new SystemMessage(params.systemPrompt), new HumanMessage(prompt)]
        : [new HumanMessage(prompt)];
      const result = await llm.invoke(messages, { signal });
      return messageText(result.content);
    }
  };
}
