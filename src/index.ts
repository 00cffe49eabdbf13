export * from "./errors.js";
export type {
  CompletionProvider,
  CorpusEntry,
  EmbeddingProvider,
  EmbeddingVector,
  IndexedEntry,
  ScoredEntry,
  StoredIndex
} from "./retrieval/types.js";
export { cosineSimilarity } from "./retrieval/similarity.js";
export { rankEntries, topK } from "./retrieval/search.js";
export { CorpusIndex, embeddingText, type BuildIndexOptions } from "./retrieval/corpusIndex.js";
export { loadIndex, saveIndex } from "./retrieval/indexStore.js";
export {
  composeAnswer,
  NO_MATCH_MESSAGE,
  COMPLETION_UNAVAILABLE_MESSAGE,
  type AnswerOutcome,
  type AnswerResult,
  type ComposeOptions
} from "./rag/answer.js";
export { buildGroundedPrompt } from "./rag/prompt.js";
export {
  RetrievalService,
  type AnswerOptions,
  type RankedAnswer,
  type RetrievalServiceOptions
} from "./rag/service.js";
export { ingestFaqFile, openRetrievalService, type IngestSummary } from "./rag/ingest.js";
export { loadFaqFile, parseFaqEntries } from "./loaders/faqFile.js";
export { loadSettings, type Settings, type Provider } from "./config/settings.js";
export { completionProviderFrom, embeddingProviderFrom } from "./integrations/langchain.js";
export { createCompletionProvider, createEmbeddingProvider } from "./integrations/providers.js";
