import type { Settings } from "../config/settings.js";
import { createCompletionProvider, createEmbeddingProvider } from "../integrations/providers.js";
import { loadFaqFile } from "../loaders/faqFile.js";
import { CorpusIndex } from "../retrieval/corpusIndex.js";
import { loadIndex, saveIndex } from "../retrieval/indexStore.js";
import type { CompletionProvider, EmbeddingProvider } from "../retrieval/types.js";
import { createModuleLogger } from "../utils/logger.js";
import { RetrievalService } from "./service.js";

const logger = createModuleLogger("ingest");

export type IngestSummary = {
  entries: number;
  missing: number;
  dimension: number;
};

export async function ingestFaqFile(params: {
  corpusPath: string;
  settings: Settings;
  embedder?: EmbeddingProvider;
}): Promise<IngestSummary> {
  const { settings } = params;
  const entries = await loadFaqFile(params.corpusPath);
  const embedder = params.embedder ?? createEmbeddingProvider(settings);

  const index = await CorpusIndex.build(entries, embedder, {
    timeoutMs: settings.embedTimeoutMs,
    concurrency: settings.indexConcurrency
  });
  await saveIndex(settings.indexPath, index.toStored(settings.embeddingModel));

  return { entries: index.size, missing: index.missingCount, dimension: index.dimension };
}

/**
 * Builds the service for the configured corpus, reusing the stored index when
 * it was made with the same embedding model from the same entries. Entries
 * stored without a vector are embedded again.
 */
export async function openRetrievalService(params: {
  settings: Settings;
  embedder?: EmbeddingProvider;
  completer?: CompletionProvider;
}): Promise<RetrievalService> {
  const { settings } = params;
  const embedder = params.embedder ?? createEmbeddingProvider(settings);
  const completer = params.completer ?? createCompletionProvider(settings);
  const entries = await loadFaqFile(settings.corpusPath);

  let index: CorpusIndex | null = null;
  const stored = await loadIndex(settings.indexPath);
  if (stored && stored.embeddingModel === settings.embeddingModel) {
    const candidate = CorpusIndex.fromStored(stored);
    if (candidate.matchesCorpus(entries) && candidate.missingCount > 0) {
      logger.info(`stored index lacks ${candidate.missingCount} vectors; re-embedding them`);
      index = await candidate.fillMissing(embedder, {
        timeoutMs: settings.embedTimeoutMs,
        concurrency: settings.indexConcurrency
      });
      await saveIndex(settings.indexPath, index.toStored(settings.embeddingModel));
    } else if (candidate.matchesCorpus(entries)) {
      index = candidate;
    } else {
      logger.info(`stored index is stale for ${settings.corpusPath}; rebuilding`);
    }
  } else if (stored) {
    logger.info(
      `stored index uses ${stored.embeddingModel}, configured ${settings.embeddingModel}; rebuilding`
    );
  }

  if (!index) {
    index = await CorpusIndex.build(entries, embedder, {
      timeoutMs: settings.embedTimeoutMs,
      concurrency: settings.indexConcurrency
    });
    await saveIndex(settings.indexPath, index.toStored(settings.embeddingModel));
  }

  return new RetrievalService(index, embedder, completer, {
    threshold: settings.matchThreshold,
    embedTimeoutMs: settings.embedTimeoutMs,
    completionTimeoutMs: settings.completionTimeoutMs
  });
}
