import type { CorpusIndex } from "./corpusIndex.js";
import type { EmbeddingVector, ScoredEntry } from "./types.js";
import { cosineSimilarity } from "./similarity.js";

/** Scores every indexed entry; highest first, ties in corpus order. */
export function rankEntries(queryVector: EmbeddingVector, index: CorpusIndex): ScoredEntry[] {
  return index.entries
    .map((indexed, position) => ({
      entry: indexed.entry,
      score: cosineSimilarity(queryVector, indexed.vector),
      position
    }))
    .sort((a, b) => b.score - a.score || a.position - b.position);
}

export function topK(ranked: readonly ScoredEntry[], k: number): ScoredEntry[] {
  return ranked.slice(0, Math.max(0, Math.floor(k)));
}
