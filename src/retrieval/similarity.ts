import type { EmbeddingVector } from "./types.js";

/**
 * Cosine similarity in [-1, 1]. Empty vectors, mismatched lengths and zero
 * norms score 0.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }
  let dot = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  const denom = Math.sqrt(a2) * Math.sqrt(b2);
  if (denom === 0) return 0;
  const score = dot / denom;
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(-1, score));
}
