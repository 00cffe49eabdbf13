import { EmbeddingUnavailableError, errorMessage, IndexFormatError } from "../errors.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { callWithDeadline } from "../utils/deadline.js";
import { createModuleLogger } from "../utils/logger.js";
import type {
  CorpusEntry,
  EmbeddingProvider,
  IndexedEntry,
  StoredIndex
} from "./types.js";

const logger = createModuleLogger("corpus-index");

export const DEFAULT_EMBED_TIMEOUT_MS = 45_000;
export const DEFAULT_INDEX_CONCURRENCY = 4;

export type BuildIndexOptions = {
  timeoutMs?: number;
  concurrency?: number;
  signal?: AbortSignal;
};

export function embeddingText(entry: CorpusEntry): string {
  return `Question: ${entry.question}\nAnswer: ${entry.answer}`;
}

/** Rejects anything that is not a non-empty array of finite numbers. */
export function toEmbeddingVector(raw: unknown): number[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new EmbeddingUnavailableError("provider returned no vector");
  }
  const out: number[] = [];
  for (const value of raw) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new EmbeddingUnavailableError("provider returned a malformed vector");
    }
    out.push(value);
  }
  return out;
}

/**
 * Embeds `text` under a deadline. Every failure surfaces as
 * EmbeddingUnavailableError.
 */
export async function embedWithDeadline(
  embedder: EmbeddingProvider,
  text: string,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<number[]> {
  try {
    const raw = await callWithDeadline((signal) => embedder.embed(text, signal), {
      label: "embedding",
      timeoutMs: options.timeoutMs,
      signal: options.signal
    });
    return toEmbeddingVector(raw);
  } catch (err: unknown) {
    if (err instanceof EmbeddingUnavailableError) throw err;
    throw new EmbeddingUnavailableError(errorMessage(err), err);
  }
}

/** One vector per entry, in order; failed entries get the empty vector. */
async function embedEntries(
  entries: readonly CorpusEntry[],
  embedder: EmbeddingProvider,
  options: BuildIndexOptions
): Promise<number[][]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
  const concurrency = options.concurrency ?? DEFAULT_INDEX_CONCURRENCY;

  return mapWithConcurrency(entries, concurrency, async (entry, i) => {
    try {
      return await embedWithDeadline(embedder, embeddingText(entry), {
        timeoutMs,
        signal: options.signal
      });
    } catch (err: unknown) {
      logger.warn(`entry ${i} left without a vector: ${errorMessage(err)}`);
      return [];
    }
  });
}

export class CorpusIndex {
  readonly entries: readonly IndexedEntry[];
  /** 0 when no entry could be embedded. */
  readonly dimension: number;

  private constructor(entries: IndexedEntry[], dimension: number) {
    this.entries = Object.freeze(entries.map((e) => Object.freeze({ ...e })));
    this.dimension = dimension;
  }

  get size(): number {
    return this.entries.length;
  }

  get missingCount(): number {
    return this.entries.filter((e) => e.vector.length === 0).length;
  }

  static async build(
    entries: readonly CorpusEntry[],
    embedder: EmbeddingProvider,
    options: BuildIndexOptions = {}
  ): Promise<CorpusIndex> {
    const vectors = await embedEntries(entries, embedder, options);
    const index = CorpusIndex.assemble(entries, vectors, 0);
    logger.info(
      `indexed ${index.size} entries (dimension=${index.dimension}, missing=${index.missingCount})`
    );
    return index;
  }

  /**
   * Re-embeds only the entries stored without a vector. Returns this index
   * when nothing is missing.
   */
  async fillMissing(embedder: EmbeddingProvider, options: BuildIndexOptions = {}): Promise<CorpusIndex> {
    const missing = this.entries.flatMap((e, position) =>
      e.vector.length === 0 ? [{ position, entry: e.entry }] : []
    );
    if (missing.length === 0) return this;

    const fresh = await embedEntries(
      missing.map((m) => m.entry),
      embedder,
      options
    );
    const vectors = this.entries.map((e) => [...e.vector]);
    missing.forEach((m, j) => {
      vectors[m.position] = fresh[j] ?? [];
    });

    const index = CorpusIndex.assemble(
      this.entries.map((e) => e.entry),
      vectors,
      this.dimension
    );
    logger.info(
      `re-embedded ${missing.length} entries (still missing=${index.missingCount})`
    );
    return index;
  }

  /** `dimension` 0 takes the length of the first non-empty vector. */
  private static assemble(
    entries: readonly CorpusEntry[],
    vectors: readonly number[][],
    dimension: number
  ): CorpusIndex {
    const dim = dimension || (vectors.find((v) => v.length > 0)?.length ?? 0);
    const indexed = entries.map((entry, i): IndexedEntry => {
      const vector = vectors[i] ?? [];
      if (vector.length > 0 && vector.length !== dim) {
        logger.warn(`entry ${i} dimension mismatch: expected=${dim} actual=${vector.length}`);
        return { entry: { ...entry }, vector: [] };
      }
      return { entry: { ...entry }, vector };
    });
    return new CorpusIndex(indexed, dim);
  }

  static fromStored(stored: StoredIndex): CorpusIndex {
    const dimension = stored.embeddingDimension;
    const indexed = stored.entries.map((e, i): IndexedEntry => {
      if (e.embedding.length !== 0 && e.embedding.length !== dimension) {
        throw new IndexFormatError(
          `Embedding dimension mismatch at entry ${i}: expected=${dimension} actual=${e.embedding.length}`
        );
      }
      return { entry: { question: e.question, answer: e.answer }, vector: [...e.embedding] };
    });
    return new CorpusIndex(indexed, dimension);
  }

  toStored(embeddingModel: string): StoredIndex {
    return {
      version: 1,
      embeddingModel,
      embeddingDimension: this.dimension,
      entries: this.entries.map(({ entry, vector }) => ({
        question: entry.question,
        answer: entry.answer,
        embedding: [...vector]
      }))
    };
  }

  /** True when this index was built from exactly these entries, in order. */
  matchesCorpus(entries: readonly CorpusEntry[]): boolean {
    return (
      entries.length === this.entries.length &&
      entries.every((e, i) => {
        const own = this.entries[i]?.entry;
        return own !== undefined && own.question === e.question && own.answer === e.answer;
      })
    );
  }
}
