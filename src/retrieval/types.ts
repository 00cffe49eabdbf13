export type CorpusEntry = {
  readonly question: string;
  readonly answer: string;
};

/** Empty means the entry (or query) could not be embedded. */
export type EmbeddingVector = readonly number[];

export type IndexedEntry = {
  readonly entry: CorpusEntry;
  readonly vector: EmbeddingVector;
};

export type ScoredEntry = {
  entry: CorpusEntry;
  score: number;
  /** Position of the entry in the corpus. */
  position: number;
};

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface CompletionProvider {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export type StoredEntry = {
  question: string;
  answer: string;
  embedding: number[];
};

export type StoredIndex = {
  version: 1;
  embeddingModel: string;
  embeddingDimension: number;
  entries: StoredEntry[];
};
