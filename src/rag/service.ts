import { errorMessage, InvalidInputError } from "../errors.js";
import type { CorpusIndex } from "../retrieval/corpusIndex.js";
import { DEFAULT_EMBED_TIMEOUT_MS, embedWithDeadline } from "../retrieval/corpusIndex.js";
import { rankEntries, topK } from "../retrieval/search.js";
import type { CompletionProvider, EmbeddingProvider, ScoredEntry } from "../retrieval/types.js";
import { createModuleLogger } from "../utils/logger.js";
import type { AnswerResult } from "./answer.js";
import {
  composeAnswer,
  DEFAULT_COMPLETION_TIMEOUT_MS,
  DEFAULT_MATCH_THRESHOLD,
  noMatchResult
} from "./answer.js";

const logger = createModuleLogger("retrieval");

export type RetrievalServiceOptions = {
  threshold?: number;
  embedTimeoutMs?: number;
  completionTimeoutMs?: number;
};

export type AnswerOptions = {
  signal?: AbortSignal;
};

export type RankedAnswer = {
  result: AnswerResult;
  /** Best entries for the query; empty when the query could not be embedded. */
  matches: ScoredEntry[];
};

export class RetrievalService {
  private readonly threshold: number;
  private readonly embedTimeoutMs: number;
  private readonly completionTimeoutMs: number;

  constructor(
    private readonly index: CorpusIndex,
    private readonly embedder: EmbeddingProvider,
    private readonly completer: CompletionProvider,
    opts: RetrievalServiceOptions = {}
  ) {
    this.threshold = opts.threshold ?? DEFAULT_MATCH_THRESHOLD;
    this.embedTimeoutMs = opts.embedTimeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
    this.completionTimeoutMs = opts.completionTimeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
  }

  get corpusIndex(): CorpusIndex {
    return this.index;
  }

  /**
   * Answers `query` from the corpus. Throws InvalidInputError for a blank
   * query; every provider failure comes back as a degraded result instead.
   */
  async answer(query: string, opts: AnswerOptions = {}): Promise<AnswerResult> {
    const { result } = await this.respond(query, opts);
    return result;
  }

  /** Same as `answer`, plus the `k` best entries from the same ranking. */
  async answerWithMatches(query: string, k: number, opts: AnswerOptions = {}): Promise<RankedAnswer> {
    const { result, ranked } = await this.respond(query, opts);
    return { result, matches: topK(ranked, k) };
  }

  private async respond(
    query: string,
    opts: AnswerOptions
  ): Promise<{ result: AnswerResult; ranked: ScoredEntry[] }> {
    const question = query.trim();
    if (!question) {
      throw new InvalidInputError();
    }

    let ranked: ScoredEntry[];
    try {
      ranked = await this.rankQuery(question, opts.signal);
    } catch (err: unknown) {
      logger.warn(`query not embedded: ${errorMessage(err)}`);
      return { result: noMatchResult(0, "embedding_unavailable"), ranked: [] };
    }

    const top = ranked[0];
    logger.debug(
      top ? `top match #${top.position} score=${top.score.toFixed(3)}` : "empty corpus"
    );

    const result = await composeAnswer(question, ranked, this.completer, {
      threshold: this.threshold,
      timeoutMs: this.completionTimeoutMs,
      signal: opts.signal
    });
    return { result, ranked };
  }

  /**
   * The `k` best corpus entries for `query`. Unlike `answer`, an embedding
   * failure is thrown as EmbeddingUnavailableError.
   */
  async search(query: string, k: number, opts: AnswerOptions = {}): Promise<ScoredEntry[]> {
    const question = query.trim();
    if (!question) {
      throw new InvalidInputError();
    }
    return topK(await this.rankQuery(question, opts.signal), k);
  }

  private async rankQuery(question: string, signal?: AbortSignal): Promise<ScoredEntry[]> {
    const queryVector = await embedWithDeadline(this.embedder, question, {
      timeoutMs: this.embedTimeoutMs,
      signal
    });
    return rankEntries(queryVector, this.index);
  }
}
