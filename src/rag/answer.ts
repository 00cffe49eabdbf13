import { CompletionUnavailableError, errorMessage } from "../errors.js";
import type { CompletionProvider, ScoredEntry } from "../retrieval/types.js";
import { callWithDeadline } from "../utils/deadline.js";
import { createModuleLogger } from "../utils/logger.js";
import { buildGroundedPrompt } from "./prompt.js";

const logger = createModuleLogger("answer");

export const DEFAULT_MATCH_THRESHOLD = 0.5;
export const DEFAULT_COMPLETION_TIMEOUT_MS = 60_000;

export const NO_MATCH_MESSAGE =
  "I could not find a close match. Please rephrase or ask a team member.";
export const COMPLETION_UNAVAILABLE_MESSAGE =
  "I found a similar answer but could not reach the AI writer. Please try again later.";

export type AnswerOutcome =
  | "answered"
  | "no_confident_match"
  | "embedding_unavailable"
  | "completion_unavailable";

export type AnswerResult = {
  text: string;
  matchedQuestion: string | null;
  score: number;
  outcome: AnswerOutcome;
};

export type ComposeOptions = {
  threshold?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export function noMatchResult(
  score: number,
  outcome: "no_confident_match" | "embedding_unavailable" = "no_confident_match"
): AnswerResult {
  return { text: NO_MATCH_MESSAGE, matchedQuestion: null, score, outcome };
}

async function completeWithDeadline(
  complete: CompletionProvider,
  prompt: string,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<string> {
  try {
    return await callWithDeadline((signal) => complete.complete(prompt, signal), {
      label: "completion",
      timeoutMs: options.timeoutMs,
      signal: options.signal
    });
  } catch (err: unknown) {
    throw new CompletionUnavailableError(errorMessage(err), err);
  }
}

/**
 * Turns a ranking into an answer. Below the threshold the canned no-match
 * text is returned; otherwise the top entry's answer grounds the completion.
 * Completion failures still report the matched question and score.
 */
export async function composeAnswer(
  query: string,
  ranked: readonly ScoredEntry[],
  complete: CompletionProvider,
  options: ComposeOptions = {}
): Promise<AnswerResult> {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const top = ranked[0];

  if (!top || top.score < threshold) {
    return noMatchResult(top?.score ?? 0);
  }

  const prompt = buildGroundedPrompt(query, top.entry.answer);
  try {
    const generated = await completeWithDeadline(complete, prompt, {
      timeoutMs: options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS,
      signal: options.signal
    });
    return {
      text: generated.trim() || top.entry.answer,
      matchedQuestion: top.entry.question,
      score: top.score,
      outcome: "answered"
    };
  } catch (err: unknown) {
    const detail = errorMessage(err);
    logger.warn(detail);
    return {
      text: `${COMPLETION_UNAVAILABLE_MESSAGE} Technical details: ${detail}`,
      matchedQuestion: top.entry.question,
      score: top.score,
      outcome: "completion_unavailable"
    };
  }
}
