import type { Settings } from "../../config/settings.js";
import type { AnswerResult } from "../../rag/answer.js";
import { openRetrievalService } from "../../rag/ingest.js";
import type { RetrievalService } from "../../rag/service.js";
import { parseAskArgs } from "../parse.js";

export type AskResponse = {
  answer: string;
  match_question?: string;
  match_score: number;
  outcome: AnswerResult["outcome"];
  matches?: Array<{ question: string; score: number }>;
};

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function formatAnswer(result: AnswerResult): AskResponse {
  return {
    answer: result.text,
    ...(result.matchedQuestion !== null ? { match_question: result.matchedQuestion } : {}),
    match_score: round3(result.score),
    outcome: result.outcome
  };
}

/** Answers once; with `top` > 0 the matches come from the same ranking. */
export async function askQuestion(
  service: RetrievalService,
  question: string,
  top: number
): Promise<AskResponse> {
  if (top <= 0) {
    return formatAnswer(await service.answer(question));
  }
  const { result, matches } = await service.answerWithMatches(question, top);
  return {
    ...formatAnswer(result),
    matches: matches.map((s) => ({ question: s.entry.question, score: round3(s.score) }))
  };
}

export async function runAskCommand(args: string[], settings: Settings): Promise<void> {
  const { question, top } = parseAskArgs(args);
  if (!question) {
    throw new Error("Usage: faqdesk ask [--top N] <question>");
  }

  const service = await openRetrievalService({ settings });
  const response = await askQuestion(service, question, top);
  process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
}
