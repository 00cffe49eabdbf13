import { describe, expect, it } from "vitest";

import { RetrievalService } from "../../rag/service.js";
import { CorpusIndex } from "../../retrieval/corpusIndex.js";
import { failingEmbedder, stubCompleter, stubEmbedder } from "../../testing/providers.js";
import { askQuestion, formatAnswer } from "./ask.js";

const index = CorpusIndex.fromStored({
  version: 1,
  embeddingModel: "test-model",
  embeddingDimension: 2,
  entries: [
    { question: "Where are my invoices?", answer: "Under Settings > Billing.", embedding: [0, 1] },
    { question: "How do I reset my password?", answer: "Use the reset link.", embedding: [1, 0] }
  ]
});

describe("formatAnswer", () => {
  it("rounds the score and names the matched question", () => {
    expect(
      formatAnswer({
        text: "Use the reset link.",
        matchedQuestion: "How do I reset my password?",
        score: 0.98765,
        outcome: "answered"
      })
    ).toEqual({
      answer: "Use the reset link.",
      match_question: "How do I reset my password?",
      match_score: 0.988,
      outcome: "answered"
    });
  });

  it("leaves out match_question when nothing matched", () => {
    const response = formatAnswer({
      text: "No match.",
      matchedQuestion: null,
      score: 0.31234,
      outcome: "no_confident_match"
    });

    expect(response).toEqual({ answer: "No match.", match_score: 0.312, outcome: "no_confident_match" });
    expect("match_question" in response).toBe(false);
  });
});

describe("askQuestion", () => {
  it("embeds the query once and lists matches from the same ranking", async () => {
    let calls = 0;
    const embedder = stubEmbedder(() => {
      calls += 1;
      if (calls > 1) throw new Error("second call");
      return [1, 0];
    });
    const service = new RetrievalService(index, embedder, stubCompleter(() => "Use the reset link."));

    const response = await askQuestion(service, "reset password", 2);

    expect(embedder.calls).toEqual(["reset password"]);
    expect(response).toEqual({
      answer: "Use the reset link.",
      match_question: "How do I reset my password?",
      match_score: 1,
      outcome: "answered",
      matches: [
        { question: "How do I reset my password?", score: 1 },
        { question: "Where are my invoices?", score: 0 }
      ]
    });
  });

  it("still returns the answer when the query cannot be ranked", async () => {
    const service = new RetrievalService(index, failingEmbedder(), stubCompleter(() => "unused"));

    const response = await askQuestion(service, "reset password", 3);

    expect(response.outcome).toBe("embedding_unavailable");
    expect(response.match_score).toBe(0);
    expect(response.matches).toEqual([]);
  });

  it("leaves out matches without --top", async () => {
    const service = new RetrievalService(index, stubEmbedder(() => [0, 1]), stubCompleter(() => "Billing."));

    const response = await askQuestion(service, "invoices", 0);

    expect(response).toEqual({
      answer: "Billing.",
      match_question: "Where are my invoices?",
      match_score: 1,
      outcome: "answered"
    });
  });
});
