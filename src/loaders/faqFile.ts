import { promises as fs } from "node:fs";

import { z } from "zod";

import { CorpusFormatError } from "../errors.js";
import type { CorpusEntry } from "../retrieval/types.js";

const FaqFileSchema = z.array(
  z.object({
    question: z.string().trim().min(1, "question is empty"),
    answer: z.string().trim().min(1, "answer is empty")
  })
);

/** Validates parsed JSON as a list of question/answer pairs. */
export function parseFaqEntries(data: unknown): CorpusEntry[] {
  const result = FaqFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CorpusFormatError(`Invalid FAQ corpus${where}: ${issue?.message ?? "unknown error"}`);
  }
  return result.data.map(({ question, answer }) => ({ question, answer }));
}

export async function loadFaqFile(filePath: string): Promise<CorpusEntry[]> {
  const raw = await fs.readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CorpusFormatError(`FAQ corpus is not valid JSON: ${filePath}`);
  }
  return parseFaqEntries(parsed);
}
