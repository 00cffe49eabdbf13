import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { IndexFormatError } from "../errors.js";
import type { StoredIndex } from "./types.js";

const StoredIndexSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string(),
  embeddingDimension: z.number().int().nonnegative(),
  entries: z.array(
    z.object({
      question: z.string(),
      answer: z.string(),
      embedding: z.array(z.number().finite())
    })
  )
});

export async function saveIndex(filePath: string, index: StoredIndex): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(index), "utf-8");
}

/** Returns null when no index has been written yet. */
export async function loadIndex(filePath: string): Promise<StoredIndex | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && (err as { code?: unknown }).code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new IndexFormatError(`Index is not valid JSON: ${filePath}\nRe-run: faqdesk ingest`);
  }

  const result = StoredIndexSchema.safeParse(parsed);
  if (!result.success) {
    const version = parsed && typeof parsed === "object" && "version" in parsed ? parsed.version : undefined;
    if (version !== 1) {
      throw new IndexFormatError("Unsupported index version");
    }
    throw new IndexFormatError(`Malformed index: ${filePath}\nRe-run: faqdesk ingest`);
  }
  return result.data;
}
