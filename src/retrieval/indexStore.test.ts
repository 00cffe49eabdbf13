import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IndexFormatError } from "../errors.js";
import { loadIndex, saveIndex } from "./indexStore.js";
import type { StoredIndex } from "./types.js";

const sample: StoredIndex = {
  version: 1,
  embeddingModel: "test-model",
  embeddingDimension: 2,
  entries: [
    { question: "Q1", answer: "A1", embedding: [0.1, 0.2] },
    { question: "Q2", answer: "A2", embedding: [] }
  ]
};

describe("indexStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "faqdesk-index-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves into missing directories and loads the same index back", async () => {
    const file = path.join(dir, "nested", "index.json");

    await saveIndex(file, sample);

    await expect(loadIndex(file)).resolves.toEqual(sample);
  });

  it("returns null when no index exists", async () => {
    await expect(loadIndex(path.join(dir, "missing.json"))).resolves.toBeNull();
  });

  it("rejects another index version", async () => {
    const file = path.join(dir, "index.json");
    await fs.writeFile(file, JSON.stringify({ ...sample, version: 2 }), "utf-8");

    await expect(loadIndex(file)).rejects.toThrow("Unsupported index version");
  });

  it("rejects malformed entries", async () => {
    const file = path.join(dir, "index.json");
    await fs.writeFile(
      file,
      JSON.stringify({ ...sample, entries: [{ question: "Q", answer: "A", embedding: "1,2" }] }),
      "utf-8"
    );

    await expect(loadIndex(file)).rejects.toBeInstanceOf(IndexFormatError);
  });

  it("rejects a file that is not JSON", async () => {
    const file = path.join(dir, "index.json");
    await fs.writeFile(file, "{ not json", "utf-8");

    await expect(loadIndex(file)).rejects.toBeInstanceOf(IndexFormatError);
  });
});
