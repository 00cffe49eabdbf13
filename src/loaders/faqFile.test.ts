import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { CorpusFormatError } from "../errors.js";
import { loadFaqFile, parseFaqEntries } from "./faqFile.js";

describe("parseFaqEntries", () => {
  it("keeps order and trims fields", () => {
    expect(
      parseFaqEntries([
        { question: "  First? ", answer: "One. " },
        { question: "Second?", answer: "Two.", tags: ["ignored"] }
      ])
    ).toEqual([
      { question: "First?", answer: "One." },
      { question: "Second?", answer: "Two." }
    ]);
  });

  it("accepts an empty corpus", () => {
    expect(parseFaqEntries([])).toEqual([]);
  });

  it("names the position of a missing field", () => {
    expect(() => parseFaqEntries([{ question: "Q", answer: "A" }, { question: "Q2" }])).toThrow(
      /Invalid FAQ corpus at 1\.answer/
    );
  });

  it("rejects blank answers", () => {
    expect(() => parseFaqEntries([{ question: "Q", answer: "   " }])).toThrow(
      "Invalid FAQ corpus at 0.answer: answer is empty"
    );
  });

  it("rejects a document that is not a list", () => {
    expect(() => parseFaqEntries({ question: "Q", answer: "A" })).toThrow(CorpusFormatError);
  });
});

describe("loadFaqFile", () => {
  it("reads the bundled sample corpus", async () => {
    const entries = await loadFaqFile(path.join(process.cwd(), "data", "faq.json"));

    expect(entries.length).toBeGreaterThan(0);
    expect(entries[0]?.question).toBe("How do I reset my password?");
  });

  it("rejects invalid JSON", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "faqdesk-corpus-"));
    const file = path.join(dir, "faq.json");
    await fs.writeFile(file, "[{", "utf-8");

    try {
      await expect(loadFaqFile(file)).rejects.toBeInstanceOf(CorpusFormatError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
