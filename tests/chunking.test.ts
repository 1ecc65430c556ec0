import { describe, expect, it } from "vitest";
import { chunkText, splitIntoSentences } from "../src/pipelines/chunking.js";

describe("splitIntoSentences", () => {
  it("splits after terminal punctuation followed by a capital letter", () => {
    expect(splitIntoSentences("Hello world. This is fine! Is it? yes it is.")).toEqual([
      "Hello world.",
      "This is fine!",
      "Is it? yes it is.",
    ]);
  });

  it("keeps abbreviations and short titles inside their sentence", () => {
    expect(splitIntoSentences("Use e.g. Markdown here. Then stop.")).toEqual([
      "Use e.g. Markdown here.",
      "Then stop.",
    ]);
    expect(splitIntoSentences("Mr. Smith arrived. He sat.")).toEqual([
      "Mr. Smith arrived.",
      "He sat.",
    ]);
  });
});

describe("chunkText", () => {
  const text = "Alpha one. Beta two. Gamma three. Delta four.";

  it("carries trailing sentences that fit in the overlap into the next chunk", () => {
    expect(chunkText(text, 25, 12)).toEqual([
      "Alpha one. Beta two.",
      "Beta two. Gamma three.",
      "Gamma three. Delta four.",
    ]);
  });

  it("packs without repetition when overlap is zero", () => {
    expect(chunkText(text, 25, 0)).toEqual(["Alpha one. Beta two.", "Gamma three. Delta four."]);
  });

  it("never emits a chunk longer than the chunk size", () => {
    const sentences = Array.from(
      { length: 40 },
      (_, i) => `Sentence number ${i} talks about topic ${i % 7} in some detail.`,
    );
    const chunks = chunkText(sentences.join(" "), 200, 60);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(200);
    }
    expect(chunks[chunks.length - 1].endsWith("Sentence number 39 talks about topic 4 in some detail.")).toBe(
      true,
    );
  });

  it("windows a sentence that is longer than the chunk size", () => {
    expect(chunkText("abcdefghijklmnopqrstuvwxyz", 10, 2)).toEqual([
      "abcdefghij",
      "ijklmnopqr",
      "qrstuvwxyz",
    ]);
  });

  it("returns nothing for blank text and rejects a non-positive size", () => {
    expect(chunkText("   ", 100, 10)).toEqual([]);
    expect(() => chunkText("text", 0, 0)).toThrow("chunkSize must be positive");
  });
});
