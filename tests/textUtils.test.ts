import { describe, expect, it } from "vitest";
import { scoreByTokenOverlap, tokenize, truncate } from "../src/utils/text.js";
import { cosineSimilarity } from "../src/utils/vector.js";

describe("text utils", () => {
  it("drops stop words and adds singular variants", () => {
    expect(tokenize("The Lessons about embeddings")).toEqual([
      "lessons",
      "lesson",
      "about",
      "embeddings",
      "embedding",
    ]);
  });

  it("does not strip the s from short words or double s endings", () => {
    expect(tokenize("bus class")).toEqual(["bus", "class"]);
  });

  it("scores token overlap only when something is shared", () => {
    expect(scoreByTokenOverlap("chunk overlap", "Chunk overlap keeps context")).toBeGreaterThan(0);
    expect(scoreByTokenOverlap("chunk overlap", "vectors and cosine")).toBe(0);
    expect(scoreByTokenOverlap("", "anything")).toBe(0);
  });

  it("truncates after collapsing whitespace", () => {
    expect(truncate("a  b \n  c", 10)).toBe("a b c");
    expect(truncate("abcdefghijkl", 8)).toBe("abcde...");
  });
});

describe("cosineSimilarity", () => {
  it("compares vector directions", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([], [1])).toBe(0);
  });
});
