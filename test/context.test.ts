import { describe, expect, it } from "vitest";

import { buildContext, formatPassage } from "../src/rag/context.js";
import type { ScoredChunk } from "../src/retrieval/types.js";
import { WordTokenizer } from "./helpers.js";

function scored(id: number, text: string): ScoredChunk {
  return {
    id,
    chunk: { id, documentId: "faq.txt", chunkIndex: id, text, tokenCount: text.split(" ").length, charCount: text.length },
    distance: 0,
    vectorSimilarity: 1,
    keywordScore: 0,
    score: 0.7
  };
}

describe("buildContext", () => {
  const tokenizer = new WordTokenizer();

  it("labels passages by their position in the context", () => {
    const { context, used } = buildContext([scored(4, "a b c"), scored(9, "d e f")], tokenizer, 100);
    expect(context).toBe("[Passage 1]\na b c\n\n[Passage 2]\nd e f");
    expect(used.map((u) => u.id)).toEqual([4, 9]);
  });

  it("stays within the token budget, labels included", () => {
    // Each passage is 2 label tokens + 3 text tokens.
    const chunks = [scored(0, "a b c"), scored(1, "d e f"), scored(2, "g h i")];
    const { context, used, tokenCount } = buildContext(chunks, tokenizer, 10);

    expect(used).toHaveLength(2);
    expect(tokenCount).toBe(10);
    expect(tokenizer.encode(context)).toHaveLength(10);
  });

  it("stops at the first passage that overflows even if a later one fits", () => {
    const chunks = [scored(0, "a b c"), scored(1, "one two three four five six seven eight nine ten"), scored(2, "z")];
    const { context, used } = buildContext(chunks, tokenizer, 12);

    expect(context).toBe(formatPassage(1, "a b c"));
    expect(used.map((u) => u.id)).toEqual([0]);
  });

  it("returns an empty context when nothing is ranked or nothing fits", () => {
    expect(buildContext([], tokenizer, 100)).toEqual({ context: "", used: [], tokenCount: 0 });
    expect(buildContext([scored(0, "a b c")], tokenizer, 4).context).toBe("");
  });
});
