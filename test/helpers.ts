import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { Embeddings } from "@langchain/core/embeddings";

import type { Tokenizer } from "../src/tokenizer/tiktoken.js";

/** One token per whitespace-separated word, so token arithmetic in tests is exact. */
export class WordTokenizer implements Tokenizer {
  private readonly ids = new Map<string, number>();
  private readonly words: string[] = [];

  encode(text: string): number[] {
    return text
      .split(/\s+/)
      .filter((w) => w.length > 0)
      .map((w) => {
        let id = this.ids.get(w);
        if (id === undefined) {
          id = this.words.length;
          this.words.push(w);
          this.ids.set(w, id);
        }
        return id;
      });
  }

  decode(tokens: number[]): string {
    return tokens.map((t) => this.words[t] ?? "").join(" ");
  }
}

export function words(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${String(i + 1).padStart(2, "0")}`).join(" ");
}

/**
 * Counts of a fixed vocabulary plus a constant bias dimension, L2-normalized.
 * Texts containing `failOn` make `embedDocuments` reject.
 */
export class KeywordEmbeddings extends Embeddings {
  documentCalls: string[][] = [];
  queryCalls: string[] = [];

  constructor(
    private readonly vocabulary: string[],
    private readonly failOn?: string
  ) {
    super({});
  }

  vector(text: string): number[] {
    const terms = text.toLowerCase().split(/[^a-z0-9]+/);
    const v = this.vocabulary.map((word) => terms.filter((t) => t === word).length);
    v.push(1);
    const norm = Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));
    return v.map((x) => x / norm);
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.documentCalls.push(documents);
    if (this.failOn && documents.some((d) => d.includes(this.failOn ?? ""))) {
      throw new Error("embedding service unavailable");
    }
    return documents.map((d) => this.vector(d));
  }

  async embedQuery(document: string): Promise<number[]> {
    this.queryCalls.push(document);
    return this.vector(document);
  }
}

export const CARD_VOCABULARY = ["contactless", "pin", "limit", "atm", "withdrawal", "fees", "apply", "card"];

export async function makeTempDir(prefix = "cardsense-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
