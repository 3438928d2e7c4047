export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "is",
  "are",
  "was",
  "were",
  "what",
  "how",
  "why",
  "when",
  "where"
]);

export function squaredL2Distance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error("Embedding dimension mismatch");
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

/** Maps a non-negative distance into (0, 1]; 0 maps to 1. */
export function distanceToSimilarity(distance: number): number {
  return 1 / (1 + distance);
}

function wordSet(text: string): Set<string> {
  const words = new Set(text.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
  for (const stop of STOP_WORDS) {
    words.delete(stop);
  }
  return words;
}

/** Jaccard similarity of whitespace-separated, case-folded words minus stop words. */
export function keywordOverlap(question: string, chunkText: string): number {
  const q = wordSet(question);
  const c = wordSet(chunkText);
  if (q.size === 0 || c.size === 0) return 0;

  let intersection = 0;
  for (const w of q) {
    if (c.has(w)) intersection += 1;
  }
  const union = q.size + c.size - intersection;
  return union > 0 ? intersection / union : 0;
}
