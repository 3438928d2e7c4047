import { DEFAULT_RETRIEVAL } from "../config/settings.js";
import type { Candidate, ChunkRecord, ScoredChunk } from "./types.js";
import { distanceToSimilarity, keywordOverlap } from "./similarity.js";

export type RerankOptions = {
  topK?: number;
  minScore?: number;
  vectorWeight?: number;
  keywordWeight?: number;
};

/**
 * Hybrid score: `vectorWeight * 1/(1+d) + keywordWeight * jaccard`. Candidates under
 * `minScore` are dropped before the cut to `topK`; equal scores keep input order.
 */
export function rerank(params: {
  question: string;
  candidates: readonly Candidate[];
  lookup: (id: number) => ChunkRecord | undefined;
  options?: RerankOptions;
}): ScoredChunk[] {
  const topK = params.options?.topK ?? DEFAULT_RETRIEVAL.rerankTopK;
  const minScore = params.options?.minScore ?? DEFAULT_RETRIEVAL.rerankMinScore;
  const vectorWeight = params.options?.vectorWeight ?? DEFAULT_RETRIEVAL.vectorWeight;
  const keywordWeight = params.options?.keywordWeight ?? DEFAULT_RETRIEVAL.keywordWeight;

  const scored: ScoredChunk[] = [];
  for (const candidate of params.candidates) {
    const chunk = params.lookup(candidate.id);
    if (!chunk) continue;

    const vectorSimilarity = distanceToSimilarity(candidate.distance);
    const keywordScore = keywordOverlap(params.question, chunk.text);
    const score = vectorWeight * vectorSimilarity + keywordWeight * keywordScore;

    if (score >= minScore) {
      scored.push({
        id: candidate.id,
        chunk,
        distance: candidate.distance,
        vectorSimilarity,
        keywordScore,
        score
      });
    }
  }

  return scored.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
}
