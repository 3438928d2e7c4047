import { DEFAULT_RETRIEVAL } from "../config/settings.js";
import type { ScoredChunk } from "../retrieval/types.js";
import { countTokens, type Tokenizer } from "../tokenizer/tiktoken.js";

export const PASSAGE_SEPARATOR = "\n\n";

export function formatPassage(position: number, text: string): string {
  return `[Passage ${position}]\n${text}`;
}

/**
 * Greedy, rank-ordered packing. The budget is measured on the assembled context
 * (labels and separators included); packing stops at the first passage that would
 * overflow it, even if a later one is smaller.
 */
export function buildContext(
  chunks: readonly ScoredChunk[],
  tokenizer: Tokenizer,
  maxTokens: number = DEFAULT_RETRIEVAL.maxContextTokens
): { context: string; used: ScoredChunk[]; tokenCount: number } {
  const parts: string[] = [];
  const used: ScoredChunk[] = [];
  let context = "";
  let tokenCount = 0;

  for (const scored of chunks) {
    const candidate = [...parts, formatPassage(parts.length + 1, scored.chunk.text)].join(PASSAGE_SEPARATOR);
    const candidateTokens = countTokens(tokenizer, candidate);
    if (candidateTokens > maxTokens) {
      break;
    }
    parts.push(formatPassage(parts.length + 1, scored.chunk.text));
    used.push(scored);
    context = candidate;
    tokenCount = candidateTokens;
  }

  return { context, used, tokenCount };
}
