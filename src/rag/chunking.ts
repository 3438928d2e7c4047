import { DEFAULT_CHUNKING, validateChunking, type ChunkingSettings } from "../config/settings.js";
import type { Tokenizer } from "../tokenizer/tiktoken.js";

export type TokenWindow = {
  start: number;
  end: number;
};

/**
 * Lossy normalization: whitespace runs become one space, anything outside word
 * characters and basic punctuation is dropped, ends are trimmed.
 */
export function cleanText(rawText: string): string {
  return rawText
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}\p{M}_\s.,!?;:()\-'"]+/gu, "")
    .trim();
}

/**
 * Windows of `chunkSize` tokens advancing by `chunkSize - chunkOverlap`. The last
 * window ends at `tokenCount`; no window starts inside one that already reached it.
 */
export function tokenWindows(
  tokenCount: number,
  chunkSize: number,
  chunkOverlap: number
): TokenWindow[] {
  validateChunking({ chunkSize, chunkOverlap });

  const stride = chunkSize - chunkOverlap;
  const windows: TokenWindow[] = [];
  let start = 0;

  while (start < tokenCount) {
    const end = Math.min(tokenCount, start + chunkSize);
    windows.push({ start, end });
    if (end >= tokenCount) {
      break;
    }
    start += stride;
  }

  return windows;
}

export function chunkByTokens(
  text: string,
  tokenizer: Tokenizer,
  options: Partial<ChunkingSettings> = {}
): string[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNKING.chunkSize;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNKING.chunkOverlap;
  const minChunkLength = options.minChunkLength ?? DEFAULT_CHUNKING.minChunkLength;

  const tokens = tokenizer.encode(text);
  const chunks: string[] = [];

  for (const window of tokenWindows(tokens.length, chunkSize, chunkOverlap)) {
    const chunkText = tokenizer.decode(tokens.slice(window.start, window.end));
    if (chunkText.length >= minChunkLength) {
      chunks.push(chunkText);
    }
  }

  return chunks;
}
