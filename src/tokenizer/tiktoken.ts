import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";

import { ConfigurationError } from "../errors.js";

/**
 * Token accounting shared by chunking and context construction. Both phases must use
 * the same scheme or chunk sizes and the context budget drift apart.
 */
export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

const ENCODINGS: readonly TiktokenEncoding[] = ["gpt2", "r50k_base", "p50k_base", "p50k_edit", "cl100k_base", "o200k_base"];

const cache = new Map<TiktokenEncoding, Tiktoken>();

function isEncoding(name: string): name is TiktokenEncoding {
  return ENCODINGS.some((e) => e === name);
}

export function createTokenizer(encodingName = "cl100k_base"): Tokenizer {
  if (!isEncoding(encodingName)) {
    throw new ConfigurationError(
      `Unknown tokenizer encoding: ${encodingName}. Supported: ${ENCODINGS.join(", ")}`
    );
  }

  let encoding = cache.get(encodingName);
  if (!encoding) {
    encoding = getEncoding(encodingName);
    cache.set(encodingName, encoding);
  }
  const enc = encoding;

  return {
    encode: (text) => enc.encode(text),
    decode: (tokens) => enc.decode(tokens)
  };
}

export function countTokens(tokenizer: Tokenizer, text: string): number {
  return tokenizer.encode(text).length;
}
