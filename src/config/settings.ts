import path from "node:path";

import { ConfigurationError } from "../errors.js";

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant for payment-card customers that answers questions ONLY using the provided context.

RULES:
1. Only use information from the context.
2. If the answer is not in the context, respond: "I don't have enough information to answer this question."
3. Do not use external knowledge or make assumptions.
4. Keep answers concise and factual.
5. Quote relevant parts of the context when appropriate.
6. FORMATTING: Use Markdown for headers, lists, and bold text. Do NOT use HTML tags.`;

export type ChunkingSettings = {
  chunkSize: number;
  chunkOverlap: number;
  minChunkLength: number;
};

export type RetrievalSettings = {
  initialK: number;
  rerankTopK: number;
  rerankMinScore: number;
  vectorWeight: number;
  keywordWeight: number;
  maxContextTokens: number;
};

export type Settings = ChunkingSettings &
  RetrievalSettings & {
    googleApiKey: string;
    chatModel: string;
    embeddingModel: string;
    embeddingDimension?: number;
    tokenizerEncoding: string;
    indexDir: string;
    documentsDir: string;
    temperature: number;
    maxOutputTokens: number;
    systemPrompt: string;
  };

export const DEFAULT_CHUNKING: ChunkingSettings = {
  chunkSize: 600,
  chunkOverlap: 90,
  minChunkLength: 50
};

export const DEFAULT_RETRIEVAL: RetrievalSettings = {
  initialK: 20,
  rerankTopK: 5,
  rerankMinScore: 0.3,
  vectorWeight: 0.7,
  keywordWeight: 0.3,
  maxContextTokens: 3000
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${raw}`);
  }
  return parsed;
}

function readInteger(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return value;
}

export function validateChunking(params: { chunkSize: number; chunkOverlap: number }): void {
  const { chunkSize, chunkOverlap } = params;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got: ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got: ${chunkOverlap}`);
  }
  if (chunkSize - chunkOverlap <= 0) {
    throw new ConfigurationError(
      `Chunk stride must be positive: size=${chunkSize} overlap=${chunkOverlap}`
    );
  }
}

function validateRetrieval(settings: RetrievalSettings): void {
  for (const key of ["initialK", "rerankTopK", "maxContextTokens"] as const) {
    if (!Number.isInteger(settings[key]) || settings[key] <= 0) {
      throw new ConfigurationError(`${key} must be a positive integer, got: ${settings[key]}`);
    }
  }
  if (settings.vectorWeight < 0 || settings.keywordWeight < 0) {
    throw new ConfigurationError("Re-ranking weights must be non-negative");
  }
}

export function loadSettings(env: Env = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new ConfigurationError("GOOGLE_API_KEY is required");
  }

  const indexDir = env.CARDSENSE_INDEX_DIR ?? path.join(".cardsense", "index");
  const dimensionRaw = env.CARDSENSE_EMBEDDING_DIMENSION;
  const embeddingDimension =
    dimensionRaw == null || dimensionRaw.trim() === ""
      ? undefined
      : readInteger(env, "CARDSENSE_EMBEDDING_DIMENSION", 0);
  if (embeddingDimension !== undefined && embeddingDimension <= 0) {
    throw new ConfigurationError(`CARDSENSE_EMBEDDING_DIMENSION must be positive, got: ${embeddingDimension}`);
  }

  const chunking: ChunkingSettings = {
    chunkSize: readInteger(env, "CARDSENSE_CHUNK_SIZE", DEFAULT_CHUNKING.chunkSize),
    chunkOverlap: readInteger(env, "CARDSENSE_CHUNK_OVERLAP", DEFAULT_CHUNKING.chunkOverlap),
    minChunkLength: readInteger(env, "CARDSENSE_MIN_CHUNK_LENGTH", DEFAULT_CHUNKING.minChunkLength)
  };
  validateChunking(chunking);

  const retrieval: RetrievalSettings = {
    initialK: readInteger(env, "CARDSENSE_INITIAL_K", DEFAULT_RETRIEVAL.initialK),
    rerankTopK: readInteger(env, "CARDSENSE_RERANK_TOP_K", DEFAULT_RETRIEVAL.rerankTopK),
    rerankMinScore: readNumber(env, "CARDSENSE_RERANK_MIN_SCORE", DEFAULT_RETRIEVAL.rerankMinScore),
    vectorWeight: readNumber(env, "CARDSENSE_VECTOR_WEIGHT", DEFAULT_RETRIEVAL.vectorWeight),
    keywordWeight: readNumber(env, "CARDSENSE_KEYWORD_WEIGHT", DEFAULT_RETRIEVAL.keywordWeight),
    maxContextTokens: readInteger(env, "CARDSENSE_MAX_CONTEXT_TOKENS", DEFAULT_RETRIEVAL.maxContextTokens)
  };
  validateRetrieval(retrieval);

  return {
    ...chunking,
    ...retrieval,
    googleApiKey,
    chatModel: env.CARDSENSE_GEMINI_MODEL ?? "gemini-3-flash-preview",
    embeddingModel: env.CARDSENSE_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    embeddingDimension,
    tokenizerEncoding: env.CARDSENSE_TOKENIZER_ENCODING ?? "cl100k_base",
    indexDir,
    documentsDir: env.CARDSENSE_DOCUMENTS_DIR ?? path.join("data", "documents"),
    temperature: readNumber(env, "CARDSENSE_TEMPERATURE", 0.2),
    maxOutputTokens: readInteger(env, "CARDSENSE_MAX_OUTPUT_TOKENS", 1000),
    systemPrompt: env.CARDSENSE_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT
  };
}
