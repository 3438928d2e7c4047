export { loadSettings, validateChunking, DEFAULT_CHUNKING, DEFAULT_RETRIEVAL } from "./config/settings.js";
export type { Settings, ChunkingSettings, RetrievalSettings } from "./config/settings.js";
export * from "./errors.js";
export { createTokenizer, countTokens } from "./tokenizer/tiktoken.js";
export type { Tokenizer } from "./tokenizer/tiktoken.js";
export { loadDocument, listSupportedFiles, SUPPORTED_EXTENSIONS } from "./loaders/document.js";
export { cleanText, chunkByTokens, tokenWindows } from "./rag/chunking.js";
export { buildContext, formatPassage } from "./rag/context.js";
export { Ingestion } from "./rag/ingest.js";
export type { CorpusStats, DocumentStats, IngestionSettings } from "./rag/ingest.js";
export { AnswerGenerator, NO_CONTEXT_RESPONSE, validateAnswer } from "./rag/answer.js";
export type { AnswerValidation, GeneratedAnswer } from "./rag/answer.js";
export { RagPipeline, createPipeline } from "./rag/pipeline.js";
export type { QueryResult, SystemInfo } from "./rag/pipeline.js";
export { ChunkStore } from "./retrieval/chunkStore.js";
export { VectorIndex } from "./retrieval/vectorIndex.js";
export { loadIndex, saveIndex, indexPaths } from "./retrieval/indexStore.js";
export { Retriever } from "./retrieval/retriever.js";
export type { RetrievalResult } from "./retrieval/retriever.js";
export { rerank } from "./retrieval/search.js";
export { keywordOverlap, distanceToSimilarity, squaredL2Distance } from "./retrieval/similarity.js";
export type { Candidate, ChunkRecord, ScoredChunk } from "./retrieval/types.js";
