import path from "node:path";

import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { ChunkingSettings } from "../config/settings.js";
import { ConfigurationError, EmbeddingFailureError, errorMessage } from "../errors.js";
import { listSupportedFiles, loadDocument } from "../loaders/document.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ChunkStore } from "../retrieval/chunkStore.js";
import { saveIndex } from "../retrieval/indexStore.js";
import type { NewChunk } from "../retrieval/types.js";
import { countTokens, type Tokenizer } from "../tokenizer/tiktoken.js";
import { chunkByTokens, cleanText } from "./chunking.js";

export type IngestionSettings = ChunkingSettings & {
  embeddingModel: string;
  embeddingDimension?: number;
  indexDir: string;
};

export type DocumentStats = {
  documentId: string;
  numChunks: number;
  totalTokens: number;
  avgTokens: number;
};

export type CorpusStats = {
  totalChunks: number;
  totalDocuments: number;
  totalTokens: number;
  avgChunkTokens: number;
  minChunkTokens: number;
  maxChunkTokens: number;
};

/** Nothing is durable until `saveIndex`. */
export class Ingestion {
  readonly store: ChunkStore;
  readonly failed: string[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly settings: IngestionSettings,
    private readonly deps: {
      embeddings: EmbeddingsInterface;
      tokenizer: Tokenizer;
      store?: ChunkStore;
      logger?: Logger;
    }
  ) {
    this.store = deps.store ?? new ChunkStore();
    this.logger = deps.logger ?? createLogger("ingestion");
  }

  async embed(chunks: string[]): Promise<number[][]> {
    if (chunks.length === 0) return [];

    this.logger.debug({ count: chunks.length }, "generating embeddings");
    let vectors: number[][];
    try {
      vectors = await this.deps.embeddings.embedDocuments(chunks);
    } catch (err: unknown) {
      throw new EmbeddingFailureError(`Embedding request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (vectors.length !== chunks.length) {
      throw new EmbeddingFailureError(
        `Embedding count mismatch: texts=${chunks.length} embeddings=${vectors.length}`
      );
    }

    const expected = this.settings.embeddingDimension ?? this.store.dimension ?? vectors[0]?.length ?? 0;
    if (expected <= 0) {
      throw new ConfigurationError(
        `Embedding dimension invalid (${expected}). Check embedding model: ${this.settings.embeddingModel}`
      );
    }
    vectors.forEach((v, i) => {
      if (v.length !== expected) {
        throw new ConfigurationError(
          `Embedding dimension mismatch at chunk ${i}: expected=${expected} actual=${v.length}`
        );
      }
    });

    return vectors;
  }

  async ingestDocument(filePath: string, documentId?: string): Promise<DocumentStats> {
    const id = documentId ?? path.basename(filePath);
    const log = this.logger.child({ documentId: id });

    log.info({ filePath }, "loading document");
    const raw = await loadDocument(filePath);
    const cleaned = cleanText(raw);

    log.debug(
      { chunkSize: this.settings.chunkSize, overlap: this.settings.chunkOverlap },
      "chunking text"
    );
    const texts = chunkByTokens(cleaned, this.deps.tokenizer, this.settings);
    const vectors = await this.embed(texts);

    const chunks: NewChunk[] = texts.map((text, chunkIndex) => ({
      documentId: id,
      chunkIndex,
      text,
      tokenCount: countTokens(this.deps.tokenizer, text),
      charCount: text.length
    }));
    this.store.append(chunks, vectors);

    const totalTokens = chunks.reduce((sum, c) => sum + c.tokenCount, 0);
    const stats: DocumentStats = {
      documentId: id,
      numChunks: chunks.length,
      totalTokens,
      avgTokens: chunks.length > 0 ? totalTokens / chunks.length : 0
    };
    log.info(stats, "document ingested");
    return stats;
  }

  /** Failures are logged and skipped; one bad document never aborts the batch. */
  async ingestDocuments(filePaths: readonly string[]): Promise<DocumentStats[]> {
    const stats: DocumentStats[] = [];
    for (const filePath of filePaths) {
      try {
        stats.push(await this.ingestDocument(filePath));
      } catch (err: unknown) {
        this.failed.push(filePath);
        this.logger.error({ filePath, err }, "failed to ingest document");
      }
    }
    return stats;
  }

  async ingestDirectory(dir: string): Promise<DocumentStats[]> {
    const files = await listSupportedFiles(dir);
    this.logger.info({ dir, files: files.length }, "ingesting directory");
    return this.ingestDocuments(files);
  }

  async saveIndex(): Promise<void> {
    await saveIndex(this.settings.indexDir, this.store, this.settings.embeddingModel);
    this.logger.info({ indexDir: this.settings.indexDir, chunks: this.store.size }, "index saved");
  }

  getStats(): CorpusStats {
    const records = this.store.all();
    if (records.length === 0) {
      return {
        totalChunks: 0,
        totalDocuments: 0,
        totalTokens: 0,
        avgChunkTokens: 0,
        minChunkTokens: 0,
        maxChunkTokens: 0
      };
    }

    const tokenCounts = records.map((r) => r.tokenCount);
    const totalTokens = tokenCounts.reduce((sum, n) => sum + n, 0);
    return {
      totalChunks: records.length,
      totalDocuments: new Set(records.map((r) => r.documentId)).size,
      totalTokens,
      avgChunkTokens: totalTokens / records.length,
      minChunkTokens: Math.min(...tokenCounts),
      maxChunkTokens: Math.max(...tokenCounts)
    };
  }
}
