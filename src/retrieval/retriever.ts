import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { DEFAULT_RETRIEVAL, type RetrievalSettings } from "../config/settings.js";
import { EmbeddingFailureError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { buildContext } from "../rag/context.js";
import type { Tokenizer } from "../tokenizer/tiktoken.js";
import type { ChunkStore } from "./chunkStore.js";
import { loadIndex } from "./indexStore.js";
import { rerank } from "./search.js";
import type { Candidate, ScoredChunk } from "./types.js";

export type RetrievalResult = {
  context: string;
  numChunks: number;
  question: string;
  chunks?: ScoredChunk[];
};

export type RetrieverDeps = {
  embeddings: EmbeddingsInterface;
  tokenizer: Tokenizer;
  logger?: Logger;
};

// The store is never mutated here.
export class Retriever {
  private readonly settings: RetrievalSettings;
  private readonly logger: Logger;

  constructor(
    readonly store: ChunkStore,
    private readonly deps: RetrieverDeps,
    settings: Partial<RetrievalSettings> = {}
  ) {
    this.settings = { ...DEFAULT_RETRIEVAL, ...settings };
    this.logger = deps.logger ?? createLogger("retrieval");
  }

  static async open(
    settings: Partial<RetrievalSettings> & {
      indexDir: string;
      embeddingModel: string;
      embeddingDimension?: number;
    },
    deps: RetrieverDeps
  ): Promise<Retriever> {
    const { store } = await loadIndex(settings.indexDir, {
      embeddingModel: settings.embeddingModel,
      embeddingDimension: settings.embeddingDimension
    });
    const retriever = new Retriever(store, deps, settings);
    retriever.logger.info({ indexDir: settings.indexDir, chunks: store.size }, "index loaded");
    return retriever;
  }

  preprocessQuestion(question: string): string {
    const q = question.replace(/\s+/g, " ").trim();
    return q && !q.endsWith("?") ? `${q}?` : q;
  }

  async retrieveInitialCandidates(question: string, k: number = this.settings.initialK): Promise<Candidate[]> {
    if (this.store.size === 0) return [];

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.deps.embeddings.embedQuery(question);
    } catch (err: unknown) {
      throw new EmbeddingFailureError(`Query embedding failed: ${errorMessage(err)}`, { cause: err });
    }

    const { distances, positions } = this.store.search(queryEmbedding, k);
    const candidates: Candidate[] = [];
    positions.forEach((id, i) => {
      const distance = distances[i];
      if (distance !== undefined && id >= 0 && id < this.store.size) {
        candidates.push({ id, distance });
      }
    });
    return candidates;
  }

  rerank(
    question: string,
    candidates: readonly Candidate[],
    topK: number = this.settings.rerankTopK,
    minScore: number = this.settings.rerankMinScore
  ): ScoredChunk[] {
    return rerank({
      question,
      candidates,
      lookup: (id) => this.store.get(id),
      options: {
        topK,
        minScore,
        vectorWeight: this.settings.vectorWeight,
        keywordWeight: this.settings.keywordWeight
      }
    });
  }

  constructContext(ranked: readonly ScoredChunk[], maxTokens: number = this.settings.maxContextTokens): string {
    return buildContext(ranked, this.deps.tokenizer, maxTokens).context;
  }

  async retrieve(question: string, returnMetadata = false): Promise<RetrievalResult> {
    const processed = this.preprocessQuestion(question);
    const log = this.logger.child({ question: processed });

    if (!processed) {
      log.warn("empty question");
      return returnMetadata
        ? { context: "", numChunks: 0, question: processed, chunks: [] }
        : { context: "", numChunks: 0, question: processed };
    }

    const candidates = await this.retrieveInitialCandidates(processed);
    log.debug({ candidates: candidates.length }, "initial candidates");

    const ranked = this.rerank(processed, candidates);
    const { context, used, tokenCount } = buildContext(
      ranked,
      this.deps.tokenizer,
      this.settings.maxContextTokens
    );
    if (used.length === 0) {
      log.info("no relevant chunks above threshold");
    } else {
      log.info({ ranked: ranked.length, used: used.length, tokenCount }, "context constructed");
    }

    const result: RetrievalResult = { context, numChunks: used.length, question: processed };
    if (returnMetadata) {
      result.chunks = used;
    }
    return result;
  }
}
