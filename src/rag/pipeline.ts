import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { Settings } from "../config/settings.js";
import { createChatModel } from "../integrations/gemini/chat.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { IngestionFailedError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { indexArtifactsExist } from "../retrieval/indexStore.js";
import { Retriever, type RetrievalResult } from "../retrieval/retriever.js";
import type { ScoredChunk } from "../retrieval/types.js";
import { createTokenizer, type Tokenizer } from "../tokenizer/tiktoken.js";
import { AnswerGenerator } from "./answer.js";
import { Ingestion, type CorpusStats, type DocumentStats } from "./ingest.js";

export type PipelineDeps = {
  embeddings: EmbeddingsInterface;
  chatModel: BaseChatModel;
  tokenizer: Tokenizer;
};

export type QueryResult = {
  answer: string;
  hasContext: boolean;
  numChunks: number;
  /** Chunk texts in ranked order, one inner list per question. */
  documents: string[][];
  context?: string;
  chunks?: ScoredChunk[];
};

export type SystemInfo = {
  ready: boolean;
  indexExists: boolean;
  metadataExists: boolean;
  numChunks?: number;
  numDocuments?: number;
  documents?: string[];
};

const logger = createLogger("pipeline");

export class RagPipeline {
  private retriever: Promise<Retriever> | undefined;
  private readonly generator: AnswerGenerator;

  constructor(
    private readonly settings: Settings,
    private readonly deps: PipelineDeps
  ) {
    this.generator = new AnswerGenerator(deps.chatModel, settings.systemPrompt);
  }

  async runIngestion(
    source: { directory?: string; paths?: readonly string[] } = {}
  ): Promise<{ documents: DocumentStats[]; overall: CorpusStats }> {
    const ingestion = new Ingestion(this.settings, {
      embeddings: this.deps.embeddings,
      tokenizer: this.deps.tokenizer
    });

    const documents: DocumentStats[] = [];
    const directory = source.directory ?? (source.paths?.length ? undefined : this.settings.documentsDir);
    if (directory) {
      documents.push(...(await ingestion.ingestDirectory(directory)));
    }
    if (source.paths?.length) {
      documents.push(...(await ingestion.ingestDocuments(source.paths)));
    }

    if (ingestion.store.size === 0 && ingestion.failed.length > 0) {
      throw new IngestionFailedError(ingestion.failed);
    }
    await ingestion.saveIndex();
    const overall = ingestion.getStats();
    logger.info(overall, "ingestion complete");

    this.retriever = Promise.resolve(new Retriever(ingestion.store, this.deps, this.settings));
    return { documents, overall };
  }

  private ensureRetriever(): Promise<Retriever> {
    if (this.retriever) return this.retriever;

    const opening = Retriever.open(this.settings, this.deps);
    this.retriever = opening;
    // A failed open is not cached; the next call tries again.
    void opening.catch(() => {
      if (this.retriever === opening) this.retriever = undefined;
    });
    return opening;
  }

  async retrieve(question: string, returnMetadata = false): Promise<RetrievalResult> {
    const retriever = await this.ensureRetriever();
    return retriever.retrieve(question, returnMetadata);
  }

  async query(
    question: string,
    options: { returnContext?: boolean; returnMetadata?: boolean } = {}
  ): Promise<QueryResult> {
    const retrieval = await this.retrieve(question, true);
    const generated = await this.generator.generateAnswer(question, retrieval.context);

    const chunks = retrieval.chunks ?? [];
    const result: QueryResult = {
      answer: generated.answer,
      hasContext: generated.hasContext,
      numChunks: retrieval.numChunks,
      documents: [chunks.map((c) => c.chunk.text)]
    };
    if (options.returnContext) {
      result.context = retrieval.context;
    }
    if (options.returnMetadata) {
      result.chunks = chunks;
    }
    logger.info({ numChunks: result.numChunks, answerChars: result.answer.length }, "query processed");
    return result;
  }

  async systemInfo(): Promise<SystemInfo> {
    const present = await indexArtifactsExist(this.settings.indexDir);
    const info: SystemInfo = {
      ready: present.vectors && present.metadata,
      indexExists: present.vectors,
      metadataExists: present.metadata
    };
    if (!info.ready) {
      return info;
    }

    const retriever = await this.ensureRetriever();
    const documents = [...new Set(retriever.store.all().map((c) => c.documentId))];
    info.numChunks = retriever.store.size;
    info.numDocuments = documents.length;
    info.documents = documents;
    return info;
  }
}

export function createPipeline(settings: Settings): RagPipeline {
  return new RagPipeline(settings, {
    embeddings: createEmbeddings(settings),
    chatModel: createChatModel(settings),
    tokenizer: createTokenizer(settings.tokenizerEncoding)
  });
}
