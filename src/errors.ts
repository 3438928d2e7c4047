export type ErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "INDEX_NOT_FOUND"
  | "METADATA_NOT_FOUND"
  | "INDEX_CORRUPT"
  | "EMBEDDING_FAILURE"
  | "INGESTION_FAILED"
  | "CONFIGURATION_ERROR";

export class CardsenseError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CardsenseError";
    this.code = code;
  }
}

export class UnsupportedFormatError extends CardsenseError {
  readonly extension: string;

  constructor(filePath: string, extension: string, supported: readonly string[]) {
    super(
      `Unsupported file format: ${extension || "(none)"} for ${filePath}. Supported: ${supported.join(", ")}`,
      "UNSUPPORTED_FORMAT"
    );
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

export class IndexNotFoundError extends CardsenseError {
  constructor(filePath: string) {
    super(`Index not found: ${filePath}\nRun: cardsense ingest <sourceDir>`, "INDEX_NOT_FOUND");
    this.name = "IndexNotFoundError";
  }
}

export class MetadataNotFoundError extends CardsenseError {
  constructor(filePath: string) {
    super(`Chunk metadata not found: ${filePath}\nRun: cardsense ingest <sourceDir>`, "METADATA_NOT_FOUND");
    this.name = "MetadataNotFoundError";
  }
}

export class IndexCorruptError extends CardsenseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`${message}\nRebuild with: cardsense ingest <sourceDir>`, "INDEX_CORRUPT", options);
    this.name = "IndexCorruptError";
  }
}

export class EmbeddingFailureError extends CardsenseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EMBEDDING_FAILURE", options);
    this.name = "EmbeddingFailureError";
  }
}

export class IngestionFailedError extends CardsenseError {
  readonly failed: readonly string[];

  constructor(failed: readonly string[]) {
    super(
      `No documents were ingested; ${failed.length} failed. The existing index was left unchanged.`,
      "INGESTION_FAILED"
    );
    this.name = "IngestionFailedError";
    this.failed = failed;
  }
}

export class ConfigurationError extends CardsenseError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
