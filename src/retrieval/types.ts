export type ChunkRecord = {
  /** Handle into the vector index; equals the record's position in the store. */
  id: number;
  documentId: string;
  chunkIndex: number;
  text: string;
  tokenCount: number;
  charCount: number;
};

export type NewChunk = Omit<ChunkRecord, "id">;

export type Candidate = {
  id: number;
  distance: number;
};

export type ScoredChunk = {
  id: number;
  chunk: ChunkRecord;
  distance: number;
  vectorSimilarity: number;
  keywordScore: number;
  score: number;
};

export type IndexManifest = {
  version: 1;
  embeddingModel: string;
  embeddingDimension: number | null;
  count: number;
  /** sha256 of the vector file this manifest was written with. */
  vectorsSha256: string;
  chunks: ChunkRecord[];
};
