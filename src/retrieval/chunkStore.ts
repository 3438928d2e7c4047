import { IndexCorruptError } from "../errors.js";
import type { ChunkRecord, NewChunk } from "./types.js";
import { VectorIndex, type SearchResult } from "./vectorIndex.js";

/**
 * Chunk records and their vectors kept side by side. A record's `id` is its handle into
 * the vector index, assigned on append; records are never updated or removed.
 */
export class ChunkStore {
  private readonly records: ChunkRecord[];

  constructor(
    private readonly index: VectorIndex = new VectorIndex(),
    records: readonly ChunkRecord[] = []
  ) {
    if (index.size !== records.length) {
      throw new IndexCorruptError(
        `Index/metadata size mismatch: vectors=${index.size} chunks=${records.length}`
      );
    }
    records.forEach((r, i) => {
      if (r.id !== i) {
        throw new IndexCorruptError(`Chunk record at position ${i} has id ${r.id}`);
      }
    });
    this.records = [...records];
  }

  get size(): number {
    return this.records.length;
  }

  get dimension(): number | undefined {
    return this.index.dimension;
  }

  get vectors(): VectorIndex {
    return this.index;
  }

  /** Adds chunks and vectors together; a rejected batch leaves the store untouched. */
  append(chunks: readonly NewChunk[], vectors: readonly number[][]): ChunkRecord[] {
    if (chunks.length !== vectors.length) {
      throw new IndexCorruptError(
        `Embedding count mismatch: chunks=${chunks.length} embeddings=${vectors.length}`
      );
    }

    this.index.add(vectors);
    const firstId = this.records.length;
    const added = chunks.map((c, i) => ({ ...c, id: firstId + i }));
    this.records.push(...added);
    return added;
  }

  get(id: number): ChunkRecord | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= this.records.length) return undefined;
    return this.records[id];
  }

  all(): readonly ChunkRecord[] {
    return this.records;
  }

  search(query: readonly number[], k: number): SearchResult {
    return this.index.search(query, k);
  }
}
