import { ConfigurationError, IndexCorruptError } from "../errors.js";
import { squaredL2Distance } from "./similarity.js";

const MAGIC = "CSVI";
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;

export type SearchResult = {
  distances: number[];
  positions: number[];
};

/**
 * Append-only flat index over float32 vectors with exact k-NN on squared L2 distance.
 * The dimension is fixed by the constructor or, when omitted, by the first `add`.
 */
export class VectorIndex {
  private data: Float32Array;
  private count = 0;
  private dim: number | undefined;

  constructor(dimension?: number) {
    if (dimension !== undefined && (!Number.isInteger(dimension) || dimension <= 0)) {
      throw new ConfigurationError(`Vector dimension must be a positive integer, got: ${dimension}`);
    }
    this.dim = dimension;
    this.data = new Float32Array(0);
  }

  get size(): number {
    return this.count;
  }

  get dimension(): number | undefined {
    return this.dim;
  }

  /** Rejects the whole batch if any vector has the wrong width. */
  add(vectors: readonly number[][]): void {
    if (vectors.length === 0) return;

    const dim = this.dim ?? vectors[0]?.length ?? 0;
    if (dim <= 0) {
      throw new ConfigurationError(`Embedding dimension invalid (${dim})`);
    }
    vectors.forEach((v, i) => {
      if (v.length !== dim) {
        throw new ConfigurationError(
          `Embedding dimension mismatch at vector ${i}: expected=${dim} actual=${v.length}`
        );
      }
    });

    this.dim = dim;
    this.reserve((this.count + vectors.length) * dim);
    for (const v of vectors) {
      this.data.set(v, this.count * dim);
      this.count += 1;
    }
  }

  vector(position: number): Float32Array | undefined {
    if (this.dim === undefined || position < 0 || position >= this.count) return undefined;
    return this.data.subarray(position * this.dim, (position + 1) * this.dim);
  }

  search(query: readonly number[], k: number): SearchResult {
    if (this.count === 0 || k <= 0 || this.dim === undefined) {
      return { distances: [], positions: [] };
    }
    if (query.length !== this.dim) {
      throw new ConfigurationError(
        `Embedding dimension mismatch.\nIndex: ${this.dim}\nQuery: ${query.length}`
      );
    }

    const scored: Array<{ position: number; distance: number }> = [];
    for (let p = 0; p < this.count; p += 1) {
      const row = this.data.subarray(p * this.dim, (p + 1) * this.dim);
      scored.push({ position: p, distance: squaredL2Distance(query, row) });
    }
    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);

    const top = scored.slice(0, k);
    return {
      distances: top.map((s) => s.distance),
      positions: top.map((s) => s.position)
    };
  }

  toBuffer(): Buffer {
    const dim = this.dim ?? 0;
    const buf = Buffer.alloc(HEADER_BYTES + this.count * dim * 4);
    buf.write(MAGIC, 0, "ascii");
    buf.writeUInt32LE(FORMAT_VERSION, 4);
    buf.writeUInt32LE(dim, 8);
    buf.writeUInt32LE(this.count, 12);
    for (let i = 0; i < this.count * dim; i += 1) {
      buf.writeFloatLE(this.data[i] ?? 0, HEADER_BYTES + i * 4);
    }
    return buf;
  }

  static fromBuffer(buf: Buffer): VectorIndex {
    if (buf.length < HEADER_BYTES || buf.toString("ascii", 0, 4) !== MAGIC) {
      throw new IndexCorruptError("Vector index file is not a cardsense index");
    }
    const version = buf.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new IndexCorruptError(`Unsupported vector index version: ${version}`);
    }
    const dim = buf.readUInt32LE(8);
    const count = buf.readUInt32LE(12);
    if (buf.length !== HEADER_BYTES + count * dim * 4 || (count > 0 && dim === 0)) {
      throw new IndexCorruptError(
        `Vector index file is truncated: dimension=${dim} count=${count} bytes=${buf.length}`
      );
    }

    const index = new VectorIndex(dim > 0 ? dim : undefined);
    index.reserve(count * dim);
    for (let i = 0; i < count * dim; i += 1) {
      index.data[i] = buf.readFloatLE(HEADER_BYTES + i * 4);
    }
    index.count = count;
    return index;
  }

  private reserve(length: number): void {
    if (this.data.length >= length) return;
    const next = new Float32Array(Math.max(length, this.data.length * 2));
    next.set(this.data);
    this.data = next;
  }
}
