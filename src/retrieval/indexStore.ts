import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import {
  ConfigurationError,
  IndexCorruptError,
  IndexNotFoundError,
  MetadataNotFoundError
} from "../errors.js";
import { ChunkStore } from "./chunkStore.js";
import type { IndexManifest } from "./types.js";
import { VectorIndex } from "./vectorIndex.js";

export const VECTORS_FILE = "vectors.bin";
export const METADATA_FILE = "chunks.json";

const chunkRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  documentId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative()
});

const manifestSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string(),
  embeddingDimension: z.number().int().positive().nullable(),
  count: z.number().int().nonnegative(),
  vectorsSha256: z.string().regex(/^[0-9a-f]{64}$/),
  chunks: z.array(chunkRecordSchema)
});

export type IndexPaths = {
  vectors: string;
  metadata: string;
};

export function indexPaths(indexDir: string): IndexPaths {
  return {
    vectors: path.join(indexDir, VECTORS_FILE),
    metadata: path.join(indexDir, METADATA_FILE)
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err: unknown) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export async function indexArtifactsExist(indexDir: string): Promise<{ vectors: boolean; metadata: boolean }> {
  const paths = indexPaths(indexDir);
  return { vectors: await exists(paths.vectors), metadata: await exists(paths.metadata) };
}

function sha256(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

// Write beside the target, then rename over it, so a crash never leaves a half-written file.
async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, data);
  await fs.rename(tmp, filePath);
}

export async function saveIndex(
  indexDir: string,
  store: ChunkStore,
  embeddingModel: string
): Promise<void> {
  const vectorBytes = store.vectors.toBuffer();
  const manifest: IndexManifest = {
    version: 1,
    embeddingModel,
    embeddingDimension: store.dimension ?? null,
    count: store.size,
    vectorsSha256: sha256(vectorBytes),
    chunks: [...store.all()]
  };

  await fs.mkdir(indexDir, { recursive: true });
  const paths = indexPaths(indexDir);
  await writeFileAtomic(paths.vectors, vectorBytes);
  await writeFileAtomic(paths.metadata, JSON.stringify(manifest));
}

async function readOrThrow<T>(read: () => Promise<T>, notFound: () => Error): Promise<T> {
  try {
    return await read();
  } catch (err: unknown) {
    if (isNotFound(err)) throw notFound();
    throw err;
  }
}

export async function loadIndex(
  indexDir: string,
  options: { embeddingModel?: string; embeddingDimension?: number } = {}
): Promise<{ store: ChunkStore; manifest: IndexManifest }> {
  const paths = indexPaths(indexDir);

  const vectorBytes = await readOrThrow(
    () => fs.readFile(paths.vectors),
    () => new IndexNotFoundError(paths.vectors)
  );
  const rawManifest = await readOrThrow(
    () => fs.readFile(paths.metadata, "utf-8"),
    () => new MetadataNotFoundError(paths.metadata)
  );

  let json: unknown;
  try {
    json = JSON.parse(rawManifest);
  } catch (err: unknown) {
    throw new IndexCorruptError(`Chunk metadata is not valid JSON: ${paths.metadata}`, { cause: err });
  }
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexCorruptError(
      `Chunk metadata failed validation: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  const manifest = parsed.data;

  if (options.embeddingModel !== undefined && manifest.embeddingModel !== options.embeddingModel) {
    throw new ConfigurationError(
      `Embedding model mismatch.\nIndex: ${manifest.embeddingModel}\nCurrent: ${options.embeddingModel}\nRe-run: cardsense ingest <sourceDir>`
    );
  }

  const vectors = VectorIndex.fromBuffer(vectorBytes);
  if (manifest.count !== manifest.chunks.length) {
    throw new IndexCorruptError(
      `Chunk metadata count mismatch: declared=${manifest.count} actual=${manifest.chunks.length}`
    );
  }
  if (vectors.size > 0 && vectors.dimension !== manifest.embeddingDimension) {
    throw new IndexCorruptError(
      `Embedding dimension mismatch between artifacts: vectors=${vectors.dimension} metadata=${manifest.embeddingDimension}`
    );
  }

  if (
    options.embeddingDimension !== undefined &&
    vectors.size > 0 &&
    vectors.dimension !== options.embeddingDimension
  ) {
    throw new ConfigurationError(
      `Embedding dimension mismatch.\nIndex: ${vectors.dimension}\nCurrent: ${options.embeddingDimension}\nRe-run: cardsense ingest <sourceDir>`
    );
  }

  const store = new ChunkStore(vectors, manifest.chunks);
  // Both files are renamed separately; a save interrupted between them leaves a mixed pair.
  if (sha256(vectorBytes) !== manifest.vectorsSha256) {
    throw new IndexCorruptError(`Vector index does not belong to this chunk metadata: ${paths.vectors}`);
  }
  return { store, manifest };
}
