import { promises as fs } from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { ConfigurationError, IndexCorruptError, IndexNotFoundError, MetadataNotFoundError } from "../src/errors.js";
import { ChunkStore } from "../src/retrieval/chunkStore.js";
import { indexPaths, loadIndex, saveIndex } from "../src/retrieval/indexStore.js";
import type { NewChunk } from "../src/retrieval/types.js";
import { VectorIndex } from "../src/retrieval/vectorIndex.js";
import { makeTempDir } from "./helpers.js";

function chunk(documentId: string, chunkIndex: number, text: string): NewChunk {
  return { documentId, chunkIndex, text, tokenCount: text.split(" ").length, charCount: text.length };
}

describe("ChunkStore", () => {
  it("assigns each record the position of its vector", () => {
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first"), chunk("a.txt", 1, "second")], [[1, 0], [0, 1]]);
    store.append([chunk("b.txt", 0, "third")], [[1, 1]]);

    expect(store.size).toBe(3);
    expect(store.vectors.size).toBe(3);
    expect(store.all().map((r) => r.id)).toEqual([0, 1, 2]);
    expect(store.get(2)?.text).toBe("third");
    expect(Array.from(store.vectors.vector(2) ?? [])).toEqual([1, 1]);
  });

  it("leaves both sides untouched when a batch is rejected", () => {
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first")], [[1, 0]]);

    expect(() => store.append([chunk("a.txt", 1, "x"), chunk("a.txt", 2, "y")], [[1, 0]])).toThrow(
      IndexCorruptError
    );
    expect(() => store.append([chunk("a.txt", 1, "x")], [[1, 0, 0]])).toThrow(ConfigurationError);
    expect(store.size).toBe(1);
    expect(store.vectors.size).toBe(1);
  });

  it("returns undefined for handles outside the store", () => {
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first")], [[1, 0]]);
    expect(store.get(-1)).toBeUndefined();
    expect(store.get(1)).toBeUndefined();
    expect(store.get(0.5)).toBeUndefined();
  });

  it("refuses records that do not line up with the vectors", () => {
    const index = new VectorIndex(2);
    index.add([[1, 0]]);
    expect(() => new ChunkStore(index, [])).toThrow("Index/metadata size mismatch: vectors=1 chunks=0");
    expect(() => new ChunkStore(index, [{ ...chunk("a.txt", 0, "x"), id: 7 }])).toThrow(
      "Chunk record at position 0 has id 7"
    );
  });
});

describe("index persistence", () => {
  it("saves and loads both artifacts with matching positions", async () => {
    const dir = await makeTempDir();
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first"), chunk("b.txt", 0, "second")], [[0.5, 0.5], [1, -1]]);

    await saveIndex(dir, store, "test-embedder");
    const { store: loaded, manifest } = await loadIndex(dir, { embeddingModel: "test-embedder" });

    expect(manifest.count).toBe(2);
    expect(manifest.embeddingDimension).toBe(2);
    expect(loaded.size).toBe(loaded.vectors.size);
    expect(loaded.all()).toEqual(store.all());
    expect(loaded.search([1, -1], 1).positions).toEqual([1]);
    expect((await fs.readdir(dir)).sort()).toEqual(["chunks.json", "vectors.bin"]);
  });

  it("round-trips an empty store", async () => {
    const dir = await makeTempDir();
    await saveIndex(dir, new ChunkStore(), "test-embedder");
    const { store, manifest } = await loadIndex(dir);
    expect(store.size).toBe(0);
    expect(manifest.embeddingDimension).toBeNull();
  });

  it("overwrites the previous artifacts", async () => {
    const dir = await makeTempDir();
    const first = new ChunkStore();
    first.append([chunk("a.txt", 0, "old")], [[1, 0]]);
    await saveIndex(dir, first, "test-embedder");

    const second = new ChunkStore();
    second.append([chunk("b.txt", 0, "new"), chunk("b.txt", 1, "newer")], [[0, 1], [1, 1]]);
    await saveIndex(dir, second, "test-embedder");

    const { store } = await loadIndex(dir);
    expect(store.all().map((r) => r.text)).toEqual(["new", "newer"]);
  });

  it("fails loudly when the vector file is missing", async () => {
    const dir = await makeTempDir();
    await expect(loadIndex(dir)).rejects.toBeInstanceOf(IndexNotFoundError);
  });

  it("fails loudly when the metadata file is missing", async () => {
    const dir = await makeTempDir();
    await saveIndex(dir, new ChunkStore(), "test-embedder");
    await fs.rm(indexPaths(dir).metadata);
    await expect(loadIndex(dir)).rejects.toBeInstanceOf(MetadataNotFoundError);
  });

  it("rejects an index built with another embedding model", async () => {
    const dir = await makeTempDir();
    await saveIndex(dir, new ChunkStore(), "old-embedder");
    await expect(loadIndex(dir, { embeddingModel: "new-embedder" })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("detects vectors and metadata that disagree in length", async () => {
    const dir = await makeTempDir();
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first")], [[1, 0]]);
    await saveIndex(dir, store, "test-embedder");

    const bigger = new VectorIndex(2);
    bigger.add([[1, 0], [0, 1]]);
    await fs.writeFile(indexPaths(dir).vectors, bigger.toBuffer());

    await expect(loadIndex(dir)).rejects.toThrow("Index/metadata size mismatch: vectors=2 chunks=1");
  });

  it("rejects vectors from a different save with the same count", async () => {
    const older = await makeTempDir();
    const oldStore = new ChunkStore();
    oldStore.append([chunk("a.txt", 0, "old text")], [[1, 0]]);
    await saveIndex(older, oldStore, "test-embedder");

    const newer = await makeTempDir();
    const newStore = new ChunkStore();
    newStore.append([chunk("a.txt", 0, "new text")], [[0, 1]]);
    await saveIndex(newer, newStore, "test-embedder");

    await fs.copyFile(indexPaths(newer).vectors, indexPaths(older).vectors);

    await expect(loadIndex(older)).rejects.toThrow(
      `Vector index does not belong to this chunk metadata: ${indexPaths(older).vectors}`
    );
  });

  it("rejects an index whose dimension differs from the configured one", async () => {
    const dir = await makeTempDir();
    const store = new ChunkStore();
    store.append([chunk("a.txt", 0, "first")], [[1, 0]]);
    await saveIndex(dir, store, "test-embedder");

    await expect(loadIndex(dir, { embeddingDimension: 768 })).rejects.toBeInstanceOf(ConfigurationError);
    expect((await loadIndex(dir, { embeddingDimension: 2 })).store.size).toBe(1);
  });

  it("rejects metadata that fails validation", async () => {
    const dir = await makeTempDir();
    await saveIndex(dir, new ChunkStore(), "test-embedder");
    await fs.writeFile(path.join(dir, "chunks.json"), JSON.stringify({ version: 2, chunks: [] }));
    await expect(loadIndex(dir)).rejects.toBeInstanceOf(IndexCorruptError);
  });
});
