import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DimensionMismatchError, NotFoundError } from "./errors";
import { Persistence } from "./persistence";
import type { VectorRecord } from "./types";
import { VectorIndex } from "./vector-index";

const meta = { modelName: "test-model", chunkSize: 100, chunkOverlap: 10 };

function rec(documentId: string, position: number, values: number[], filename = `${documentId}.txt`): VectorRecord {
  return {
    chunkId: `${documentId}:${position}`,
    documentId,
    vector: Float32Array.from(values),
    metadata: { filename, position, text: `${documentId} chunk ${position}` },
  };
}

describe("VectorIndex", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vector-index-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the inserted chunk as top-1 with similarity 1 for its own vector", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("a", [rec("a", 0, [1, 0, 0]), rec("a", 1, [0.6, 0.8, 0])]);
    await index.upsert("b", [rec("b", 0, [0, 0, 1])]);

    const hits = index.search(Float32Array.from([0.6, 0.8, 0]), 3);
    expect(hits[0].record.chunkId).toBe("a:1");
    expect(hits[0].score).toBeCloseTo(1, 6);
  });

  it("returns at most k hits ordered by non-increasing score", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("a", [rec("a", 0, [1, 0]), rec("a", 1, [0.7, 0.7]), rec("a", 2, [0, 1]), rec("a", 3, [-1, 0])]);

    const hits = index.search(Float32Array.from([1, 0]), 3);
    expect(hits.map((h) => h.record.chunkId)).toEqual(["a:0", "a:1", "a:2"]);
    for (let i = 1; i < hits.length; i++) expect(hits[i - 1].score).toBeGreaterThanOrEqual(hits[i].score);
    expect(index.search(Float32Array.from([1, 0]), 0)).toEqual([]);
  });

  it("keeps index order for equal scores", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("first", [rec("first", 0, [1, 0])]);
    await index.upsert("second", [rec("second", 0, [2, 0])]);
    await index.upsert("third", [rec("third", 0, [3, 0])]);

    const hits = index.search(Float32Array.from([5, 0]), 3);
    expect(hits.map((h) => h.record.documentId)).toEqual(["first", "second", "third"]);
  });

  it("returns nothing for an empty index", () => {
    const index = new VectorIndex({ meta });
    expect(index.search(Float32Array.from([1, 2, 3]), 5)).toEqual([]);
  });

  it("never returns vectors of a deleted document", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("keep", [rec("keep", 0, [1, 0])]);
    await index.upsert("gone", [rec("gone", 0, [1, 0]), rec("gone", 1, [0.9, 0.1])]);
    const before = index.generation;

    await index.delete("gone");

    const hits = index.search(Float32Array.from([1, 0]), 10);
    expect(hits.every((h) => h.record.documentId !== "gone")).toBe(true);
    expect(hits).toHaveLength(1);
    expect(index.has("gone")).toBe(false);
    expect(index.generation).toBe(before + 1);
  });

  it("fails with NotFound when deleting an unknown document and leaves state unchanged", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("a", [rec("a", 0, [1, 0])]);
    const generation = index.generation;

    await expect(index.delete("missing")).rejects.toBeInstanceOf(NotFoundError);
    expect(index.generation).toBe(generation);
    expect(index.size).toBe(1);
  });

  it("rejects upserts and queries with a different dimensionality", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("a", [rec("a", 0, [1, 0, 0])]);

    await expect(index.upsert("b", [rec("b", 0, [1, 0])])).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(index.has("b")).toBe(false);
    expect(() => index.search(Float32Array.from([1, 0]), 1)).toThrow(DimensionMismatchError);
  });

  it("rejects a batch whose vectors disagree with each other", async () => {
    const index = new VectorIndex({ meta });
    await expect(index.upsert("a", [rec("a", 0, [1, 0]), rec("a", 1, [1, 0, 0])])).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );
    expect(index.size).toBe(0);
    expect(index.dimension).toBeNull();
  });

  it("replaces a document's vectors on re-upsert", async () => {
    const index = new VectorIndex({ meta });
    await index.upsert("a", [rec("a", 0, [1, 0]), rec("a", 1, [0, 1])]);
    await index.upsert("a", [rec("a", 0, [1, 1])]);
    expect(index.size).toBe(1);
    expect(index.documentCount).toBe(1);
  });

  it("persists and reloads vectors with their metadata", async () => {
    const storePath = path.join(dir, "vector_store", "index.json");
    const index = new VectorIndex({ meta, persistence: new Persistence(storePath) });
    await index.upsert("a", [rec("a", 0, [0.25, -0.5, 1], "notes.md")]);

    const reloaded = new VectorIndex({ meta, persistence: new Persistence(storePath) });
    expect(await reloaded.load()).toBe(true);
    expect(reloaded.dimension).toBe(3);
    const [hit] = reloaded.search(Float32Array.from([0.25, -0.5, 1]), 1);
    expect(hit.record.metadata).toEqual({ filename: "notes.md", position: 0, text: "a chunk 0" });
    expect(Array.from(hit.record.vector)).toEqual([0.25, -0.5, 1]);
  });

  it("treats an index written for another model as cold", async () => {
    const storePath = path.join(dir, "index.json");
    const index = new VectorIndex({ meta, persistence: new Persistence(storePath) });
    await index.upsert("a", [rec("a", 0, [1, 0])]);

    const other = new VectorIndex({
      meta: { ...meta, modelName: "another-model" },
      persistence: new Persistence(storePath),
    });
    expect(await other.load()).toBe(false);
    expect(other.size).toBe(0);
  });

  it("shows searches a document's vectors entirely or not at all while a write is committing", async () => {
    const index = new VectorIndex({ meta, persistence: new Persistence(path.join(dir, "index.json")) });
    await index.upsert("a", [rec("a", 0, [1, 0]), rec("a", 1, [0.8, 0.6]), rec("a", 2, [0.6, 0.8])]);
    const query = Float32Array.from([1, 0]);

    const deleting = index.delete("a");
    expect(index.search(query, 10)).toHaveLength(3);
    await deleting;
    expect(index.search(query, 10)).toEqual([]);

    await index.upsert("a", [rec("a", 0, [1, 0])]);
    const adding = index.upsert("b", [rec("b", 0, [0.9, 0.1]), rec("b", 1, [0.1, 0.9])]);
    expect(index.search(query, 10).map((h) => h.record.chunkId)).toEqual(["a:0"]);
    await adding;
    expect(index.search(query, 10).map((h) => h.record.chunkId)).toEqual(["a:0", "b:0", "b:1"]);
  });

  it("does not commit an upsert whose persistence fails", async () => {
    // A directory where the store file should be makes the final rename fail.
    const storePath = path.join(dir, "blocked");
    await fs.mkdir(path.join(storePath, "inner"), { recursive: true });
    const index = new VectorIndex({ meta, persistence: new Persistence(storePath) });

    await expect(index.upsert("a", [rec("a", 0, [1, 0])])).rejects.toThrow();
    expect(index.has("a")).toBe(false);
    expect(index.search(Float32Array.from([1, 0]), 1)).toEqual([]);
  });
});
