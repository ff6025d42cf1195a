import { describe, expect, it } from "vitest";
import { HashingEmbedder, type Embedder } from "./embeddings";
import { DimensionMismatchError } from "./errors";
import { Retriever } from "./retriever";
import type { VectorRecord } from "./types";
import { VectorIndex } from "./vector-index";

class CountingEmbedder implements Embedder {
  public calls = 0;
  private readonly inner: Embedder;

  public constructor(inner: Embedder) {
    this.inner = inner;
  }

  public get modelName(): string {
    return this.inner.modelName;
  }

  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls++;
    return this.inner.embed(texts);
  }

  public async embedOne(text: string): Promise<Float32Array> {
    this.calls++;
    return this.inner.embedOne(text);
  }
}

const meta = { modelName: "hashing-trigram-v1@128", chunkSize: 200, chunkOverlap: 20 };

async function indexText(
  index: VectorIndex,
  embedder: Embedder,
  documentId: string,
  filename: string,
  texts: string[],
): Promise<void> {
  const vectors = await embedder.embed(texts);
  const records: VectorRecord[] = texts.map((text, position) => ({
    chunkId: `${documentId}:${position}`,
    documentId,
    vector: vectors[position],
    metadata: { filename, position, text },
  }));
  await index.upsert(documentId, records);
}

describe("Retriever", () => {
  it("returns nothing for an empty index without embedding the question", async () => {
    const embedder = new CountingEmbedder(new HashingEmbedder(128));
    const retriever = new Retriever(embedder, new VectorIndex({ meta }));

    await expect(retriever.retrieve("anything", 5)).resolves.toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it("ranks the matching chunk first and attributes its source", async () => {
    const embedder = new HashingEmbedder(128);
    const index = new VectorIndex({ meta });
    await indexText(index, embedder, "pets", "pets.md", ["Cats sleep most of the day.", "Dogs enjoy long walks."]);
    await indexText(index, embedder, "tax", "tax.txt", ["Invoices are due within thirty days."]);

    const hits = await new Retriever(embedder, index).retrieve("Cats sleep most of the day.", 2);

    expect(hits).toHaveLength(2);
    expect(hits[0]).toMatchObject({
      chunkId: "pets:0",
      documentId: "pets",
      filename: "pets.md",
      position: 0,
      text: "Cats sleep most of the day.",
    });
    expect(hits[0].score).toBeCloseTo(1, 5);
    expect(hits[0].score).toBeGreaterThanOrEqual(hits[1].score);
  });

  it("propagates a dimension mismatch between embedder and index", async () => {
    const index = new VectorIndex({ meta });
    await indexText(index, new HashingEmbedder(128), "a", "a.txt", ["some text"]);

    const retriever = new Retriever(new HashingEmbedder(32), index);
    await expect(retriever.retrieve("some text", 3)).rejects.toBeInstanceOf(DimensionMismatchError);
  });
});
