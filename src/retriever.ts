import type { Embedder } from "./embeddings";
import type { RetrievedChunk } from "./types";
import type { VectorIndex } from "./vector-index";

/**
 * Embeds a question and returns the k most similar chunks with source
 * attribution. Errors from the embedder or the index propagate unchanged.
 */
export class Retriever {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;

  public constructor(embedder: Embedder, index: VectorIndex) {
    this.embedder = embedder;
    this.index = index;
  }

  /** Best-first; empty when the index holds no vectors (the embedder is not called). */
  public async retrieve(question: string, k: number, signal?: AbortSignal): Promise<RetrievedChunk[]> {
    if (this.index.size === 0 || k <= 0) return [];
    const query = await this.embedder.embedOne(question, signal);
    return this.index.search(query, k).map(({ record, score }) => ({
      chunkId: record.chunkId,
      documentId: record.documentId,
      filename: record.metadata.filename,
      position: record.metadata.position,
      text: record.metadata.text,
      score,
    }));
  }
}
