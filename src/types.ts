/**
 * Shared domain types used by the stores, the vector index and the pipeline.
 */

/** An uploaded document. Owns its chunks; the vector index only references them by id. */
export interface Document {
  /** UUID assigned at upload. */
  readonly id: string;
  /** Original filename as supplied by the uploader. */
  readonly filename: string;
  /** Lower-case extension without the leading dot. */
  readonly fileType: string;
  /** Size in bytes of the uploaded file. */
  readonly fileSize: number;
  /** Ordered chunk identifiers (`${id}:${position}`). */
  readonly chunkIds: readonly string[];
  /** Pages reported by the extractor (1 for plain text). */
  readonly pageCount: number;
  /** ISO timestamp of the upload. */
  readonly createdAt: string;
  /** Where the uploaded bytes are kept, used for re-indexing. */
  readonly storagePath: string;
}

/** Public projection of a document (no storage path). */
export type DocumentInfo = Omit<Document, "storagePath" | "chunkIds"> & { chunksCount: number };

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly text: string;
  /** 0-based position within the document. */
  readonly position: number;
  /** Character offsets of the span in the extracted text. */
  readonly start: number;
  readonly end: number;
}

export interface VectorMetadata {
  readonly filename: string;
  readonly position: number;
  readonly text: string;
}

export interface VectorRecord {
  readonly chunkId: string;
  readonly documentId: string;
  readonly vector: Float32Array;
  readonly metadata: VectorMetadata;
}

export interface SearchHit {
  readonly record: VectorRecord;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/** A chunk returned by the retriever, flattened for prompt assembly and API responses. */
export interface RetrievedChunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly filename: string;
  readonly position: number;
  readonly text: string;
  readonly score: number;
}

export type MessageRole = "user" | "assistant";

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly sources: readonly string[];
  readonly timestamp: string;
}

export interface Conversation {
  readonly id: string;
  readonly title: string;
  readonly messages: readonly Message[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface ConversationMetadata {
  readonly id: string;
  readonly title: string;
  readonly messageCount: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}
