import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { Chunker } from "./chunker";
import type { Embedder } from "./embeddings";
import { EmbeddingServiceError, InvalidUploadError, NotFoundError } from "./errors";
import { TextExtractor, fileTypeOf } from "./extractor";
import { Mutex } from "./mutex";
import { describeError } from "./retry";
import { statusManager } from "./status";
import type { Chunk, Document, DocumentInfo, VectorRecord } from "./types";
import type { VectorIndex } from "./vector-index";

/**
 * Options required to construct a {@link DocumentStore}.
 */
export interface DocumentStoreOptions {
  uploadsDir: string;
  /** JSON file holding the document registry. */
  registryPath: string;
  index: VectorIndex;
  embedder: Embedder;
  extractor?: TextExtractor;
  chunkSize: number;
  chunkOverlap: number;
  /** Extensions (no leading dot) accepted for upload. */
  allowedExt: string[];
  /** Upload size limit in bytes. */
  maxFileSize: number;
  /** Chunks per embed() call. */
  embedBatchSize?: number;
  verbose?: boolean;
}

export interface UploadInput {
  filename: string;
  bytes: Uint8Array;
}

export interface IngestResult {
  chunksCount: number;
  chunkIds: string[];
}

export function toDocumentInfo(d: Document): DocumentInfo {
  return {
    id: d.id,
    filename: d.filename,
    fileType: d.fileType,
    fileSize: d.fileSize,
    pageCount: d.pageCount,
    createdAt: d.createdAt,
    chunksCount: d.chunkIds.length,
  };
}

function isDocument(v: unknown): v is Document {
  if (typeof v !== "object" || v === null) return false;
  const chunkIds: unknown = Reflect.get(v, "chunkIds");
  return (
    typeof Reflect.get(v, "id") === "string" &&
    typeof Reflect.get(v, "filename") === "string" &&
    typeof Reflect.get(v, "fileType") === "string" &&
    typeof Reflect.get(v, "fileSize") === "number" &&
    typeof Reflect.get(v, "pageCount") === "number" &&
    typeof Reflect.get(v, "createdAt") === "string" &&
    typeof Reflect.get(v, "storagePath") === "string" &&
    Array.isArray(chunkIds) &&
    chunkIds.every((c) => typeof c === "string")
  );
}

/** Keep only the last path segment and replace characters unsafe in file names. */
function safeFileName(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, "/"));
  return base.replace(/[^\p{L}\p{N}._ -]/gu, "_") || "upload";
}

/**
 * Tracks uploaded documents and bridges them to the vector index.
 *
 * The registry (documents.json) and the uploaded bytes live on disk so the
 * index can be rebuilt whenever it is missing or was built with another
 * embedding model / chunking configuration. Two uploads with the same
 * filename are distinct documents.
 */
export class DocumentStore {
  private readonly docs = new Map<string, Document>();
  private readonly registryLock = new Mutex();
  private readonly extractor: TextExtractor;
  private readonly embedBatchSize: number;
  private readonly verbose: boolean;

  public constructor(private readonly opts: DocumentStoreOptions) {
    Chunker.validate(opts.chunkSize, opts.chunkOverlap);
    this.extractor = opts.extractor ?? new TextExtractor(opts.verbose);
    this.embedBatchSize = Math.max(1, opts.embedBatchSize ?? 32);
    this.verbose = !!opts.verbose;
  }

  /**
   * Load the registry and the vector index, then reconcile the two:
   * re-index documents the index lacks and purge vectors of unknown documents.
   * Documents registered with no chunks have nothing to restore and are left alone.
   */
  public async init(): Promise<void> {
    await fs.mkdir(this.opts.uploadsDir, { recursive: true });
    await this.loadRegistry();
    const loaded = await this.opts.index.load();
    const missing = [...this.docs.values()].filter(
      (d) => d.chunkIds.length > 0 && (!loaded || !this.opts.index.has(d.id)),
    );
    if (loaded) {
      for (const id of this.opts.index.documentIds()) {
        if (!this.docs.has(id)) {
          console.error(`[RAG] Purging vectors of unregistered document ${id}`);
          await this.opts.index.delete(id);
        }
      }
    }
    if (missing.length) {
      console.error(`[RAG] Re-indexing ${missing.length} document(s) from stored uploads...`);
      await this.reindex(missing.map((d) => d.id));
    }
    this.publishTotals();
    console.error(`[RAG] Document store ready: ${this.docs.size} documents, ${this.opts.index.size} chunks.`);
  }

  /**
   * Validate, store, extract, chunk, embed and index an uploaded file.
   * On failure nothing of the upload remains (file, registry entry, vectors).
   *
   * @throws {InvalidUploadError} Unsupported extension or file too large.
   */
  public async upload(input: UploadInput, signal?: AbortSignal): Promise<DocumentInfo> {
    const filename = input.filename.trim();
    const fileType = fileTypeOf(filename);
    if (!filename || !this.opts.allowedExt.includes(fileType) || !TextExtractor.supports(fileType)) {
      throw new InvalidUploadError(
        `Unsupported file type '${fileType || "(none)"}'. Supported: ${this.opts.allowedExt.join(", ")}`,
      );
    }
    const fileSize = input.bytes.byteLength;
    if (fileSize > this.opts.maxFileSize) {
      const maxMb = (this.opts.maxFileSize / (1024 * 1024)).toFixed(1);
      throw new InvalidUploadError(`File too large (${fileSize} bytes). Maximum size: ${maxMb}MB`);
    }

    const id = randomUUID();
    const storagePath = path.join(this.opts.uploadsDir, `${id}_${safeFileName(filename)}`);
    await fs.writeFile(storagePath, input.bytes);
    try {
      const { text, pageCount } = await this.extractor.extract(input.bytes, filename);
      const { chunkIds } = await this.ingest(id, text, filename, fileSize, signal);
      const doc: Document = {
        id,
        filename,
        fileType,
        fileSize,
        chunkIds,
        pageCount,
        createdAt: new Date().toISOString(),
        storagePath,
      };
      await this.registryLock.runExclusive(async () => {
        this.docs.set(id, doc);
        await this.saveRegistry();
      });
      console.error(`[RAG] Stored ${filename} (${formatFileSize(fileSize)}) as ${id}: ${chunkIds.length} chunks`);
      this.publishTotals();
      return toDocumentInfo(doc);
    } catch (e) {
      this.docs.delete(id);
      if (this.opts.index.has(id)) await this.opts.index.delete(id);
      await fs.rm(storagePath, { force: true });
      throw e;
    }
  }

  /**
   * Chunk, embed and upsert one document's text. The upsert is a single
   * index write, so either every chunk becomes searchable or none does.
   */
  public async ingest(
    documentId: string,
    rawText: string,
    filename: string,
    fileSize: number,
    signal?: AbortSignal,
  ): Promise<IngestResult> {
    const chunks: Chunk[] = Array.from(new Chunker(rawText, this.opts.chunkSize, this.opts.chunkOverlap), (span) => ({
      id: `${documentId}:${span.position}`,
      documentId,
      ...span,
    }));
    if (this.verbose) {
      console.error(`[RAG][verbose] ${filename} (${fileSize} bytes) -> ${chunks.length} chunks`);
    }
    const records: VectorRecord[] = [];
    for (let i = 0; i < chunks.length; i += this.embedBatchSize) {
      const batch = chunks.slice(i, i + this.embedBatchSize);
      const vectors = await this.opts.embedder.embed(
        batch.map((c) => c.text),
        signal,
      );
      if (vectors.length !== batch.length) {
        throw new EmbeddingServiceError(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`);
      }
      batch.forEach((chunk, j) => {
        records.push({
          chunkId: chunk.id,
          documentId,
          vector: vectors[j],
          metadata: { filename, position: chunk.position, text: chunk.text },
        });
      });
    }
    await this.opts.index.upsert(documentId, records);
    return { chunksCount: records.length, chunkIds: records.map((r) => r.chunkId) };
  }

  /** Newest first. */
  public list(): DocumentInfo[] {
    return [...this.docs.values()]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map(toDocumentInfo);
  }

  /** @throws {NotFoundError} */
  public get(id: string): DocumentInfo {
    const doc = this.docs.get(id);
    if (!doc) throw new NotFoundError("document", id);
    return toDocumentInfo(doc);
  }

  public has(id: string): boolean {
    return this.docs.has(id);
  }

  public get count(): number {
    return this.docs.size;
  }

  /**
   * Delete a document: its vectors first, then the registry entry and the stored file.
   * @throws {NotFoundError} If the id is unknown; nothing changes.
   */
  public async delete(id: string): Promise<boolean> {
    const doc = this.docs.get(id);
    if (!doc) throw new NotFoundError("document", id);
    if (this.opts.index.has(id)) await this.opts.index.delete(id);
    await this.registryLock.runExclusive(async () => {
      this.docs.delete(id);
      await this.saveRegistry();
    });
    await fs.rm(doc.storagePath, { force: true });
    console.error(`[RAG] Deleted document ${doc.filename} (${id})`);
    this.publishTotals();
    return true;
  }

  /**
   * Re-embed documents from their stored uploads (all of them by default).
   * A document that can no longer be read stays registered with no chunks.
   */
  public async reindex(ids: string[] = [...this.docs.keys()]): Promise<void> {
    let done = 0;
    for (const id of ids) {
      const doc = this.docs.get(id);
      if (!doc) continue;
      let chunkIds: string[] = [];
      try {
        const bytes = await fs.readFile(doc.storagePath);
        const { text } = await this.extractor.extract(bytes, doc.filename);
        ({ chunkIds } = await this.ingest(id, text, doc.filename, doc.fileSize));
      } catch (e) {
        console.error(`[RAG] Failed to re-index ${doc.filename} (${id}): ${describeError(e)}`);
        if (this.opts.index.has(id)) await this.opts.index.delete(id);
      }
      this.docs.set(id, { ...doc, chunkIds });
      done++;
      if (this.verbose) console.error(`[RAG][verbose] Re-indexed ${done}/${ids.length}`);
    }
    await this.registryLock.runExclusive(() => this.saveRegistry());
    this.publishTotals();
  }

  private publishTotals(): void {
    statusManager.setDocumentTotals(this.docs.size, this.opts.index.size);
  }

  private async loadRegistry(): Promise<void> {
    const file = this.opts.registryPath;
    this.docs.clear();
    if (!fsSync.existsSync(file)) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(file, "utf8"));
    } catch (e) {
      console.error(`[RAG] Document registry at ${file} is unreadable; starting empty:`, e);
      return;
    }
    const list: unknown = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "documents") : null;
    if (!Array.isArray(list)) return;
    for (const d of list) {
      if (!isDocument(d)) continue;
      if (!fsSync.existsSync(d.storagePath)) {
        console.error(`[RAG] Upload for ${d.filename} (${d.id}) is missing; dropping it from the registry.`);
        continue;
      }
      this.docs.set(d.id, d);
    }
  }

  private async saveRegistry(): Promise<void> {
    const file = this.opts.registryPath;
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify({ version: 1, documents: [...this.docs.values()] }, null, 2));
    await fs.rename(tmp, file);
  }
}

/** Human readable size, e.g. "1.5 KB". */
export function formatFileSize(bytes: number): string {
  let size = bytes;
  for (const unit of ["B", "KB", "MB", "GB"]) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}
