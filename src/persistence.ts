import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import type { VectorRecord } from "./types";

/**
 * Index-level metadata written next to the vectors. A persisted index is only
 * reused when model, dimension and chunk parameters all match the running
 * configuration; otherwise callers treat it as cold and re-index.
 */
export interface IndexMeta {
  modelName: string;
  chunkSize: number;
  chunkOverlap: number;
}

export interface LoadedIndex {
  dimension: number | null;
  records: VectorRecord[];
}

/**
 * Persists vector records as JSON with embeddings encoded as base64
 * little-endian float32 (`f32-base64`). Writes go to a temporary file first
 * and are renamed into place so a crash never leaves a truncated index.
 */
export class Persistence {
  /** Filesystem path where the JSON index will be stored / read. */
  private readonly storePath: string;
  private readonly verbose: boolean;

  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Attempt to load a previously persisted index.
   * Returns null when the file is missing, unreadable or incompatible with `meta`.
   */
  public async load(meta: IndexMeta): Promise<LoadedIndex | null> {
    const storePath = this.storePath;
    if (!fsSync.existsSync(storePath)) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(storePath, "utf8"));
    } catch (e) {
      console.error(`[RAG] Failed to read index store at ${storePath}:`, e);
      return null;
    }
    if (typeof parsed !== "object" || parsed === null) return null;
    const stored: unknown = Reflect.get(parsed, "meta");
    const docs: unknown = Reflect.get(parsed, "records");
    if (typeof stored !== "object" || stored === null || !Array.isArray(docs)) return null;
    if (
      Reflect.get(stored, "chunkSize") !== meta.chunkSize ||
      Reflect.get(stored, "chunkOverlap") !== meta.chunkOverlap ||
      Reflect.get(stored, "modelName") !== meta.modelName
    ) {
      console.error(`[RAG] Stored index incompatible (model/chunk params differ). Re-indexing.`);
      return null;
    }
    const dimRaw: unknown = Reflect.get(stored, "dimension");
    const dimension = typeof dimRaw === "number" && dimRaw > 0 ? dimRaw : null;

    const records: VectorRecord[] = [];
    for (const d of docs) {
      const rec = decodeRecord(d);
      // Skip rows that are malformed or disagree with the stored dimension.
      if (!rec || (dimension !== null && rec.vector.length !== dimension)) continue;
      records.push(rec);
    }
    console.error(`[RAG] Loaded persisted index: ${records.length} vectors.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${storePath}`);
    return { dimension, records };
  }

  /** Persist the given records. Errors propagate so callers can roll back. */
  public async save(meta: IndexMeta, dimension: number | null, records: Iterable<VectorRecord>): Promise<void> {
    const out = {
      version: 1,
      meta: { ...meta, dimension, savedAt: new Date().toISOString(), embEncoding: "f32-base64" },
      records: Array.from(records, encodeRecord),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.storePath);
    if (this.verbose) console.error(`[RAG][verbose] Persisted ${out.records.length} vectors to ${this.storePath}`);
  }
}

function encodeRecord(r: VectorRecord) {
  return {
    chunkId: r.chunkId,
    documentId: r.documentId,
    filename: r.metadata.filename,
    position: r.metadata.position,
    text: r.metadata.text,
    emb: Buffer.from(r.vector.buffer, r.vector.byteOffset, r.vector.byteLength).toString("base64"),
  };
}

function decodeRecord(d: unknown): VectorRecord | null {
  if (typeof d !== "object" || d === null) return null;
  const chunkId: unknown = Reflect.get(d, "chunkId");
  const documentId: unknown = Reflect.get(d, "documentId");
  const filename: unknown = Reflect.get(d, "filename");
  const position: unknown = Reflect.get(d, "position");
  const text: unknown = Reflect.get(d, "text");
  const emb: unknown = Reflect.get(d, "emb");
  if (
    typeof chunkId !== "string" ||
    typeof documentId !== "string" ||
    typeof filename !== "string" ||
    typeof position !== "number" ||
    typeof text !== "string" ||
    typeof emb !== "string"
  )
    return null;
  const buf = Buffer.from(emb, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy out of the pooled Buffer memory, whose offset need not be 4-byte aligned
  const vector = new Float32Array(Uint8Array.from(buf).buffer);
  return { chunkId, documentId, vector, metadata: { filename, position, text } };
}
