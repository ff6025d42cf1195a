import { cosine } from "./embeddings";
import { DimensionMismatchError, NotFoundError, PipelineError } from "./errors";
import { Mutex } from "./mutex";
import type { IndexMeta, Persistence } from "./persistence";
import type { SearchHit, VectorRecord } from "./types";

export interface VectorIndexOptions {
  meta: IndexMeta;
  /** Durable storage; omitted for a purely in-memory index. */
  persistence?: Persistence;
  verbose?: boolean;
}

/**
 * Exact-cosine vector index keyed by document.
 *
 * State is a map of documentId → immutable record list. Writers build the
 * next map, persist it and only then swap it in, so a write either commits
 * whole or not at all. Writers are serialised through a mutex; `search` is a
 * synchronous scan of the current map and therefore sees any document's
 * vectors entirely or not at all.
 */
export class VectorIndex {
  private sets = new Map<string, readonly VectorRecord[]>();
  private dim: number | null = null;
  private gen = 0;
  private readonly writes = new Mutex();
  private readonly meta: IndexMeta;
  private readonly persistence?: Persistence;
  private readonly verbose: boolean;

  public constructor(opts: VectorIndexOptions) {
    this.meta = opts.meta;
    this.persistence = opts.persistence;
    this.verbose = !!opts.verbose;
  }

  /** Dimensionality fixed by the first upsert (null while empty). */
  public get dimension(): number | null {
    return this.dim;
  }

  /** Total number of vectors. */
  public get size(): number {
    let n = 0;
    for (const recs of this.sets.values()) n += recs.length;
    return n;
  }

  public get documentCount(): number {
    return this.sets.size;
  }

  /** Incremented on every committed write. */
  public get generation(): number {
    return this.gen;
  }

  public has(documentId: string): boolean {
    return this.sets.has(documentId);
  }

  public documentIds(): string[] {
    return Array.from(this.sets.keys());
  }

  /**
   * Hydrate from durable storage.
   * @returns false when nothing compatible was stored (cold start).
   */
  public async load(): Promise<boolean> {
    if (!this.persistence) return false;
    const loaded = await this.persistence.load(this.meta);
    if (!loaded) return false;
    return this.writes.runExclusive(async () => {
      const next = new Map<string, VectorRecord[]>();
      for (const r of loaded.records) {
        let arr = next.get(r.documentId);
        if (!arr) {
          arr = [];
          next.set(r.documentId, arr);
        }
        arr.push(r);
      }
      this.sets = next;
      this.dim = loaded.records.length ? loaded.dimension ?? loaded.records[0].vector.length : null;
      this.gen++;
      return true;
    });
  }

  /**
   * Add (or replace) the vectors of one document and persist.
   *
   * @throws {DimensionMismatchError} If any vector disagrees with the index dimensionality
   *   (or with the other vectors of the batch when the index is empty). Nothing is written.
   */
  public async upsert(documentId: string, records: readonly VectorRecord[]): Promise<void> {
    for (const r of records) {
      if (r.documentId !== documentId) {
        throw new PipelineError("indexing", `Record ${r.chunkId} belongs to ${r.documentId}, not ${documentId}`);
      }
    }
    await this.writes.runExclusive(async () => {
      // Replacing a document's own vectors may change the dimension only if no other vectors exist.
      const othersHaveVectors = this.hasVectors(this.sets, documentId);
      const expected = (othersHaveVectors ? this.dim : null) ?? records[0]?.vector.length ?? null;
      if (expected !== null) {
        for (const r of records) {
          if (r.vector.length !== expected) throw new DimensionMismatchError(expected, r.vector.length);
        }
      }
      const next = new Map(this.sets);
      next.set(documentId, Object.freeze([...records]));
      await this.commit(next, records.length || othersHaveVectors ? expected : null);
      if (this.verbose) {
        console.error(`[RAG][verbose] Upserted ${records.length} vectors for document ${documentId}`);
      }
    });
  }

  /**
   * Remove every vector of a document and persist.
   * @throws {NotFoundError} If the document has no vector set; the index is left unchanged.
   */
  public async delete(documentId: string): Promise<void> {
    await this.writes.runExclusive(async () => {
      if (!this.sets.has(documentId)) throw new NotFoundError("document", documentId);
      const next = new Map(this.sets);
      next.delete(documentId);
      await this.commit(next, this.hasVectors(next) ? this.dim : null);
    });
  }

  /**
   * k nearest vectors by cosine similarity, best first. Equal scores keep
   * index order (document insertion order, then position within the document).
   *
   * @throws {DimensionMismatchError} If the query dimensionality differs from the stored vectors.
   */
  public search(query: Float32Array, k: number): SearchHit[] {
    const sets = this.sets;
    if (k <= 0 || this.dim === null || sets.size === 0) return [];
    if (query.length !== this.dim) throw new DimensionMismatchError(this.dim, query.length, "retrieval");
    const hits: SearchHit[] = [];
    for (const recs of sets.values()) {
      for (const record of recs) hits.push({ record, score: cosine(record.vector, query) });
    }
    hits.sort((a, b) => b.score - a.score); // stable: ties keep scan order
    return hits.slice(0, Math.floor(k));
  }

  /** Wait for queued writes to finish. */
  public async flush(): Promise<void> {
    await this.writes.idle();
  }

  private hasVectors(sets: Map<string, readonly VectorRecord[]>, except?: string): boolean {
    for (const [id, recs] of sets) if (id !== except && recs.length > 0) return true;
    return false;
  }

  private async commit(next: Map<string, readonly VectorRecord[]>, dim: number | null): Promise<void> {
    if (this.persistence) {
      const all = function* () {
        for (const recs of next.values()) yield* recs;
      };
      await this.persistence.save(this.meta, dim, all());
    }
    this.sets = next;
    this.dim = dim;
    this.gen++;
  }
}
