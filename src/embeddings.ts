import {
  GoogleGenerativeAI,
  type BatchEmbedContentsRequest,
  type SingleRequestOptions,
} from "@google/generative-ai";
import type { Config } from "./config";
import { EmbeddingServiceError, throwIfCancelled } from "./errors";
import { describeError, withRetry } from "./retry";

/**
 * Maps text to fixed-dimension vectors. Output has the same length and order
 * as the input and is deterministic for a fixed model. Batching is only an
 * optimisation: `embed([a, b])` equals `[embedOne(a), embedOne(b)]`.
 */
export interface Embedder {
  readonly modelName: string;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;
  embedOne(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length; a zero-norm vector scores 0.
 *
 * @returns Similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** 32-bit FNV-1a over UTF-16 code units. */
function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/**
 * Offline embedder using signed feature hashing of words and character
 * trigrams. No model download, no network: suitable for air-gapped installs
 * and for tests. Vectors are L2-normalised; text without any word characters
 * maps to the zero vector.
 */
export class HashingEmbedder implements Embedder {
  public readonly modelName: string;
  private readonly dimension: number;

  public constructor(dimension = 384, modelName = "hashing-trigram-v1") {
    this.dimension = dimension;
    this.modelName = `${modelName}@${dimension}`;
  }

  public async embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    throwIfCancelled(signal, "embedding");
    return texts.map((t) => this.vectorize(t));
  }

  public async embedOne(text: string, signal?: AbortSignal): Promise<Float32Array> {
    throwIfCancelled(signal, "embedding");
    return this.vectorize(text);
  }

  private vectorize(text: string): Float32Array {
    const v = new Float32Array(this.dimension);
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
    const add = (feature: string, weight: number) => {
      const h = fnv1a(feature);
      v[h % this.dimension] += h & 0x80000000 ? -weight : weight;
    };
    for (const w of words) {
      add(`w:${w}`, 1);
      const padded = `#${w}#`;
      for (let i = 0; i + 3 <= padded.length; i++) add(`t:${padded.slice(i, i + 3)}`, 0.5);
    }
    let norm = 0;
    for (let i = 0; i < v.length; i++) norm += v[i] * v[i];
    if (norm > 0) {
      const inv = 1 / Math.sqrt(norm);
      for (let i = 0; i < v.length; i++) v[i] *= inv;
    }
    return v;
  }
}

/** The slice of the Gemini `GenerativeModel` the embedder relies on. */
export interface BatchEmbedModel {
  batchEmbedContents(request: BatchEmbedContentsRequest, options?: SingleRequestOptions): Promise<unknown>;
}

export interface GeminiEmbedderOptions {
  model: BatchEmbedModel;
  modelName: string;
  /** Texts per remote call (API maximum is 100). */
  batchSize?: number;
  timeoutMs?: number;
  attempts?: number;
  baseDelayMs?: number;
  verbose?: boolean;
}

/**
 * Validate a `batchEmbedContents` payload and convert it to Float32 vectors.
 * Anything that is not `{ embeddings: [{ values: number[] }, ...] }` with the
 * expected count and one consistent dimension is an {@link EmbeddingServiceError}.
 */
export function parseBatchEmbedResponse(payload: unknown, expected: number): Float32Array[] {
  if (typeof payload !== "object" || payload === null) {
    throw new EmbeddingServiceError("Embedding response is not an object");
  }
  const embeddings: unknown = Reflect.get(payload, "embeddings");
  if (!Array.isArray(embeddings)) {
    throw new EmbeddingServiceError("Embedding response has no 'embeddings' array");
  }
  if (embeddings.length !== expected) {
    throw new EmbeddingServiceError(`Expected ${expected} embeddings, received ${embeddings.length}`);
  }
  const out: Float32Array[] = [];
  for (const item of embeddings) {
    const values: unknown = typeof item === "object" && item !== null ? Reflect.get(item, "values") : undefined;
    if (!Array.isArray(values) || values.length === 0) {
      throw new EmbeddingServiceError("Embedding entry has no 'values' array");
    }
    const vec = new Float32Array(values.length);
    for (let i = 0; i < values.length; i++) {
      const n: unknown = values[i];
      if (typeof n !== "number" || !Number.isFinite(n)) {
        throw new EmbeddingServiceError(`Embedding value at index ${i} is not a finite number`);
      }
      vec[i] = n;
    }
    if (out.length && out[0].length !== vec.length) {
      throw new EmbeddingServiceError(
        `Embedding dimensions disagree within one response (${out[0].length} vs ${vec.length})`,
      );
    }
    out.push(vec);
  }
  return out;
}

/** Remote embedder backed by the Gemini embedding API. */
export class GeminiEmbedder implements Embedder {
  public readonly modelName: string;
  private readonly model: BatchEmbedModel;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly baseDelayMs: number;
  private readonly verbose: boolean;

  public constructor(opts: GeminiEmbedderOptions) {
    this.model = opts.model;
    this.modelName = opts.modelName;
    this.batchSize = Math.max(1, Math.min(100, opts.batchSize ?? 100));
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.attempts = opts.attempts ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
    this.verbose = !!opts.verbose;
  }

  public async embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      out.push(...(await this.embedBatch(batch, signal)));
      if (this.verbose) console.error(`[RAG][verbose] Embedded ${out.length}/${texts.length} texts`);
    }
    return out;
  }

  public async embedOne(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [v] = await this.embedBatch([text], signal);
    return v;
  }

  private async embedBatch(batch: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    throwIfCancelled(signal, "embedding");
    const request: BatchEmbedContentsRequest = {
      requests: batch.map((text) => ({ content: { role: "user", parts: [{ text }] } })),
    };
    let payload: unknown;
    try {
      payload = await withRetry(
        (attemptSignal) => this.model.batchEmbedContents(request, { signal: attemptSignal, timeout: this.timeoutMs }),
        {
          attempts: this.attempts,
          baseDelayMs: this.baseDelayMs,
          timeoutMs: this.timeoutMs,
          signal,
          label: "embed",
          verbose: this.verbose,
        },
      );
    } catch (e) {
      throwIfCancelled(signal, "embedding");
      throw new EmbeddingServiceError(`Embedding call failed: ${describeError(e)}`, { cause: e });
    }
    return parseBatchEmbedResponse(payload, batch.length);
  }
}

/** Build the embedder selected by configuration. */
export function createEmbedder(config: Config): Embedder {
  if (config.EMBEDDING_PROVIDER === "google") {
    const genAI = new GoogleGenerativeAI(config.GOOGLE_API_KEY ?? "");
    return new GeminiEmbedder({
      model: genAI.getGenerativeModel({ model: config.EMBEDDING_MODEL }),
      modelName: config.EMBEDDING_MODEL,
      batchSize: Math.min(100, config.EMBED_BATCH_SIZE),
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      attempts: config.MAX_RETRIES,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      verbose: config.VERBOSE,
    });
  }
  return new HashingEmbedder(config.EMBEDDING_DIMENSION, config.EMBEDDING_MODEL);
}
