import { APP_VERSION } from "./config";

/** Corpus counters, refreshed after every upload, delete and re-index. */
export interface CorpusStatus {
  /** Registered documents. */
  documents: number;
  /** Vectors currently searchable. */
  chunks: number;
  /** Stored conversations. */
  conversations: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + corpus state.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 *
 * ready = true once the document store and vector index finished loading
 * (including any re-index triggered at startup).
 */
export interface ServerStatus {
  status: "starting" | "healthy";
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Embedding model identifier (may be empty pre-init). */
  embeddingModel: string;
  /** LLM identifier, or "none" when answers are context-only. */
  llmModel: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  corpus: CorpusStatus;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      status: initial?.status ?? "starting",
      version: initial?.version ?? APP_VERSION,
      embeddingModel: initial?.embeddingModel ?? "",
      llmModel: initial?.llmModel ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      corpus: initial?.corpus ?? { documents: 0, chunks: 0, conversations: 0 },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModels(embeddingModel: string, llmModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.llmModel = llmModel;
  }

  public setDocumentTotals(documents: number, chunks: number) {
    this.data.corpus.documents = documents;
    this.data.corpus.chunks = chunks;
  }

  public setConversationCount(conversations: number) {
    this.data.corpus.conversations = conversations;
  }

  /** Transition ready=false -> true once stores are loaded. */
  public markReady() {
    this.data.ready = true;
    this.data.status = "healthy";
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }
}

// Singleton instance used across modules (stores, transports, health checks).
export const statusManager = new StatusManager();
