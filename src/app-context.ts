import { AnswerGenerator } from "./answer-generator";
import type { Config } from "./config";
import { ConversationStore } from "./conversation-store";
import { DocumentStore } from "./document-store";
import { createEmbedder, type Embedder } from "./embeddings";
import { createLlm, type LlmClient } from "./llm";
import { Persistence } from "./persistence";
import { RagService } from "./rag-service";
import { Retriever } from "./retriever";
import { statusManager } from "./status";
import { VectorIndex } from "./vector-index";

/** Collaborators that may be swapped out (tests, alternative providers). */
export interface AppOverrides {
  embedder?: Embedder;
  llm?: LlmClient | null;
}

/**
 * Explicitly constructed object graph of the application. Transports receive
 * this instead of reaching for module-level state.
 */
export class AppContext {
  public readonly embedder: Embedder;
  public readonly index: VectorIndex;
  public readonly documents: DocumentStore;
  public readonly conversations: ConversationStore;
  public readonly generator: AnswerGenerator;
  public readonly rag: RagService;

  public constructor(
    public readonly config: Config,
    overrides: AppOverrides = {},
  ) {
    const verbose = config.VERBOSE;
    this.embedder = overrides.embedder ?? createEmbedder(config);
    this.index = new VectorIndex({
      meta: {
        modelName: this.embedder.modelName,
        chunkSize: config.CHUNK_SIZE,
        chunkOverlap: config.CHUNK_OVERLAP,
      },
      persistence: new Persistence(config.INDEX_STORE_PATH, verbose),
      verbose,
    });
    this.documents = new DocumentStore({
      uploadsDir: config.UPLOADS_DIR,
      registryPath: config.DOCUMENTS_REGISTRY_PATH,
      index: this.index,
      embedder: this.embedder,
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      allowedExt: config.ALLOWED_EXT,
      maxFileSize: config.MAX_FILE_SIZE,
      embedBatchSize: config.EMBED_BATCH_SIZE,
      verbose,
    });
    this.conversations = new ConversationStore(config.CONVERSATIONS_DIR, verbose);
    this.generator = new AnswerGenerator({
      llm: overrides.llm === undefined ? createLlm(config) : overrides.llm,
      maxPromptChars: config.MAX_PROMPT_CHARS,
      historyTurns: config.HISTORY_TURNS,
      attempts: config.MAX_RETRIES,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      verbose,
    });
    this.rag = new RagService({
      retriever: new Retriever(this.embedder, this.index),
      generator: this.generator,
      conversations: this.conversations,
      defaultK: config.RETRIEVAL_K,
      verbose,
    });
  }

  /** Load stores (re-indexing if needed) and flip the status to ready. */
  public async init(): Promise<void> {
    statusManager.setModels(this.embedder.modelName, this.generator.modelName);
    await this.conversations.init();
    await this.documents.init();
    statusManager.markReady();
  }

  /** Wait for pending index writes. */
  public async close(): Promise<void> {
    await this.index.flush();
  }
}

export function createAppContext(config: Config, overrides?: AppOverrides): AppContext {
  return new AppContext(config, overrides);
}
