import type { AnswerGenerator } from "./answer-generator";
import type { ConversationStore } from "./conversation-store";
import { titleFrom } from "./conversation-store";
import { InvalidRequestError, throwIfCancelled } from "./errors";
import type { Retriever } from "./retriever";
import type { Message, RetrievedChunk } from "./types";

export const MIN_K = 1;
export const MAX_K = 20;

export interface AskInput {
  question: string;
  conversationId?: string;
  k?: number;
  signal?: AbortSignal;
}

export interface AskResult {
  answer: string;
  sources: string[];
  conversationId: string;
}

export interface RagServiceOptions {
  retriever: Retriever;
  generator: AnswerGenerator;
  conversations: ConversationStore;
  /** k used when the caller gives none. */
  defaultK: number;
  verbose?: boolean;
}

/** Clamp a requested k into [MIN_K, MAX_K]; non-numbers fall back to `def`. */
export function clampK(k: number | undefined, def: number): number {
  const n = k === undefined || !Number.isFinite(k) ? def : Math.floor(k);
  return Math.min(MAX_K, Math.max(MIN_K, n));
}

/**
 * Query collaborator: retrieval, answer generation and conversation
 * bookkeeping. Nothing is appended to a conversation unless an answer was
 * produced.
 */
export class RagService {
  private readonly opts: RagServiceOptions;

  public constructor(opts: RagServiceOptions) {
    this.opts = opts;
  }

  public async ask(input: AskInput): Promise<AskResult> {
    const question = input.question.trim();
    if (!question) throw new InvalidRequestError("Question must not be empty");
    const k = clampK(input.k, this.opts.defaultK);
    const { signal } = input;

    let history: readonly Message[] = [];
    if (input.conversationId) {
      history = (await this.opts.conversations.get(input.conversationId)).messages;
    }

    const chunks = await this.opts.retriever.retrieve(question, k, signal);
    throwIfCancelled(signal, "retrieval");
    const { answer, sources } = await this.opts.generator.generate({ question, chunks, history, signal });
    throwIfCancelled(signal, "generation");

    const conversationId = input.conversationId ?? (await this.opts.conversations.create(titleFrom(question))).id;
    await this.opts.conversations.appendTurn(conversationId, question, answer, sources);
    if (this.opts.verbose) {
      console.error(`[RAG][verbose] Answered in ${conversationId} from ${chunks.length} chunks (k=${k})`);
    }
    return { answer, sources, conversationId };
  }

  public async search(query: string, k?: number, signal?: AbortSignal): Promise<RetrievedChunk[]> {
    const q = query.trim();
    if (!q) throw new InvalidRequestError("Search query must not be empty");
    return this.opts.retriever.retrieve(q, clampK(k, this.opts.defaultK), signal);
  }
}
