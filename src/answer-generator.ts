import { CancelledError, GenerationError, InvalidRequestError } from "./errors";
import type { LlmClient } from "./llm";
import { describeError, withRetry } from "./retry";
import type { Message, RetrievedChunk } from "./types";

export const NO_RELEVANT_DOCUMENTS_MESSAGE =
  "No relevant documents were found for this question. Upload documents first or rephrase the question.";

const INSTRUCTIONS = [
  "You answer questions about the user's uploaded documents.",
  "Use only the information in the context below. If the context does not contain the answer, say that you do not know.",
  "Mention the source filenames you relied on.",
].join("\n");

export interface AnswerGeneratorOptions {
  /** null runs in context-only mode (no LLM call). */
  llm: LlmClient | null;
  /** Upper bound on the assembled prompt, in characters. */
  maxPromptChars: number;
  /** Most recent prior messages to include. */
  historyTurns: number;
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  verbose?: boolean;
}

export interface GenerateInput {
  question: string;
  /** Retrieved chunks, best first. */
  chunks: readonly RetrievedChunk[];
  history?: readonly Message[];
  signal?: AbortSignal;
}

export interface PromptPlan {
  prompt: string;
  /** Chunks that made it into the prompt, in rank order (the top one possibly cut). */
  usedChunks: RetrievedChunk[];
  /** Deduplicated filenames of `usedChunks`. */
  sources: string[];
  historyUsed: number;
}

export interface GeneratedAnswer {
  answer: string;
  sources: string[];
  usedChunks: RetrievedChunk[];
}

function sourceBlock(n: number, chunk: RetrievedChunk, text = chunk.text): string {
  return `[Source ${n}: ${chunk.filename}]\n${text}\n[/Source ${n}]\n\n`;
}

function dedupe(names: readonly string[]): string[] {
  return [...new Set(names)];
}

/**
 * Assembles a bounded prompt from the question, retrieved chunks and prior
 * turns, then asks the LLM. Stateless: history is passed in by the caller.
 */
export class AnswerGenerator {
  private readonly opts: AnswerGeneratorOptions;

  public constructor(opts: AnswerGeneratorOptions) {
    this.opts = opts;
  }

  public get modelName(): string {
    return this.opts.llm?.modelName ?? "none";
  }

  /**
   * Fit as many chunks as possible (best first) into the prompt budget; lower
   * ranked chunks are dropped first. If not even the top chunk fits it is cut
   * to the space left. Prior turns only use space the chunks left over,
   * keeping the most recent ones.
   *
   * @throws {InvalidRequestError} When the question alone exceeds the budget.
   */
  public buildPrompt(question: string, chunks: readonly RetrievedChunk[], history: readonly Message[] = []): PromptPlan {
    const head = `${INSTRUCTIONS}\n\n`;
    const contextHeader = "Context:\n";
    const tail = `Question: ${question}\n\nAnswer:`;
    let budget = this.opts.maxPromptChars - head.length - contextHeader.length - tail.length;
    if (budget <= 0) {
      throw new InvalidRequestError(`Question is too long for the prompt budget of ${this.opts.maxPromptChars} characters`);
    }

    const used: RetrievedChunk[] = [];
    let context = "";
    for (const chunk of chunks) {
      const block = sourceBlock(used.length + 1, chunk);
      if (block.length > budget) break;
      context += block;
      budget -= block.length;
      used.push(chunk);
    }
    if (!used.length && chunks.length) {
      const top = chunks[0];
      const overhead = sourceBlock(1, top, "").length;
      if (budget - overhead > 0) {
        const cut = { ...top, text: top.text.slice(0, budget - overhead) };
        context = sourceBlock(1, cut);
        budget -= context.length;
        used.push(cut);
      }
    }

    const historyLines: string[] = [];
    const historyHeader = "Conversation so far:\n";
    const recent = this.opts.historyTurns > 0 ? history.slice(-this.opts.historyTurns) : [];
    let historyBudget = budget - historyHeader.length - 1;
    for (let i = recent.length - 1; i >= 0; i--) {
      const m = recent[i];
      const line = `${m.role === "user" ? "User" : "Assistant"}: ${m.content}\n`;
      if (line.length > historyBudget) break;
      historyLines.unshift(line);
      historyBudget -= line.length;
    }
    const historyPart = historyLines.length ? `${historyHeader}${historyLines.join("")}\n` : "";

    return {
      prompt: `${head}${historyPart}${contextHeader}${context}${tail}`,
      usedChunks: used,
      sources: dedupe(used.map((c) => c.filename)),
      historyUsed: historyLines.length,
    };
  }

  /**
   * @throws {GenerationError} When the LLM call fails after retries or returns nothing usable.
   * @throws {CancelledError} When the caller's signal fires.
   */
  public async generate(input: GenerateInput): Promise<GeneratedAnswer> {
    const { question, chunks, history = [], signal } = input;
    if (!chunks.length) {
      return { answer: NO_RELEVANT_DOCUMENTS_MESSAGE, sources: [], usedChunks: [] };
    }
    const plan = this.buildPrompt(question, chunks, history);
    if (this.opts.verbose) {
      console.error(
        `[RAG][verbose] Prompt: ${plan.prompt.length} chars, ${plan.usedChunks.length}/${chunks.length} chunks, ${plan.historyUsed} prior messages`,
      );
    }

    const llm = this.opts.llm;
    if (!llm) {
      const passages = plan.usedChunks.map((c) => `(${c.filename}) ${c.text}`).join("\n\n");
      return {
        answer: `Relevant passages from your documents:\n\n${passages}\n\n---\nNo language model is configured; these are the closest matching passages.`,
        sources: plan.sources,
        usedChunks: plan.usedChunks,
      };
    }

    let answer: string;
    try {
      answer = await withRetry((attemptSignal) => llm.generate(plan.prompt, attemptSignal), {
        attempts: this.opts.attempts,
        baseDelayMs: this.opts.baseDelayMs,
        timeoutMs: this.opts.timeoutMs,
        signal,
        label: "generate",
        verbose: this.opts.verbose,
      });
    } catch (e) {
      if (signal?.aborted) throw new CancelledError("generation");
      if (e instanceof GenerationError) throw e;
      throw new GenerationError(`LLM call failed: ${describeError(e)}`, { cause: e });
    }
    return { answer, sources: plan.sources, usedChunks: plan.usedChunks };
  }
}
