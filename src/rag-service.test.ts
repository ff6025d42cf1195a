import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NO_RELEVANT_DOCUMENTS_MESSAGE } from "./answer-generator";
import { createAppContext, type AppContext } from "./app-context";
import { getConfig } from "./config";
import { CancelledError, InvalidRequestError, NotFoundError } from "./errors";
import type { LlmClient } from "./llm";
import { clampK } from "./rag-service";

class ScriptedLlm implements LlmClient {
  public readonly modelName = "scripted";
  public readonly prompts: string[] = [];
  public onGenerate: (signal: AbortSignal, prompt: string) => Promise<string> = async () => "Cats sleep a lot.";

  public async generate(prompt: string, signal: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    return this.onGenerate(signal, prompt);
  }
}

const encode = (s: string) => new TextEncoder().encode(s);

describe("clampK", () => {
  it("falls back to the default and clamps into 1..20", () => {
    expect(clampK(undefined, 5)).toBe(5);
    expect(clampK(Number.NaN, 5)).toBe(5);
    expect(clampK(0, 5)).toBe(1);
    expect(clampK(50, 5)).toBe(20);
    expect(clampK(3.7, 5)).toBe(3);
  });
});

describe("RagService", () => {
  let dir: string;
  let llm: ScriptedLlm;
  let ctx: AppContext;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-service-"));
    const config = getConfig({
      STORAGE_DIR: dir,
      LLM_PROVIDER: "none",
      EMBEDDING_DIMENSION: "128",
      CHUNK_SIZE: "200",
      CHUNK_OVERLAP: "20",
      RETRY_BASE_DELAY_MS: "0",
    });
    llm = new ScriptedLlm();
    ctx = createAppContext(config, { llm });
    await ctx.init();
  });

  afterEach(async () => {
    await ctx.close();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("rejects an empty question", async () => {
    await expect(ctx.rag.ask({ question: "   " })).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("answers without the LLM when no documents exist and still records the turn", async () => {
    const result = await ctx.rag.ask({ question: "Anything there?" });

    expect(result.answer).toBe(NO_RELEVANT_DOCUMENTS_MESSAGE);
    expect(result.sources).toEqual([]);
    expect(llm.prompts).toHaveLength(0);
    const conversation = await ctx.conversations.get(result.conversationId);
    expect(conversation.title).toBe("Anything there?");
    expect(conversation.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
  });

  it("answers from uploaded documents and continues the conversation", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: encode("Cats sleep for most of the day.") });

    const first = await ctx.rag.ask({ question: "How long do cats sleep?" });
    expect(first).toMatchObject({ answer: "Cats sleep a lot.", sources: ["cats.txt"] });
    expect(llm.prompts[0]).toContain("[Source 1: cats.txt]\nCats sleep for most of the day.");

    const second = await ctx.rag.ask({ question: "And at night?", conversationId: first.conversationId });
    expect(second.conversationId).toBe(first.conversationId);
    expect(llm.prompts[1]).toContain("User: How long do cats sleep?\nAssistant: Cats sleep a lot.\n");

    const conversation = await ctx.conversations.get(first.conversationId);
    expect(conversation.messages.map((m) => m.content)).toEqual([
      "How long do cats sleep?",
      "Cats sleep a lot.",
      "And at night?",
      "Cats sleep a lot.",
    ]);
    expect(conversation.messages[1].sources).toEqual(["cats.txt"]);
  });

  it("keeps each question next to its answer when queries on one conversation overlap", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: encode("Cats sleep for most of the day.") });
    const { id } = await ctx.conversations.create("Cats");
    llm.onGenerate = async (_signal, prompt) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return `answer to ${/Question: (.*)\n/.exec(prompt)?.[1] ?? "?"}`;
    };

    await Promise.all([
      ctx.rag.ask({ question: "question A", conversationId: id }),
      ctx.rag.ask({ question: "question B", conversationId: id }),
    ]);

    const { messages } = await ctx.conversations.get(id);
    expect(messages.map((m) => m.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(messages[1].content).toBe(`answer to ${messages[0].content}`);
    expect(messages[3].content).toBe(`answer to ${messages[2].content}`);
    expect(new Set([messages[0].content, messages[2].content])).toEqual(new Set(["question A", "question B"]));
  });

  it("rejects an unknown conversation before retrieving anything", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: encode("Cats sleep.") });

    await expect(
      ctx.rag.ask({ question: "Hello?", conversationId: "00000000-0000-0000-0000-000000000000" }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(llm.prompts).toHaveLength(0);
  });

  it("abandons a cancelled query without recording anything", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: encode("Cats sleep.") });
    const controller = new AbortController();
    llm.onGenerate = (signal) => {
      controller.abort();
      return Promise.reject(signal.reason);
    };

    await expect(ctx.rag.ask({ question: "Do cats sleep?", signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    await expect(ctx.conversations.list()).resolves.toEqual([]);
  });

  it("searches the indexed chunks", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: encode("Cats sleep for most of the day.") });
    await ctx.documents.upload({ filename: "tax.txt", bytes: encode("Invoices are due within thirty days.") });

    const results = await ctx.rag.search("Invoices are due within thirty days.", 1);
    expect(results).toHaveLength(1);
    expect(results[0].filename).toBe("tax.txt");
    await expect(ctx.rag.search("  ")).rejects.toBeInstanceOf(InvalidRequestError);
  });
});
