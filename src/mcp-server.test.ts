import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createAppContext, type AppContext } from "./app-context";
import { getConfig } from "./config";
import { NotFoundError } from "./errors";
import { Client, ErrorCode, InMemoryTransport, McpError } from "./mcp-sdk";
import { createMcpServer, toMcpError } from "./mcp-server";

/** Parse the JSON text block a tool returns. */
function toolJson(result: unknown): unknown {
  const content: unknown = typeof result === "object" && result !== null ? Reflect.get(result, "content") : undefined;
  if (!Array.isArray(content)) throw new Error("tool result has no content");
  const first: unknown = content[0];
  const text: unknown = typeof first === "object" && first !== null ? Reflect.get(first, "text") : undefined;
  if (typeof text !== "string") throw new Error("tool result has no text block");
  return JSON.parse(text);
}

describe("MCP tools", () => {
  let dir: string;
  let ctx: AppContext;
  let client: Client;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-server-"));
    ctx = createAppContext(getConfig({ STORAGE_DIR: dir, LLM_PROVIDER: "none", EMBEDDING_DIMENSION: "64" }));
    await ctx.init();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createMcpServer(ctx).connect(serverTransport);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await ctx.close();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists the three tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["rag_query", "search_documents", "list_documents"]);
  });

  it("lists uploaded documents", async () => {
    const doc = await ctx.documents.upload({ filename: "guide.md", bytes: new TextEncoder().encode("# Guide") });

    const result = await client.callTool({ name: "list_documents", arguments: {} });
    expect(toolJson(result)).toEqual({ documents: [doc], total: 1 });
  });

  it("answers through rag_query and returns the conversation id", async () => {
    await ctx.documents.upload({ filename: "cats.txt", bytes: new TextEncoder().encode("Cats nap in the sun.") });

    const result = toolJson(await client.callTool({ name: "rag_query", arguments: { question: "Where do cats nap?" } }));
    expect(result).toMatchObject({ sources: ["cats.txt"] });
    const conversations = await ctx.conversations.list();
    expect(result).toMatchObject({ conversation_id: conversations[0].id });
  });

  it("rejects a missing question and an unknown tool", async () => {
    await expect(client.callTool({ name: "rag_query", arguments: {} })).rejects.toThrow("Missing question");
    await expect(client.callTool({ name: "nope", arguments: {} })).rejects.toThrow("Unknown tool: nope");
  });
});

describe("toMcpError", () => {
  it("reports lookups of unknown ids as invalid params", () => {
    const err = toMcpError(new NotFoundError("conversation", "c1"));
    expect(err).toBeInstanceOf(McpError);
    expect(err.code).toBe(ErrorCode.InvalidParams);
  });

  it("reports anything else as an internal error", () => {
    expect(toMcpError(new Error("boom")).code).toBe(ErrorCode.InternalError);
  });
});
