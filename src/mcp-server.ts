import type { AppContext } from "./app-context";
import { APP_VERSION } from "./config";
import { InvalidRequestError, InvalidUploadError, NotFoundError, PipelineError } from "./errors";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError, Server } from "./mcp-sdk";
import { MAX_K, MIN_K } from "./rag-service";

type ToolArgs = Record<string, unknown>;

function requiredString(args: ToolArgs, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || !v.trim()) throw new McpError(ErrorCode.InvalidParams, `Missing ${key}`);
  return v;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new McpError(ErrorCode.InvalidParams, `${key} must be a string`);
  return v;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new McpError(ErrorCode.InvalidParams, `${key} must be a number`);
  return v;
}

/** Pipeline errors become MCP errors; caller mistakes are reported as invalid params. */
export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof InvalidRequestError || err instanceof InvalidUploadError || err instanceof NotFoundError) {
    return new McpError(ErrorCode.InvalidParams, err.message);
  }
  if (err instanceof PipelineError) return new McpError(ErrorCode.InternalError, err.message);
  return new McpError(ErrorCode.InternalError, err instanceof Error ? err.message : String(err));
}

function jsonResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

const topKSchema = {
  type: "number",
  description: `Number of chunks to retrieve (${MIN_K}-${MAX_K}). Defaults to the server's RETRIEVAL_K.`,
  minimum: MIN_K,
  maximum: MAX_K,
};

/**
 * Build an MCP server exposing the question-answering pipeline as tools.
 * A fresh instance is created per transport session; the stores are shared.
 *
 *  rag_query        { question, conversation_id?, top_k? } -> { answer, sources, conversation_id }
 *  search_documents { query, top_k? }                      -> { results, total }
 *  list_documents   {}                                     -> { documents, total }
 */
export function createMcpServer(ctx: AppContext): Server {
  const server = new Server({ name: "docqa-rag", version: APP_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "rag_query",
        description:
          "Answer a question from the uploaded documents. Returns the answer, the source filenames and the conversation id to continue the thread.",
        inputSchema: {
          type: "object",
          properties: {
            question: { type: "string", description: "Natural language question." },
            conversation_id: {
              type: "string",
              description: "Existing conversation to continue. Omit to start a new one.",
            },
            top_k: topKSchema,
          },
          required: ["question"],
        },
      },
      {
        name: "search_documents",
        description: "Semantic search over the uploaded documents, returning the best matching chunks with scores.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Search text." },
            top_k: topKSchema,
          },
          required: ["query"],
        },
      },
      {
        name: "list_documents",
        description: "List uploaded documents with their size and chunk count.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req, extra) => {
    const args: ToolArgs = req.params.arguments ?? {};
    try {
      switch (req.params.name) {
        case "rag_query": {
          const result = await ctx.rag.ask({
            question: requiredString(args, "question"),
            conversationId: optionalString(args, "conversation_id"),
            k: optionalNumber(args, "top_k"),
            signal: extra.signal,
          });
          return jsonResult({
            answer: result.answer,
            sources: result.sources,
            conversation_id: result.conversationId,
          });
        }
        case "search_documents": {
          const results = await ctx.rag.search(requiredString(args, "query"), optionalNumber(args, "top_k"), extra.signal);
          return jsonResult({
            results: results.map((r) => ({ ...r, score: Number(r.score.toFixed(4)) })),
            total: results.length,
          });
        }
        case "list_documents": {
          const documents = ctx.documents.list();
          return jsonResult({ documents, total: documents.length });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      console.error(`[RAG] Tool ${req.params.name} failed:`, e);
      throw toMcpError(e);
    }
  });

  return server;
}
