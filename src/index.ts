/**
 * Application entry point.
 *
 * 1. Resolve configuration from the environment (see config.ts / .env.example).
 * 2. Build the application context and load the stores. Documents whose
 *    vectors are missing from the persisted index (first start, changed
 *    embedding model or chunking) are re-indexed from their stored uploads.
 * 3. Serve over either:
 *      - HTTP (default): REST API under /api, /health, MCP at /mcp.
 *      - STDIO (MCP_TRANSPORT=stdio): MCP tools only, for local editor integration.
 *
 * MCP tools: rag_query, search_documents, list_documents.
 */
import type http from "node:http";
import { createAppContext } from "./app-context";
import { getConfig, type Config } from "./config";
import { describeError } from "./retry";
import { createMcpServer } from "./mcp-server";
import type { Server } from "./mcp-sdk";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

let config: Config;
try {
  config = getConfig();
} catch (e) {
  console.error(`[RAG] Invalid configuration: ${describeError(e)}`);
  process.exit(1);
}

const ctx = createAppContext(config);
await ctx.init();

const createServer = () => createMcpServer(ctx);

let httpServer: http.Server | undefined;
let mcpServer: Server | undefined;
if (config.MCP_TRANSPORT === "stdio") {
  statusManager.markTransport("stdio");
  mcpServer = await startStdioTransport(createServer);
} else {
  statusManager.markTransport("http");
  httpServer = await startHttpTransport(ctx, createServer);
}

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.error(`[RAG] ${signal} received, shutting down...`);
  const server = httpServer;
  if (server) {
    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) console.error("[HTTP] Close failed:", err);
        resolve();
      });
      server.closeAllConnections();
    });
  }
  await mcpServer?.close();
  await ctx.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[RAG] Shutdown failed:", e);
        process.exit(1);
      },
    );
  });
}
