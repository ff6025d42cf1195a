import { StdioServerTransport, type Server } from "../mcp-sdk";

/**
 * Start the MCP stdio transport. stdout belongs to the protocol from here on;
 * all logging goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns The connected server, so the caller can close it on shutdown.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[RAG] MCP stdio transport connected");
  return server;
}
