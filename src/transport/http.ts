/**
 * HTTP transport: REST API for documents, chat and conversations, a health
 * probe, and the MCP streamable-HTTP endpoint.
 *
 * MCP session model: a client starts with an `initialize` request on POST /mcp
 * without an `mcp-session-id` header. A transport + MCP server pair is created
 * and the SDK hands the generated session id back in a header; later requests
 * for the session must carry it. Sessions are evicted when the transport closes.
 *
 * Endpoints:
 *  - POST   /api/documents/upload             multipart `file` field, or raw body with ?filename=
 *  - GET    /api/documents, /api/documents/search?q=&k=, /api/documents/:id
 *  - DELETE /api/documents/:id
 *  - POST   /api/chat/query                   { question, conversation_id?, k? }
 *  - POST   /api/conversations                { title? }
 *  - GET    /api/conversations, /api/conversations/:id, /api/conversations/:id/export?format=
 *  - DELETE /api/conversations/:id
 *  - POST|GET|DELETE /mcp
 *  - GET    /health
 */
import express from "express";
import multer from "multer";
import type http from "node:http";
import { randomUUID } from "node:crypto";
import type { AppContext } from "../app-context";
import type { ExportFormat } from "../conversation-store";
import {
  CancelledError,
  InvalidConfigurationError,
  InvalidRequestError,
  InvalidUploadError,
  NotFoundError,
  PipelineError,
  type PipelineStage,
} from "../errors";
import { StreamableHTTPServerTransport, isInitializeRequest, type Server } from "../mcp-sdk";
import { statusManager } from "../status";

export interface HttpErrorBody {
  error: string;
  stage?: PipelineStage;
}

/** Map an error to an HTTP status and JSON body. */
export function toHttpError(err: unknown): { status: number; body: HttpErrorBody } {
  if (err instanceof PipelineError) {
    const body = { error: err.message, stage: err.stage };
    if (
      err instanceof InvalidRequestError ||
      err instanceof InvalidUploadError ||
      err instanceof InvalidConfigurationError
    ) {
      return { status: 400, body };
    }
    if (err instanceof NotFoundError) return { status: 404, body };
    if (err instanceof CancelledError) return { status: 499, body };
    return { status: 502, body };
  }
  // body-parser errors (payload too large, malformed JSON) carry their own 4xx status
  const status: unknown = typeof err === "object" && err !== null ? Reflect.get(err, "status") : undefined;
  if (typeof status === "number" && status >= 400 && status < 500 && err instanceof Error) {
    return { status, body: { error: err.message } };
  }
  return { status: 500, body: { error: "Internal server error" } };
}

function sendError(res: express.Response, err: unknown): void {
  const { status, body } = toHttpError(err);
  if (status >= 500) console.error("[HTTP] Request failed:", err);
  if (!res.headersSent) res.status(status).json(body);
}

type Handler = (req: express.Request, res: express.Response) => Promise<void>;

/** Adapt an async handler so rejections reach {@link sendError}. */
function route(fn: Handler): express.RequestHandler {
  return (req, res) => {
    fn(req, res).catch((e: unknown) => sendError(res, e));
  };
}

function queryString(req: express.Request, key: string): string | undefined {
  const v = req.query[key];
  return typeof v === "string" ? v : undefined;
}

function optionalNumber(value: unknown, key: string): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(n)) throw new InvalidRequestError(`${key} must be a number`);
  return n;
}

function bodyField(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null ? Reflect.get(body, key) : undefined;
}

function optionalBodyString(body: unknown, key: string): string | undefined {
  const v = bodyField(body, key);
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new InvalidRequestError(`${key} must be a string`);
  return v;
}

/** AbortSignal that fires when the client goes away before the response is sent. */
function disconnectSignal(res: express.Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

/**
 * Build the Express application.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 */
export function createHttpApp(ctx: AppContext, createServer: () => Server): express.Express {
  const { config } = ctx;
  const app = express();
  const json = express.json({ limit: "2mb" });

  // ---- documents ----------------------------------------------------------

  // Parsers admit MAX_FILE_SIZE + 1 bytes; the store rejects anything over MAX_FILE_SIZE.
  const rawBody = express.raw({ type: () => true, limit: config.MAX_FILE_SIZE + 1 });
  const multipart = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.MAX_FILE_SIZE + 1, files: 1 },
  }).single("file");
  const uploadBody: express.RequestHandler = (req, res, next) => {
    if (!req.is("multipart/form-data")) {
      rawBody(req, res, next);
      return;
    }
    multipart(req, res, (err: unknown) => {
      next(err instanceof multer.MulterError ? new InvalidUploadError(err.message) : err);
    });
  };

  app.post(
    "/api/documents/upload",
    uploadBody,
    route(async (req, res) => {
      let filename: string | undefined;
      let bytes: Buffer;
      if (req.file) {
        filename = req.file.originalname;
        bytes = req.file.buffer;
      } else if (req.is("multipart/form-data")) {
        throw new InvalidUploadError("Missing form field 'file'");
      } else {
        filename = queryString(req, "filename") ?? req.header("x-filename");
        const raw: unknown = req.body;
        bytes = Buffer.isBuffer(raw) ? raw : Buffer.alloc(0);
      }
      if (!filename?.trim()) throw new InvalidUploadError("Missing filename (use ?filename=)");
      if (bytes.length === 0) throw new InvalidUploadError("Empty upload");
      const doc = await ctx.documents.upload({ filename, bytes }, disconnectSignal(res));
      res.status(201).json(doc);
    }),
  );

  app.get(
    "/api/documents",
    route(async (_req, res) => {
      const documents = ctx.documents.list();
      res.json({ documents, total: documents.length });
    }),
  );

  app.get(
    "/api/documents/search",
    route(async (req, res) => {
      const q = queryString(req, "q") ?? "";
      const results = await ctx.rag.search(q, optionalNumber(req.query.k, "k"), disconnectSignal(res));
      res.json({ results, total: results.length });
    }),
  );

  app.get(
    "/api/documents/:id",
    route(async (req, res) => {
      res.json(ctx.documents.get(req.params.id));
    }),
  );

  app.delete(
    "/api/documents/:id",
    route(async (req, res) => {
      await ctx.documents.delete(req.params.id);
      res.json({ success: true });
    }),
  );

  // ---- chat ---------------------------------------------------------------

  app.post(
    "/api/chat/query",
    json,
    route(async (req, res) => {
      const body: unknown = req.body;
      const question = bodyField(body, "question");
      if (typeof question !== "string") throw new InvalidRequestError("question must be a string");
      const result = await ctx.rag.ask({
        question,
        conversationId: optionalBodyString(body, "conversation_id"),
        k: optionalNumber(bodyField(body, "k"), "k"),
        signal: disconnectSignal(res),
      });
      res.json({ answer: result.answer, sources: result.sources, conversation_id: result.conversationId });
    }),
  );

  // ---- conversations ------------------------------------------------------

  app.post(
    "/api/conversations",
    json,
    route(async (req, res) => {
      const conversation = await ctx.conversations.create(optionalBodyString(req.body, "title"));
      res.status(201).json(conversation);
    }),
  );

  app.get(
    "/api/conversations",
    route(async (_req, res) => {
      const conversations = await ctx.conversations.list();
      res.json({ conversations, total: conversations.length });
    }),
  );

  app.get(
    "/api/conversations/:id",
    route(async (req, res) => {
      res.json(await ctx.conversations.get(req.params.id));
    }),
  );

  app.get(
    "/api/conversations/:id/export",
    route(async (req, res) => {
      const requested = queryString(req, "format") ?? "json";
      if (requested !== "json" && requested !== "markdown") {
        throw new InvalidRequestError(`Unsupported export format: ${requested} (use json or markdown)`);
      }
      const format: ExportFormat = requested;
      const content = await ctx.conversations.export(req.params.id, format);
      const ext = format === "markdown" ? "md" : "json";
      res
        .status(200)
        .attachment(`conversation-${req.params.id}.${ext}`)
        .type(format === "markdown" ? "text/markdown; charset=utf-8" : "application/json; charset=utf-8")
        .send(content);
    }),
  );

  app.delete(
    "/api/conversations/:id",
    route(async (req, res) => {
      await ctx.conversations.delete(req.params.id);
      res.json({ success: true });
    }),
  );

  // ---- MCP streamable HTTP ------------------------------------------------

  const allowedHosts = config.ALLOWED_HOSTS.length
    ? config.ALLOWED_HOSTS
    : Array.from(
        new Set([
          "127.0.0.1",
          `127.0.0.1:${config.PORT}`,
          "localhost",
          `localhost:${config.PORT}`,
          config.HOST,
          `${config.HOST}:${config.PORT}`,
        ]),
      );
  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post(
    "/mcp",
    json,
    async (req: express.Request, res: express.Response) => {
      try {
        const sessionId = req.header("mcp-session-id");
        let transport = sessionId ? transports.get(sessionId) : undefined;

        // Session creation path: only when no header AND the body is a valid initialize request.
        if (!transport && !sessionId && isInitializeRequest(req.body)) {
          const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
            sessionIdGenerator: () => randomUUID(),
            onsessioninitialized: (sid: string) => {
              transports.set(sid, created);
            },
            enableDnsRebindingProtection: config.DNS_REBINDING_PROTECTION,
            allowedHosts,
          });
          const server = createServer();
          let closing = false;
          created.onclose = () => {
            if (closing) return;
            closing = true;
            if (created.sessionId) transports.delete(created.sessionId);
            // server.close() closes the transport again, which would re-enter onclose
            created.onclose = undefined;
            server.close().catch((e: unknown) => console.error("[HTTP] MCP server close failed:", e));
          };
          await server.connect(created);
          transport = created;
        }

        if (!transport) {
          res.status(400).json({
            jsonrpc: "2.0",
            error: { code: -32000, message: "Bad Request: No valid session ID provided" },
            id: null,
          });
          return;
        }

        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        console.error("[HTTP] MCP POST error:", err);
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: "2.0",
            error: { code: -32603, message: "Internal server error" },
            id: null,
          });
        }
      }
    },
  );

  /** GET /mcp (stream) and DELETE /mcp (teardown) require an existing session. */
  const handleSessionRequest = route(async (req, res) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  });

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  // ---- health -------------------------------------------------------------

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  // Body-parser failures land here.
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    sendError(res, err);
  });

  return app;
}

/**
 * Bind the HTTP application.
 * @returns The listening server, resolved once the port is bound.
 */
export async function startHttpTransport(ctx: AppContext, createServer: () => Server): Promise<http.Server> {
  const { PORT: port, HOST: host } = ctx.config;
  const app = createHttpApp(ctx, createServer);
  return new Promise<http.Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off("error", reject);
      console.error(`[HTTP] Listening at http://${host}:${port} (REST under /api, MCP at /mcp)`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
