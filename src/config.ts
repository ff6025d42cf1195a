import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env (one level above src/); otherwise dotenv's default (cwd).
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project-root .env, falling back to cwd:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type EmbeddingProvider = "local" | "google";
export type LlmProvider = "google" | "none";
export type TransportMode = "http" | "stdio";

export interface Config {
  STORAGE_DIR: string;
  UPLOADS_DIR: string;
  CONVERSATIONS_DIR: string;
  DOCUMENTS_REGISTRY_PATH: string;
  INDEX_STORE_PATH: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  RETRIEVAL_K: number;
  ALLOWED_EXT: string[];
  MAX_FILE_SIZE: number;
  EMBEDDING_PROVIDER: EmbeddingProvider;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSION: number;
  EMBED_BATCH_SIZE: number;
  LLM_PROVIDER: LlmProvider;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  GOOGLE_API_KEY: string | undefined;
  MAX_PROMPT_CHARS: number;
  HISTORY_TURNS: number;
  REQUEST_TIMEOUT_MS: number;
  MAX_RETRIES: number;
  RETRY_BASE_DELAY_MS: number;
  MCP_TRANSPORT: TransportMode;
  PORT: number;
  HOST: string;
  /** Host[:port] values accepted on /mcp; empty means loopback plus HOST. */
  ALLOWED_HOSTS: string[];
  DNS_REBINDING_PROTECTION: boolean;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

/** Parse a bounded integer knob; anything unparsable or out of range falls back to `def`. */
function intVar(env: Env, key: string, def: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return def;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) return def;
  return Math.min(max, Math.floor(n));
}

// Tolerant truthy parsing (supports several common forms).
function boolVar(env: Env, key: string): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function listVar(env: Env, key: string, def: string[]): string[] {
  const list = env[key]
    ?.split(",")
    .map((s) => s.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean);
  return list?.length ? list : def;
}

/**
 * Resolve the runtime configuration from environment variables.
 *
 * @throws {InvalidConfigurationError} When chunk overlap is not smaller than chunk size,
 *   a provider name is unknown, or a Google provider is selected without GOOGLE_API_KEY.
 */
export function getConfig(env: Env = process.env): Config {
  const STORAGE_DIR = path.resolve(env.STORAGE_DIR?.trim() || "storage");
  const INDEX_STORE_PATH =
    env.INDEX_STORE_PATH?.trim() || path.join(STORAGE_DIR, "vector_store", "index.json");

  const CHUNK_SIZE = intVar(env, "CHUNK_SIZE", 500, 1, 8000);
  const CHUNK_OVERLAP = intVar(env, "CHUNK_OVERLAP", 50, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    throw new InvalidConfigurationError(
      `CHUNK_OVERLAP (=${CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (=${CHUNK_SIZE})`,
    );
  }

  const embeddingProvider = (env.EMBEDDING_PROVIDER ?? "local").trim().toLowerCase();
  if (embeddingProvider !== "local" && embeddingProvider !== "google") {
    throw new InvalidConfigurationError(`Unknown EMBEDDING_PROVIDER: ${embeddingProvider}`);
  }
  const llmProvider = (env.LLM_PROVIDER ?? "google").trim().toLowerCase();
  if (llmProvider !== "google" && llmProvider !== "none") {
    throw new InvalidConfigurationError(`Unknown LLM_PROVIDER: ${llmProvider}`);
  }

  const GOOGLE_API_KEY = env.GOOGLE_API_KEY?.trim() || undefined;
  if (!GOOGLE_API_KEY && (embeddingProvider === "google" || llmProvider === "google")) {
    throw new InvalidConfigurationError(
      "GOOGLE_API_KEY is required when EMBEDDING_PROVIDER or LLM_PROVIDER is 'google' (set LLM_PROVIDER=none to run offline)",
    );
  }

  const EMBEDDING_MODEL =
    env.EMBEDDING_MODEL?.trim() ||
    (embeddingProvider === "google" ? "text-embedding-004" : "hashing-trigram-v1");

  const temperature = Number(env.LLM_TEMPERATURE?.trim());
  const LLM_TEMPERATURE =
    Number.isFinite(temperature) && temperature >= 0 && temperature <= 2 ? temperature : 0.7;

  const transport = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const MCP_TRANSPORT: TransportMode = transport === "stdio" ? "stdio" : "http";

  return {
    STORAGE_DIR,
    UPLOADS_DIR: path.join(STORAGE_DIR, "uploads"),
    CONVERSATIONS_DIR: path.join(STORAGE_DIR, "conversations"),
    DOCUMENTS_REGISTRY_PATH: path.join(STORAGE_DIR, "documents.json"),
    INDEX_STORE_PATH,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    RETRIEVAL_K: intVar(env, "RETRIEVAL_K", 5, 1, 20),
    ALLOWED_EXT: listVar(env, "ALLOWED_EXT", ["txt", "md", "pdf", "docx"]),
    MAX_FILE_SIZE: intVar(env, "MAX_FILE_SIZE", 10 * 1024 * 1024, 1, 512 * 1024 * 1024),
    EMBEDDING_PROVIDER: embeddingProvider,
    EMBEDDING_MODEL,
    EMBEDDING_DIMENSION: intVar(env, "EMBEDDING_DIMENSION", 384, 8, 4096),
    EMBED_BATCH_SIZE: intVar(env, "EMBED_BATCH_SIZE", 32, 1, 100),
    LLM_PROVIDER: llmProvider,
    LLM_MODEL: env.LLM_MODEL?.trim() || "gemini-2.5-flash",
    LLM_TEMPERATURE,
    GOOGLE_API_KEY,
    MAX_PROMPT_CHARS: intVar(env, "MAX_PROMPT_CHARS", 12000, 500, 1_000_000),
    HISTORY_TURNS: intVar(env, "HISTORY_TURNS", 6, 0, 100),
    REQUEST_TIMEOUT_MS: intVar(env, "REQUEST_TIMEOUT_MS", 60_000, 1, 600_000),
    MAX_RETRIES: intVar(env, "MAX_RETRIES", 3, 1, 10),
    RETRY_BASE_DELAY_MS: intVar(env, "RETRY_BASE_DELAY_MS", 500, 0, 60_000),
    MCP_TRANSPORT,
    PORT: intVar(env, "PORT", 8000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: listVar(env, "ALLOWED_HOSTS", []),
    DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim().toLowerCase() !== "false",
    VERBOSE: boolVar(env, "VERBOSE"),
  };
}
