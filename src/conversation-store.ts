import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { NotFoundError, PipelineError } from "./errors";
import { KeyedMutex } from "./mutex";
import { statusManager } from "./status";
import type { Conversation, ConversationMetadata, Message, MessageRole } from "./types";

export type ExportFormat = "json" | "markdown";

const TITLE_MAX = 50;
const ID_PATTERN = /^[A-Za-z0-9-]+$/;

function isMessage(v: unknown): v is Message {
  if (typeof v !== "object" || v === null) return false;
  const role: unknown = Reflect.get(v, "role");
  const sources: unknown = Reflect.get(v, "sources");
  return (
    typeof Reflect.get(v, "id") === "string" &&
    (role === "user" || role === "assistant") &&
    typeof Reflect.get(v, "content") === "string" &&
    typeof Reflect.get(v, "timestamp") === "string" &&
    Array.isArray(sources) &&
    sources.every((s) => typeof s === "string")
  );
}

function isConversation(v: unknown): v is Conversation {
  if (typeof v !== "object" || v === null) return false;
  const messages: unknown = Reflect.get(v, "messages");
  return (
    typeof Reflect.get(v, "id") === "string" &&
    typeof Reflect.get(v, "title") === "string" &&
    typeof Reflect.get(v, "createdAt") === "string" &&
    typeof Reflect.get(v, "updatedAt") === "string" &&
    Array.isArray(messages) &&
    messages.every(isMessage)
  );
}

function toMetadata(c: Conversation): ConversationMetadata {
  return {
    id: c.id,
    title: c.title,
    messageCount: c.messages.length,
    createdAt: c.createdAt,
    updatedAt: c.updatedAt,
  };
}

/** Title derived from the first question: its first 50 characters, "..." when cut. */
export function titleFrom(question: string): string {
  const q = question.trim().replace(/\s+/g, " ");
  if (!q) return "New conversation";
  return q.length > TITLE_MAX ? `${q.slice(0, TITLE_MAX)}...` : q;
}

export function toMarkdown(c: Conversation): string {
  const lines = [
    `# ${c.title}`,
    "",
    `**Created:** ${c.createdAt}`,
    `**Updated:** ${c.updatedAt}`,
    `**Messages:** ${c.messages.length}`,
    "",
    "---",
    "",
  ];
  for (const m of c.messages) {
    lines.push(`## ${m.role === "user" ? "User" : "Assistant"}`, "", m.content, "");
    if (m.sources.length) lines.push(`_Sources: ${m.sources.join(", ")}_`, "");
  }
  return lines.join("\n");
}

/**
 * Append-only conversation log, one JSON file per conversation.
 * Writes to the same conversation are serialised; different conversations
 * proceed independently.
 */
export class ConversationStore {
  private readonly dir: string;
  private readonly locks = new KeyedMutex();
  private readonly verbose: boolean;

  public constructor(dir: string, verbose = false) {
    this.dir = dir;
    this.verbose = verbose;
  }

  public async init(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await this.publishCount();
  }

  public async create(title?: string): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = {
      id: randomUUID(),
      title: title?.trim() || "New conversation",
      messages: [],
      createdAt: now,
      updatedAt: now,
    };
    await this.locks.runExclusive(conversation.id, () => this.write(conversation));
    if (this.verbose) console.error(`[RAG][verbose] Created conversation ${conversation.id}`);
    await this.publishCount();
    return conversation;
  }

  /** @throws {NotFoundError} */
  public async get(id: string): Promise<Conversation> {
    return this.read(id);
  }

  /** Metadata of every stored conversation, most recently updated first. */
  public async list(): Promise<ConversationMetadata[]> {
    const files = await fg("*.json", { cwd: this.dir, absolute: true, onlyFiles: true });
    const out: ConversationMetadata[] = [];
    for (const file of files) {
      const parsed = await this.parseFile(file);
      if (parsed) out.push(toMetadata(parsed));
    }
    return out.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /** @throws {NotFoundError} */
  public async delete(id: string): Promise<void> {
    await this.locks.runExclusive(id, async () => {
      const file = this.fileFor(id);
      try {
        await fs.unlink(file);
      } catch (e) {
        if (errorCode(e) === "ENOENT") throw new NotFoundError("conversation", id);
        throw e;
      }
    });
    console.error(`[RAG] Deleted conversation ${id}`);
    await this.publishCount();
  }

  /**
   * Append one message and bump `updatedAt`.
   * @throws {NotFoundError}
   */
  public async append(id: string, role: MessageRole, content: string, sources: string[] = []): Promise<Message> {
    return this.locks.runExclusive(id, async () => {
      const conversation = await this.read(id);
      const message: Message = {
        id: randomUUID(),
        role,
        content,
        sources: [...sources],
        timestamp: new Date().toISOString(),
      };
      await this.write({
        ...conversation,
        messages: [...conversation.messages, message],
        updatedAt: message.timestamp,
      });
      return message;
    });
  }

  /**
   * Append a question and its answer as one write, so turns of concurrent
   * queries on the same conversation never interleave.
   * @throws {NotFoundError}
   */
  public async appendTurn(
    id: string,
    question: string,
    answer: string,
    sources: string[],
  ): Promise<[Message, Message]> {
    return this.locks.runExclusive(id, async () => {
      const conversation = await this.read(id);
      const timestamp = new Date().toISOString();
      const user: Message = { id: randomUUID(), role: "user", content: question, sources: [], timestamp };
      const assistant: Message = { id: randomUUID(), role: "assistant", content: answer, sources: [...sources], timestamp };
      await this.write({
        ...conversation,
        messages: [...conversation.messages, user, assistant],
        updatedAt: timestamp,
      });
      const turn: [Message, Message] = [user, assistant];
      return turn;
    });
  }

  /** @throws {NotFoundError} */
  public async export(id: string, format: ExportFormat): Promise<string> {
    const conversation = await this.read(id);
    return format === "markdown" ? toMarkdown(conversation) : JSON.stringify(conversation, null, 2);
  }

  private fileFor(id: string): string {
    if (!ID_PATTERN.test(id)) throw new NotFoundError("conversation", id);
    return path.join(this.dir, `${id}.json`);
  }

  private async read(id: string): Promise<Conversation> {
    const file = this.fileFor(id);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") throw new NotFoundError("conversation", id);
      throw e;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new PipelineError("lookup", `Conversation ${id} is not valid JSON`, { cause: e });
    }
    if (!isConversation(parsed)) throw new PipelineError("lookup", `Conversation ${id} has an unexpected shape`);
    return parsed;
  }

  private async parseFile(file: string): Promise<Conversation | null> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(file, "utf8"));
      if (isConversation(parsed)) return parsed;
      console.error(`[RAG] Skipping malformed conversation file ${file}`);
    } catch (e) {
      console.error(`[RAG] Skipping unreadable conversation file ${file}:`, e);
    }
    return null;
  }

  private async write(c: Conversation): Promise<void> {
    const file = this.fileFor(c.id);
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(c, null, 2), "utf8");
    await fs.rename(tmp, file);
  }

  private async publishCount(): Promise<void> {
    const files = await fg("*.json", { cwd: this.dir, onlyFiles: true });
    statusManager.setConversationCount(files.length);
  }
}

function errorCode(e: unknown): unknown {
  return typeof e === "object" && e !== null ? Reflect.get(e, "code") : undefined;
}
