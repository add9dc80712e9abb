import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ChatMessage, ChatSession, SessionSummary } from "./chatTypes.js";
import { ChatError, describeError } from "./errors.js";

const PREVIEW_LENGTH = 60;
const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

const sessionRecordSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string().min(1),
  model: z.string().min(1),
  messages: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      content: z.string(),
    }),
  ),
  totalCost: z.number().nonnegative(),
});

export interface TranscriptStore {
  load(id: string): Promise<ChatSession>;
  save(session: ChatSession): Promise<void>;
  list(): Promise<SessionSummary[]>;
}

export type FileTranscriptStoreOptions = {
  log?: (line: string) => void;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

export function previewOf(messages: ChatMessage[]): string {
  const firstUser = messages.find((message) => message.role === "user");
  if (!firstUser) {
    return "New conversation";
  }
  const content = firstUser.content;
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

function toRecord(session: ChatSession): ChatSession {
  return {
    id: session.id,
    createdAt: session.createdAt,
    model: session.model,
    messages: session.messages.map((message) => ({ role: message.role, content: message.content })),
    totalCost: session.totalCost,
  };
}

export class FileTranscriptStore implements TranscriptStore {
  private ready: Promise<void> | null = null;

  constructor(
    readonly directory: string,
    private options: FileTranscriptStoreOptions = {},
  ) {}

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs
        .mkdir(this.directory, { recursive: true })
        .then(() => undefined)
        .catch((err: unknown) => {
          this.ready = null;
          throw new ChatError("io_failure", `Cannot create transcript directory ${this.directory}`, {
            cause: err,
          });
        });
    }
    return this.ready;
  }

  private fileFor(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  private async readRecord(file: string): Promise<ChatSession> {
    const raw = await fs.readFile(file, "utf8");
    return sessionRecordSchema.parse(JSON.parse(raw));
  }

  async load(id: string): Promise<ChatSession> {
    if (!isValidSessionId(id)) {
      throw new ChatError("not_found", `Conversation not found: ${id}`);
    }
    await this.ensureDirectory();

    try {
      return await this.readRecord(this.fileFor(id));
    } catch (err) {
      if (isMissingFile(err)) {
        throw new ChatError("not_found", `Conversation not found: ${id}`, { cause: err });
      }
      throw new ChatError("io_failure", `Conversation ${id} is unreadable: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async save(session: ChatSession): Promise<void> {
    if (!isValidSessionId(session.id)) {
      throw new ChatError("io_failure", `Refusing to save conversation with invalid id: ${session.id}`);
    }
    await this.ensureDirectory();

    const target = this.fileFor(session.id);
    const temp = path.join(this.directory, `.${session.id}.${randomUUID()}.tmp`);
    try {
      await fs.writeFile(temp, `${JSON.stringify(toRecord(session), null, 2)}\n`, "utf8");
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw new ChatError("io_failure", `Failed to save conversation ${session.id}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async list(): Promise<SessionSummary[]> {
    await this.ensureDirectory();

    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (err) {
      throw new ChatError("io_failure", `Cannot list ${this.directory}: ${describeError(err)}`, {
        cause: err,
      });
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json") || entry.startsWith(".")) {
        continue;
      }
      try {
        const record = await this.readRecord(path.join(this.directory, entry));
        summaries.push({
          id: record.id,
          createdAt: record.createdAt,
          model: record.model,
          totalCost: record.totalCost,
          preview: previewOf(record.messages),
        });
      } catch (err) {
        this.options.log?.(`[store] skipped unreadable transcript file=${entry} error=${describeError(err)}`);
      }
    }

    return summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));
  }
}
