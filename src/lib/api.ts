import { z } from "zod";
import {
  chatSessionSchema,
  errorBodySchema,
  modelCatalogSchema,
  sessionSummarySchema,
  turnEventSchema,
  type ChatSession,
  type ModelCatalog,
  type SessionSummary,
  type TurnEvent,
} from "../types/chat.js";
import { SseParser } from "./sse.js";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type TerminalTurnEvent = Exclude<TurnEvent, { type: "delta" }>;

async function getErrorMessage(res: Response, fallback: string): Promise<string> {
  const body = await res.text();
  if (!body) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  const result = errorBodySchema.safeParse(parsed);
  return result.success ? result.data.error : body;
}

async function readJson<T>(res: Response, schema: z.ZodType<T>, fallback: string): Promise<T> {
  if (!res.ok) {
    throw new Error(await getErrorMessage(res, `${fallback} (${res.status})`));
  }
  return schema.parse(await res.json());
}

export class ChatApi {
  constructor(
    private baseUrl = "/api",
    private fetchImpl: FetchLike = (input, init) => fetch(input, init),
  ) {}

  async listModels(): Promise<ModelCatalog> {
    const res = await this.fetchImpl(`${this.baseUrl}/models`);
    return readJson(res, modelCatalogSchema, "Failed to load models");
  }

  async listSessions(): Promise<SessionSummary[]> {
    const res = await this.fetchImpl(`${this.baseUrl}/sessions`);
    const body = await readJson(
      res,
      z.object({ sessions: z.array(sessionSummarySchema) }),
      "Failed to load conversations",
    );
    return body.sessions;
  }

  async createSession(model?: string): Promise<ChatSession> {
    const res = await this.fetchImpl(`${this.baseUrl}/sessions`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(model ? { model } : {}),
    });
    return readJson(res, chatSessionSchema, "Failed to create conversation");
  }

  async getSession(sessionId: string): Promise<ChatSession> {
    const res = await this.fetchImpl(`${this.baseUrl}/sessions/${encodeURIComponent(sessionId)}`);
    return readJson(res, chatSessionSchema, "Failed to load conversation");
  }

  /**
   * Sends one message and feeds each streamed event to `onEvent`. Resolves
   * with the terminal event; a stream that closes without one counts as an
   * interrupted connection.
   */
  async streamTurn(
    sessionId: string,
    message: string,
    onEvent: (event: TurnEvent) => void,
    signal?: AbortSignal,
  ): Promise<TerminalTurnEvent> {
    const res = await this.fetchImpl(`${this.baseUrl}/sessions/${encodeURIComponent(sessionId)}/turns`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ message }),
      signal,
    });
    if (!res.ok) {
      throw new Error(await getErrorMessage(res, `Failed to send message (${res.status})`));
    }
    if (!res.body) {
      throw new Error("Response has no body");
    }

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    const parser = new SseParser();
    let partialText = "";
    let terminal: TerminalTurnEvent | null = null;

    const decodeEvents = (payloads: string[]): TurnEvent[] => {
      const events: TurnEvent[] = [];
      for (const payload of payloads) {
        let raw: unknown;
        try {
          raw = JSON.parse(payload);
        } catch {
          continue;
        }
        const parsed = turnEventSchema.safeParse(raw);
        if (parsed.success) {
          events.push(parsed.data);
        }
      }
      return events;
    };

    try {
      let done = false;
      while (!done) {
        const chunk = await reader.read();
        done = chunk.done;
        const text = chunk.done ? decoder.decode() : decoder.decode(chunk.value, { stream: true });
        const payloads = parser.push(text);
        if (done) {
          payloads.push(...parser.flush());
        }
        for (const event of decodeEvents(payloads)) {
          if (event.type === "delta") {
            partialText += event.text;
          } else {
            terminal = event;
          }
          onEvent(event);
        }
      }
    } finally {
      reader.releaseLock();
    }

    if (terminal) {
      return terminal;
    }
    const interrupted: TerminalTurnEvent = {
      type: "failed",
      reason: "connection_interrupted",
      message: "stream closed before the turn finished",
      partialText,
    };
    onEvent(interrupted);
    return interrupted;
  }
}

export const chatApi = new ChatApi();
