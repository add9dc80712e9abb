import express from "express";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { buildChatRouter, statusForError } from "../../server/chat/chatRouter.js";
import { ChatService } from "../../server/chat/chatService.js";
import { ChatError } from "../../server/chat/errors.js";
import { SessionEngine } from "../../server/chat/sessionEngine.js";
import type { ChatSession } from "../../server/chat/chatTypes.js";
import { chatSessionSchema, modelCatalogSchema, sessionSummarySchema } from "../../src/types/chat.js";
import { answer, MemoryTranscriptStore, ScriptedTransport } from "./fakes.js";

type ServerOptions = {
  store?: MemoryTranscriptStore;
  transport?: ScriptedTransport;
  defaultModel?: string;
  log?: (line: string) => void;
  onResponseClose?: () => void;
};

async function withServer(run: (baseUrl: string) => Promise<void>, options: ServerOptions = {}) {
  const engine = new SessionEngine({
    transport: options.transport ?? new ScriptedTransport(answer(["Hel", "lo"], 3, 4)),
    store: options.store ?? new MemoryTranscriptStore(),
    log: options.log,
  });
  const app = express();
  app.use(express.json());
  const { onResponseClose } = options;
  if (onResponseClose) {
    app.use((_req, res, next) => {
      res.on("close", onResponseClose);
      next();
    });
  }
  app.use("/api", buildChatRouter(new ChatService(engine, options.defaultModel)));

  const server = await new Promise<import("node:http").Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });

  const addr = server.address();
  if (!addr || typeof addr === "string") {
    server.close();
    throw new Error("Failed to resolve server address");
  }

  try {
    await run(`http://127.0.0.1:${addr.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/** Holds `load` open until the test releases it. */
class SlowLoadStore extends MemoryTranscriptStore {
  entered = deferred();
  release = deferred();

  async load(id: string): Promise<ChatSession> {
    this.entered.resolve();
    await this.release.promise;
    return super.load(id);
  }
}

function post(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

function dataPayloads(body: string): unknown[] {
  return body
    .split("\n\n")
    .filter((block) => block.startsWith("data: "))
    .map((block): unknown => JSON.parse(block.slice("data: ".length)));
}

describe("chatRouter", () => {
  it("lists the model catalog", async () => {
    await withServer(async (baseUrl) => {
      const res = await fetch(`${baseUrl}/api/models`);
      const body = modelCatalogSchema.parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.models.map((model) => model.id)).toEqual(["sonnet-4.5", "opus-4", "sonnet-4"]);
      expect(body.defaultModel).toBe("sonnet-4.5");
    });
  });

  it("creates sessions with the configured default model", async () => {
    await withServer(
      async (baseUrl) => {
        const catalog = modelCatalogSchema.parse(await (await fetch(`${baseUrl}/api/models`)).json());
        expect(catalog.defaultModel).toBe("opus-4");

        const created = chatSessionSchema.parse(await (await post(`${baseUrl}/api/sessions`, {})).json());
        expect(created.model).toBe("opus-4");
      },
      { defaultModel: "opus-4" },
    );
  });

  it("creates sessions and rejects unknown models", async () => {
    await withServer(async (baseUrl) => {
      const created = await post(`${baseUrl}/api/sessions`, {});
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ model: "sonnet-4.5", messages: [], totalCost: 0 });

      const rejected = await post(`${baseUrl}/api/sessions`, { model: "gpt-x" });
      expect(rejected.status).toBe(400);
      expect(await rejected.json()).toMatchObject({ code: "unknown_model" });
    });
  });

  it("streams a turn as server-sent events", async () => {
    await withServer(async (baseUrl) => {
      const session = chatSessionSchema.parse(await (await post(`${baseUrl}/api/sessions`, {})).json());

      const res = await post(`${baseUrl}/api/sessions/${session.id}/turns`, { message: "hi" });

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toContain("text/event-stream");
      const events = dataPayloads(await res.text());
      expect(events.slice(0, 2)).toEqual([
        { type: "delta", text: "Hel" },
        { type: "delta", text: "lo" },
      ]);
      expect(events[2]).toMatchObject({
        type: "completed",
        usage: { inputTokens: 3, outputTokens: 4 },
        persisted: true,
        session: {
          id: session.id,
          messages: [
            { role: "user", content: "hi" },
            { role: "assistant", content: "Hello" },
          ],
        },
      });

      const reloaded = chatSessionSchema.parse(await (await fetch(`${baseUrl}/api/sessions/${session.id}`)).json());
      expect(reloaded.messages).toHaveLength(2);

      const listed = z
        .object({ sessions: z.array(sessionSummarySchema) })
        .parse(await (await fetch(`${baseUrl}/api/sessions`)).json());
      expect(listed.sessions).toHaveLength(1);
      expect(listed.sessions[0]).toMatchObject({ id: session.id, preview: "hi" });
    });
  });

  it("answers precondition failures with JSON before streaming", async () => {
    await withServer(async (baseUrl) => {
      const session = chatSessionSchema.parse(await (await post(`${baseUrl}/api/sessions`, {})).json());

      const empty = await post(`${baseUrl}/api/sessions/${session.id}/turns`, { message: "   " });
      expect(empty.status).toBe(400);
      expect(await empty.json()).toEqual({ error: "Message is empty", code: "empty_turn" });

      const invalid = await post(`${baseUrl}/api/sessions/${session.id}/turns`, {});
      expect(invalid.status).toBe(400);

      const missing = await post(`${baseUrl}/api/sessions/unknown_id/turns`, { message: "hi" });
      expect(missing.status).toBe(404);
      expect(await missing.json()).toMatchObject({ code: "not_found" });
    });
  });

  it("cancels a turn whose client left while the session was loading", async () => {
    const store = new SlowLoadStore();
    store.records.set("stored_1", {
      id: "stored_1",
      createdAt: "2025-01-01T00:00:00.000Z",
      model: "sonnet-4.5",
      messages: [],
      totalCost: 0,
    });
    const transport = new ScriptedTransport(answer(["late"], 1, 1));
    const lines: string[] = [];
    const closed = deferred();

    await withServer(
      async (baseUrl) => {
        const client = new AbortController();
        const pending = fetch(`${baseUrl}/api/sessions/stored_1/turns`, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ message: "hi" }),
          signal: client.signal,
        }).catch((err: unknown) => err);

        await store.entered.promise;
        client.abort();
        await pending;
        await closed.promise;
        store.release.resolve();

        await vi.waitFor(() => {
          expect(lines).toContain("[engine] phase=idle session=stored_1");
        });
      },
      { store, transport, log: (line) => lines.push(line), onResponseClose: () => closed.resolve() },
    );

    expect(lines).toContain("[engine] phase=rolling_back session=stored_1 reason=cancelled error=Turn cancelled");
    expect(transport.requests).toEqual([]);
    expect(store.saved).toEqual([]);
  });

  it("maps error codes to statuses", () => {
    expect(statusForError(new ChatError("not_found", "x"))).toBe(404);
    expect(statusForError(new ChatError("unknown_model", "x"))).toBe(400);
    expect(statusForError(new ChatError("session_busy", "x"))).toBe(409);
    expect(statusForError(new ChatError("out_of_order_turn", "x"))).toBe(409);
    expect(statusForError(new ChatError("io_failure", "x"))).toBe(500);
    expect(statusForError(new Error("plain"))).toBe(500);
  });
});
