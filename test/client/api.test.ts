import { describe, expect, it } from "vitest";
import { ChatApi } from "../../src/lib/api.js";
import type { TurnEvent } from "../../src/types/chat.js";

function sseResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

function apiReturning(response: Response) {
  const calls: Array<{ input: string; init?: RequestInit }> = [];
  const api = new ChatApi("/api", async (input, init) => {
    calls.push({ input, init });
    return response;
  });
  return { api, calls };
}

const session = {
  id: "s1",
  createdAt: "2025-01-01T00:00:00.000Z",
  model: "sonnet-4.5",
  messages: [
    { role: "user", content: "hi" },
    { role: "assistant", content: "Hello" },
  ],
  totalCost: 0.0033,
};

describe("ChatApi.streamTurn", () => {
  it("delivers deltas and resolves with the completed event", async () => {
    const completed = {
      type: "completed",
      session,
      usage: { inputTokens: 100, outputTokens: 200 },
      turnCost: 0.0033,
      persisted: true,
    };
    const { api, calls } = apiReturning(
      sseResponse([
        'data: {"type":"delta","text":"Hel"}\n\nda',
        'ta: {"type":"delta","text":"lo"}\n\n',
        `data: ${JSON.stringify(completed)}\n\n`,
      ]),
    );
    const seen: TurnEvent[] = [];

    const result = await api.streamTurn("s1", "hi", (event) => seen.push(event));

    expect(seen.slice(0, 2)).toEqual([
      { type: "delta", text: "Hel" },
      { type: "delta", text: "lo" },
    ]);
    expect(result).toEqual(completed);
    expect(calls[0]?.input).toBe("/api/sessions/s1/turns");
    expect(calls[0]?.init?.body).toBe('{"message":"hi"}');
  });

  it("treats a stream without a terminal event as interrupted", async () => {
    const { api } = apiReturning(sseResponse(['data: {"type":"delta","text":"Par"}\n\n']));
    const seen: TurnEvent[] = [];

    const result = await api.streamTurn("s1", "hi", (event) => seen.push(event));

    const interrupted = {
      type: "failed",
      reason: "connection_interrupted",
      message: "stream closed before the turn finished",
      partialText: "Par",
    };
    expect(result).toEqual(interrupted);
    expect(seen.at(-1)).toEqual(interrupted);
  });

  it("skips payloads that are not turn events", async () => {
    const { api } = apiReturning(
      sseResponse([
        "data: not json\n\n",
        'data: {"type":"mystery"}\n\n',
        'data: {"type":"failed","reason":"provider_error","message":"overloaded","partialText":""}\n\n',
      ]),
    );
    const seen: TurnEvent[] = [];

    const result = await api.streamTurn("s1", "hi", (event) => seen.push(event));

    expect(seen).toEqual([result]);
    expect(result).toMatchObject({ type: "failed", message: "overloaded" });
  });

  it("surfaces JSON errors from the server", async () => {
    const { api } = apiReturning(
      new Response(JSON.stringify({ error: "Conversation s1 already has a turn in progress", code: "session_busy" }), {
        status: 409,
      }),
    );

    await expect(api.streamTurn("s1", "hi", () => undefined)).rejects.toThrow(
      "Conversation s1 already has a turn in progress",
    );
  });
});

describe("ChatApi requests", () => {
  it("validates session payloads", async () => {
    const { api, calls } = apiReturning(new Response(JSON.stringify(session), { status: 200 }));

    expect(await api.getSession("s 1")).toEqual(session);
    expect(calls[0]?.input).toBe("/api/sessions/s%201");
  });

  it("loads the model catalog with its default", async () => {
    const catalog = {
      models: [
        { id: "sonnet-4.5", label: "Claude Sonnet 4.5", inputRatePerMToken: 3, outputRatePerMToken: 15 },
        { id: "opus-4", label: "Claude Opus 4", inputRatePerMToken: 15, outputRatePerMToken: 75 },
      ],
      defaultModel: "opus-4",
    };
    const { api, calls } = apiReturning(new Response(JSON.stringify(catalog), { status: 200 }));

    expect(await api.listModels()).toEqual(catalog);
    expect(calls[0]?.input).toBe("/api/models");
  });

  it("falls back to the status when the error body is empty", async () => {
    const { api } = apiReturning(new Response("", { status: 500 }));
    await expect(api.listSessions()).rejects.toThrow("Failed to load conversations (500)");
  });
});
