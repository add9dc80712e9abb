import { setTimeout as delay } from "node:timers/promises";
import type { StreamEvent } from "./chatTypes.js";
import type { ChatTransport, TransportRequest } from "./transport.js";

type MockTransportOptions = {
  fragmentDelayMs?: number;
};

function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / 4));
}

export class MockTransport implements ChatTransport {
  name = "mock";

  private fragmentDelayMs: number;

  constructor(options: MockTransportOptions = {}) {
    this.fragmentDelayMs = options.fragmentDelayMs ?? 25;
  }

  async *openStream(request: TransportRequest): AsyncGenerator<StreamEvent> {
    const lastUser = [...request.messages].reverse().find((message) => message.role === "user");
    const reply = [
      `This is a mock ${request.model.label} response.`,
      `You said: ${lastUser?.content ?? ""}`,
      `Conversation so far: ${request.messages.length} message(s).`,
    ].join("\n\n");

    for (const fragment of reply.split(/(?<=\s)/)) {
      if (request.signal.aborted) {
        yield { type: "error", message: "request aborted" };
        return;
      }
      if (this.fragmentDelayMs > 0) {
        try {
          await delay(this.fragmentDelayMs, undefined, { signal: request.signal });
        } catch {
          yield { type: "error", message: "request aborted" };
          return;
        }
      }
      yield { type: "fragment", text: fragment };
    }

    const prompt = request.messages.map((message) => message.content).join("\n");
    yield {
      type: "usage",
      usage: { inputTokens: estimateTokens(prompt), outputTokens: estimateTokens(reply) },
    };
    yield { type: "success" };
  }
}
