import {
  getModel,
  streamSimple,
  type Api,
  type AssistantMessage,
  type AssistantMessageEvent,
  type Context,
  type Message,
  type Model,
} from "@mariozechner/pi-ai";
import type { ChatMessage, StreamEvent } from "./chatTypes.js";
import { describeError } from "./errors.js";
import type { ChatTransport, TransportRequest } from "./transport.js";

export type PiAiTransportOptions = {
  apiKey: string;
  maxTokens: number;
  provider?: "anthropic";
};

function emptyUsage() {
  return {
    input: 0,
    output: 0,
    cacheRead: 0,
    cacheWrite: 0,
    totalTokens: 0,
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
  };
}

function toContextMessage(message: ChatMessage, model: Model<Api>, timestamp: number): Message {
  if (message.role === "user") {
    return { role: "user", content: message.content, timestamp };
  }
  const assistant: AssistantMessage = {
    role: "assistant",
    content: [{ type: "text", text: message.content }],
    api: model.api,
    provider: model.provider,
    model: model.id,
    usage: emptyUsage(),
    stopReason: "stop",
    timestamp,
  };
  return assistant;
}

export function buildContext(messages: ChatMessage[], model: Model<Api>, now = Date.now()): Context {
  return {
    messages: messages.map((message, index) => toContextMessage(message, model, now - messages.length + index)),
  };
}

export function toStreamEvents(event: AssistantMessageEvent): StreamEvent[] {
  switch (event.type) {
    case "text_delta":
      return [{ type: "fragment", text: event.delta }];
    case "done":
      return [
        {
          type: "usage",
          usage: {
            inputTokens: event.message.usage.input,
            outputTokens: event.message.usage.output,
          },
        },
        { type: "success" },
      ];
    case "error":
      return [
        {
          type: "error",
          message: event.error.errorMessage?.trim() || `provider stream ${event.reason}`,
        },
      ];
    default:
      return [];
  }
}

export class PiAiTransport implements ChatTransport {
  name = "pi-ai";

  private provider: "anthropic";

  constructor(private options: PiAiTransportOptions) {
    this.provider = options.provider ?? "anthropic";
  }

  async *openStream(request: TransportRequest): AsyncGenerator<StreamEvent> {
    let events: AsyncIterable<AssistantMessageEvent>;
    try {
      const model: Model<Api> | undefined = getModel(this.provider, request.model.providerModelId as never);
      if (!model) {
        yield {
          type: "error",
          message: `provider model not found: ${this.provider}/${request.model.providerModelId}`,
        };
        return;
      }
      events = streamSimple(model, buildContext(request.messages, model), {
        apiKey: this.options.apiKey,
        maxTokens: this.options.maxTokens,
        signal: request.signal,
      });
    } catch (err) {
      yield { type: "error", message: `failed to open provider stream: ${describeError(err)}` };
      return;
    }

    for await (const event of events) {
      for (const decoded of toStreamEvents(event)) {
        yield decoded;
      }
      if (event.type === "done" || event.type === "error") {
        return;
      }
    }
  }
}
