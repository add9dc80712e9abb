import type { StreamEvent, TokenUsage } from "./chatTypes.js";
import { describeError } from "./errors.js";

export type DecodeOutcome =
  | { status: "completed"; finalText: string; usage: TokenUsage }
  | {
      status: "failed";
      reason: "connection_interrupted" | "provider_error";
      message: string;
      partialText: string;
    };

const NO_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0 };

/**
 * Reduces provider events into live text deltas (yielded in arrival order) and
 * a terminal outcome (the generator's return value).
 *
 * Text seen before an error marker is reported as `partialText` so surfaces can
 * show it, but it never becomes a completed message. A source that ends without
 * a terminal marker, or throws while being read, counts as an interrupted
 * connection. Nothing after a terminal marker is read.
 */
export async function* decodeStream(
  events: AsyncIterable<StreamEvent>,
): AsyncGenerator<string, DecodeOutcome, undefined> {
  let buffer = "";
  let usage: TokenUsage = NO_USAGE;

  try {
    for await (const event of events) {
      switch (event.type) {
        case "fragment":
          if (event.text) {
            buffer += event.text;
            yield event.text;
          }
          break;
        case "usage":
          usage = { ...event.usage };
          break;
        case "success":
          return { status: "completed", finalText: buffer, usage };
        case "error":
          return {
            status: "failed",
            reason: "provider_error",
            message: event.message,
            partialText: buffer,
          };
      }
    }
  } catch (err) {
    return {
      status: "failed",
      reason: "connection_interrupted",
      message: describeError(err),
      partialText: buffer,
    };
  }

  return {
    status: "failed",
    reason: "connection_interrupted",
    message: "stream ended without a completion marker",
    partialText: buffer,
  };
}
