export type ChatErrorCode =
  | "unknown_model"
  | "out_of_order_turn"
  | "empty_turn"
  | "session_busy"
  | "not_found"
  | "io_failure"
  | "missing_credential";

export class ChatError extends Error {
  readonly code: ChatErrorCode;

  constructor(code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChatError";
    this.code = code;
  }
}

export function isChatError(value: unknown, code?: ChatErrorCode): value is ChatError {
  if (!(value instanceof ChatError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
