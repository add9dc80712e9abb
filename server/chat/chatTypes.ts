export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatSession = {
  id: string;
  createdAt: string;
  model: string;
  messages: ChatMessage[];
  totalCost: number;
};

export type SessionSummary = {
  id: string;
  createdAt: string;
  model: string;
  totalCost: number;
  preview: string;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
};

// Provider events after decoding at the transport boundary.
export type StreamEvent =
  | { type: "fragment"; text: string }
  | { type: "usage"; usage: TokenUsage }
  | { type: "success" }
  | { type: "error"; message: string };

export type TurnFailureReason = "connection_interrupted" | "provider_error" | "cancelled";

export type TurnDeltaEvent = {
  type: "delta";
  text: string;
};

export type TurnCompletedEvent = {
  type: "completed";
  session: ChatSession;
  usage: TokenUsage;
  turnCost: number;
  persisted: boolean;
  persistError?: string;
};

export type TurnFailedEvent = {
  type: "failed";
  reason: TurnFailureReason;
  message: string;
  partialText: string;
};

export type TurnEvent = TurnDeltaEvent | TurnCompletedEvent | TurnFailedEvent;

export type TurnPhase = "idle" | "awaiting_response" | "committing" | "rolling_back";
