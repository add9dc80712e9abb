import { randomBytes } from "node:crypto";
import { accumulateCost, computeTurnCost } from "../pricing/costAccountant.js";
import { DEFAULT_MODEL, resolveModel } from "../pricing/pricingTable.js";
import type {
  ChatMessage,
  ChatSession,
  SessionSummary,
  StreamEvent,
  TokenUsage,
  TurnCompletedEvent,
  TurnEvent,
  TurnFailedEvent,
  TurnPhase,
} from "./chatTypes.js";
import { ChatError, describeError } from "./errors.js";
import { decodeStream, type DecodeOutcome } from "./streamDecoder.js";
import type { TranscriptStore } from "./transcriptStore.js";
import type { ChatTransport, TransportRequest } from "./transport.js";
import { releaseIfUnstarted } from "./turnStream.js";

export type SessionEngineOptions = {
  transport: ChatTransport;
  store: TranscriptStore;
  now?: () => Date;
  randomSuffix?: () => string;
  log?: (line: string) => void;
};

export type SubmitTurnOptions = {
  signal?: AbortSignal;
};

const CLOSED_OUTCOME: DecodeOutcome = {
  status: "failed",
  reason: "connection_interrupted",
  message: "decoder closed",
  partialText: "",
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatSessionId(date: Date, suffix: string): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${suffix}`;
}

function cloneSession(session: ChatSession): ChatSession {
  return {
    ...session,
    messages: session.messages.map((message) => ({ ...message })),
  };
}

/**
 * Drives conversations against a streaming transport.
 *
 * Sessions are plain values: every operation takes one and hands back a new
 * one, and nothing is written to the store until a turn completes. One turn
 * may be in flight per session id; the engine rejects a second with
 * `session_busy`.
 */
export class SessionEngine {
  private transport: ChatTransport;
  private store: TranscriptStore;
  private now: () => Date;
  private randomSuffix: () => string;
  private log: (line: string) => void;
  private inFlight = new Set<string>();

  constructor(options: SessionEngineOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.randomSuffix = options.randomSuffix ?? (() => randomBytes(3).toString("hex"));
    this.log = options.log ?? (() => undefined);
  }

  get transportName(): string {
    return this.transport.name;
  }

  create(model: string = DEFAULT_MODEL): ChatSession {
    resolveModel(model);
    const createdAt = this.now();
    const session: ChatSession = {
      id: formatSessionId(createdAt, this.randomSuffix()),
      createdAt: createdAt.toISOString(),
      model,
      messages: [],
      totalCost: 0,
    };
    this.log(`[engine] session created session=${session.id} model=${model}`);
    return session;
  }

  resume(id: string): Promise<ChatSession> {
    return this.store.load(id);
  }

  list(): Promise<SessionSummary[]> {
    return this.store.list();
  }

  isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  /**
   * Validates the turn and returns its event stream. Precondition failures
   * throw here, before the transport is touched. The stream yields `delta`
   * events while the answer arrives and ends with exactly one `completed` or
   * `failed` event; a consumer that stops early cancels the exchange.
   */
  submitTurn(
    session: ChatSession,
    userText: string,
    options: SubmitTurnOptions = {},
  ): AsyncGenerator<TurnEvent, void, undefined> {
    if (!userText.trim()) {
      throw new ChatError("empty_turn", "Message is empty");
    }
    const last = session.messages.at(-1);
    if (last?.role === "user") {
      throw new ChatError(
        "out_of_order_turn",
        `Conversation ${session.id} already ends with a user message awaiting a reply`,
      );
    }
    resolveModel(session.model);
    if (this.inFlight.has(session.id)) {
      throw new ChatError("session_busy", `Conversation ${session.id} already has a turn in progress`);
    }

    this.inFlight.add(session.id);
    return releaseIfUnstarted(this.runTurn(session, userText, options.signal), () => {
      this.inFlight.delete(session.id);
      this.setPhase(session.id, "idle", "reason=abandoned");
    });
  }

  /** Setup failures become an `error` event so the decoder handles them. */
  private async *openExchange(request: TransportRequest): AsyncGenerator<StreamEvent, void, undefined> {
    let events: AsyncIterable<StreamEvent>;
    try {
      events = this.transport.openStream(request);
    } catch (err) {
      yield { type: "error", message: describeError(err) };
      return;
    }
    yield* events;
  }

  private setPhase(sessionId: string, phase: TurnPhase, detail = ""): void {
    this.log(`[engine] phase=${phase} session=${sessionId}${detail ? ` ${detail}` : ""}`);
  }

  private async *runTurn(
    session: ChatSession,
    userText: string,
    callerSignal: AbortSignal | undefined,
  ): AsyncGenerator<TurnEvent, void, undefined> {
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const working = cloneSession(session);
    const userMessage: ChatMessage = { role: "user", content: userText };
    working.messages.push(userMessage);

    const model = resolveModel(session.model);
    const startedAtMs = Date.now();
    let partialText = "";
    let settled = false;
    const decoder = decodeStream(
      this.openExchange({
        model,
        messages: working.messages.map((message) => ({ ...message })),
        signal: controller.signal,
      }),
    );

    try {
      this.setPhase(session.id, "awaiting_response", `transport=${this.transport.name} model=${model.id}`);

      while (!controller.signal.aborted) {
        const step = await decoder.next();
        if (!step.done) {
          partialText += step.value;
          yield { type: "delta", text: step.value };
          continue;
        }
        if (controller.signal.aborted) {
          break;
        }

        settled = true;
        const outcome = step.value;
        if (outcome.status === "completed") {
          yield await this.commit(working, outcome.finalText, outcome.usage, startedAtMs);
        } else {
          yield this.rollBack(session.id, outcome.reason, outcome.message, outcome.partialText);
        }
        return;
      }

      settled = true;
      yield this.rollBack(session.id, "cancelled", "Turn cancelled", partialText);
    } finally {
      callerSignal?.removeEventListener("abort", onCallerAbort);
      if (!settled) {
        // Consumer stopped reading before a terminal event.
        controller.abort();
        this.setPhase(session.id, "rolling_back", "reason=cancelled");
        this.setPhase(session.id, "idle");
      }
      try {
        await decoder.return(CLOSED_OUTCOME);
      } finally {
        this.inFlight.delete(session.id);
      }
    }
  }

  private async commit(
    working: ChatSession,
    finalText: string,
    usage: TokenUsage,
    startedAtMs: number,
  ): Promise<TurnCompletedEvent> {
    this.setPhase(working.id, "committing");
    working.messages.push({ role: "assistant", content: finalText });
    const turnCost = computeTurnCost(working.model, usage);
    const totalCost = accumulateCost(working, turnCost);

    let persistError: string | undefined;
    try {
      await this.store.save(working);
    } catch (err) {
      persistError = describeError(err);
      this.log(`[engine] save failed session=${working.id} error=${persistError}`);
    }

    this.log(
      `[engine] turn committed session=${working.id} inputTokens=${usage.inputTokens} outputTokens=${usage.outputTokens} cost=${turnCost} total=${totalCost} elapsedMs=${Date.now() - startedAtMs}`,
    );
    this.setPhase(working.id, "idle");

    return {
      type: "completed",
      session: working,
      usage,
      turnCost,
      persisted: persistError === undefined,
      ...(persistError === undefined ? {} : { persistError }),
    };
  }

  private rollBack(
    sessionId: string,
    reason: TurnFailedEvent["reason"],
    message: string,
    partialText: string,
  ): TurnFailedEvent {
    this.setPhase(sessionId, "rolling_back", `reason=${reason} error=${message}`);
    this.setPhase(sessionId, "idle");
    return { type: "failed", reason, message, partialText };
  }
}
