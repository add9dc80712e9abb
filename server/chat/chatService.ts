import type { ChatSession, SessionSummary, TurnEvent } from "./chatTypes.js";
import type { SessionEngine, SubmitTurnOptions } from "./sessionEngine.js";
import { previewOf } from "./transcriptStore.js";
import { releaseIfUnstarted } from "./turnStream.js";

/**
 * Holds the sessions the HTTP surface is working with. Only conversations the
 * store does not have yet stay in memory: new ones until their first turn is
 * committed, and ones whose last save failed until a later save succeeds.
 */
export class ChatService {
  private unsaved = new Map<string, ChatSession>();

  constructor(
    private engine: SessionEngine,
    readonly defaultModel?: string,
  ) {}

  get transportName(): string {
    return this.engine.transportName;
  }

  createSession(model?: string): ChatSession {
    const session = this.engine.create(model ?? this.defaultModel);
    this.unsaved.set(session.id, session);
    return session;
  }

  async getSession(sessionId: string): Promise<ChatSession> {
    return this.unsaved.get(sessionId) ?? this.engine.resume(sessionId);
  }

  /** Stored summaries, with unsaved conversations listed from memory. */
  async listSessions(): Promise<SessionSummary[]> {
    const stored = await this.engine.list();
    const pending: SessionSummary[] = [...this.unsaved.values()].map((session) => ({
      id: session.id,
      createdAt: session.createdAt,
      model: session.model,
      totalCost: session.totalCost,
      preview: previewOf(session.messages),
    }));
    return [...pending, ...stored.filter((summary) => !this.unsaved.has(summary.id))].sort(
      (a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id),
    );
  }

  /**
   * Resolves the session and returns the engine's turn stream. On completion
   * the session leaves memory if it was stored, and stays there otherwise.
   * Precondition errors from the engine propagate as thrown `ChatError`s.
   */
  async sendMessage(
    sessionId: string,
    message: string,
    options: SubmitTurnOptions = {},
  ): Promise<AsyncGenerator<TurnEvent, void, undefined>> {
    const session = await this.getSession(sessionId);
    const turn = this.engine.submitTurn(session, message, options);
    return releaseIfUnstarted(this.trackCompletion(turn), () => turn.return(undefined));
  }

  private async *trackCompletion(
    turn: AsyncGenerator<TurnEvent, void, undefined>,
  ): AsyncGenerator<TurnEvent, void, undefined> {
    for await (const event of turn) {
      if (event.type === "completed") {
        if (event.persisted) {
          this.unsaved.delete(event.session.id);
        } else {
          this.unsaved.set(event.session.id, event.session);
        }
      }
      yield event;
    }
  }
}
