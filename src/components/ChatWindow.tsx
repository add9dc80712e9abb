import { type FormEvent, useEffect, useMemo, useRef, useState } from "react";
import type { ChatApi } from "../lib/api.js";
import { formatTurnCaption } from "../lib/format.js";
import type { ChatSession } from "../types/chat.js";

type ChatWindowProps = {
  api: ChatApi;
  session: ChatSession;
  modelLabel: string;
  onSessionUpdated: (session: ChatSession) => void;
};

type UnsavedReply = {
  text: string;
  note: string;
};

export function ChatWindow({ api, session, modelLabel, onSessionUpdated }: ChatWindowProps) {
  const [draft, setDraft] = useState("");
  const [pendingUser, setPendingUser] = useState<string | null>(null);
  const [liveText, setLiveText] = useState<string | null>(null);
  const [captions, setCaptions] = useState<Record<number, string>>({});
  const [unsaved, setUnsaved] = useState<UnsavedReply | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [warning, setWarning] = useState<string | null>(null);
  const abortRef = useRef<AbortController | null>(null);
  const logRef = useRef<HTMLElement | null>(null);

  useEffect(() => {
    setCaptions({});
    setUnsaved(null);
    setError(null);
    setWarning(null);
    return () => abortRef.current?.abort();
  }, [session.id]);

  useEffect(() => {
    if (!logRef.current) {
      return;
    }
    logRef.current.scrollTop = logRef.current.scrollHeight;
  }, [session.messages.length, liveText, pendingUser]);

  const sending = liveText !== null;
  const canSend = useMemo(() => draft.trim().length > 0 && !sending, [draft, sending]);

  async function onSubmit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    if (!canSend) {
      return;
    }

    const text = draft;
    const controller = new AbortController();
    abortRef.current = controller;
    setDraft("");
    setPendingUser(text);
    setLiveText("");
    setUnsaved(null);
    setError(null);
    setWarning(null);
    let streamed = "";

    try {
      const result = await api.streamTurn(
        session.id,
        text,
        (turnEvent) => {
          if (turnEvent.type === "delta") {
            streamed += turnEvent.text;
            setLiveText((current) => `${current ?? ""}${turnEvent.text}`);
          }
        },
        controller.signal,
      );

      if (result.type === "completed") {
        const assistantIndex = result.session.messages.length - 1;
        const caption = formatTurnCaption(result.usage, result.turnCost);
        setCaptions((current) => ({ ...current, [assistantIndex]: caption }));
        if (!result.persisted) {
          setWarning(`Reply kept but not saved: ${result.persistError ?? "unknown error"}`);
        }
        onSessionUpdated(result.session);
        return;
      }

      if (result.partialText) {
        setUnsaved({ text: result.partialText, note: "Interrupted reply, not saved" });
      }
      setError(result.reason === "cancelled" ? "Turn cancelled" : result.message);
      setDraft(text);
    } catch (err) {
      if (streamed) {
        setUnsaved({ text: streamed, note: "Interrupted reply, not saved" });
      }
      setError(controller.signal.aborted ? "Turn cancelled" : err instanceof Error ? err.message : String(err));
      setDraft(text);
    } finally {
      abortRef.current = null;
      setPendingUser(null);
      setLiveText(null);
    }
  }

  return (
    <main className="chat-shell">
      <header className="chat-header">
        <h1>{modelLabel}</h1>
        <p>Conversation {session.id}</p>
      </header>

      <section className="chat-log" aria-live="polite" ref={logRef}>
        {session.messages.length === 0 && pendingUser === null ? (
          <p className="status">No messages yet.</p>
        ) : null}

        {session.messages.map((message, index) => (
          <article key={`${session.id}-${index}`} className={`bubble bubble-${message.role}`}>
            <span className="role">{message.role}</span>
            <p>{message.content}</p>
            {captions[index] ? <span className="caption">{captions[index]}</span> : null}
          </article>
        ))}

        {pendingUser !== null ? (
          <article className="bubble bubble-user">
            <span className="role">user</span>
            <p>{pendingUser}</p>
          </article>
        ) : null}

        {liveText !== null ? (
          <article className="bubble bubble-assistant live">
            <span className="role">assistant</span>
            <p>
              {liveText}
              <span className="cursor">▌</span>
            </p>
          </article>
        ) : null}

        {unsaved ? (
          <article className="bubble bubble-assistant unsaved">
            <span className="role">assistant</span>
            <p>{unsaved.text}</p>
            <span className="caption">{unsaved.note}</span>
          </article>
        ) : null}
      </section>

      <form className="chat-compose" onSubmit={onSubmit}>
        <textarea
          value={draft}
          onChange={(event) => setDraft(event.target.value)}
          placeholder="Type your message..."
          rows={3}
          disabled={sending}
        />
        {sending ? (
          <button type="button" onClick={() => abortRef.current?.abort()}>
            Stop
          </button>
        ) : (
          <button type="submit" disabled={!canSend}>
            Send
          </button>
        )}
      </form>

      {warning ? <p className="warning">{warning}</p> : null}
      {error ? <p className="error">{error}</p> : null}
    </main>
  );
}
