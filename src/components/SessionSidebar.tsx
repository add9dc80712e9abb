import { countUserMessages, formatUsd, shortDate, SIDEBAR_LIMIT } from "../lib/format.js";
import type { ChatSession, ModelInfo, SessionSummary } from "../types/chat.js";

type SessionSidebarProps = {
  models: ModelInfo[];
  selectedModel: string;
  onSelectModel: (model: string) => void;
  onNewConversation: () => void;
  conversations: SessionSummary[];
  activeSession: ChatSession | null;
  onOpenConversation: (sessionId: string) => void;
};

export function SessionSidebar({
  models,
  selectedModel,
  onSelectModel,
  onNewConversation,
  conversations,
  activeSession,
  onOpenConversation,
}: SessionSidebarProps) {
  return (
    <aside className="sidebar">
      <h2>Settings</h2>
      <label>
        Model
        <select value={selectedModel} onChange={(event) => onSelectModel(event.target.value)}>
          {models.map((model) => (
            <option key={model.id} value={model.id}>
              {model.label}
            </option>
          ))}
        </select>
      </label>
      <button type="button" onClick={onNewConversation}>
        New conversation
      </button>

      <h2>Conversations</h2>
      {conversations.length === 0 ? <p className="status">No saved conversations.</p> : null}
      <ul className="conversation-list">
        {conversations.slice(0, SIDEBAR_LIMIT).map((summary) => (
          <li key={summary.id}>
            <button
              type="button"
              className={activeSession?.id === summary.id ? "active" : ""}
              onClick={() => onOpenConversation(summary.id)}
            >
              <span>{summary.preview}</span>
              <small>
                {shortDate(summary.createdAt)} · {formatUsd(summary.totalCost, 3)}
              </small>
            </button>
          </li>
        ))}
      </ul>

      {activeSession ? (
        <section className="session-stats">
          <h2>Session stats</h2>
          <p>Total cost: {formatUsd(activeSession.totalCost)}</p>
          <p>Messages: {countUserMessages(activeSession)}</p>
        </section>
      ) : null}
    </aside>
  );
}
