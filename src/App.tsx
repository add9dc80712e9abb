import { useCallback, useEffect, useState } from "react";
import { ChatWindow } from "./components/ChatWindow.js";
import { SessionSidebar } from "./components/SessionSidebar.js";
import { chatApi } from "./lib/api.js";
import type { ChatSession, ModelInfo, SessionSummary } from "./types/chat.js";

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default function App() {
  const [models, setModels] = useState<ModelInfo[]>([]);
  const [selectedModel, setSelectedModel] = useState("");
  const [conversations, setConversations] = useState<SessionSummary[]>([]);
  const [session, setSession] = useState<ChatSession | null>(null);
  const [error, setError] = useState<string | null>(null);

  const refreshConversations = useCallback(() => {
    chatApi
      .listSessions()
      .then(setConversations)
      .catch((err: unknown) => setError(errorText(err)));
  }, []);

  useEffect(() => {
    chatApi
      .listModels()
      .then((catalog) => {
        setModels(catalog.models);
        setSelectedModel((current) => current || catalog.defaultModel);
      })
      .catch((err: unknown) => setError(errorText(err)));
    refreshConversations();
  }, [refreshConversations]);

  function startConversation() {
    setError(null);
    chatApi
      .createSession(selectedModel || undefined)
      .then((created) => {
        setSession(created);
        refreshConversations();
      })
      .catch((err: unknown) => setError(errorText(err)));
  }

  function openConversation(sessionId: string) {
    setError(null);
    chatApi
      .getSession(sessionId)
      .then(setSession)
      .catch((err: unknown) => setError(errorText(err)));
  }

  function onSessionUpdated(updated: ChatSession) {
    setSession(updated);
    refreshConversations();
  }

  const modelLabel = models.find((model) => model.id === session?.model)?.label ?? session?.model ?? "";

  return (
    <div className="app-shell">
      <SessionSidebar
        models={models}
        selectedModel={selectedModel}
        onSelectModel={setSelectedModel}
        onNewConversation={startConversation}
        conversations={conversations}
        activeSession={session}
        onOpenConversation={openConversation}
      />
      <section className="tab-body">
        {error ? <p className="error">{error}</p> : null}
        {session ? (
          <ChatWindow
            api={chatApi}
            session={session}
            modelLabel={modelLabel}
            onSessionUpdated={onSessionUpdated}
          />
        ) : (
          <p className="status">Start a new conversation or open a saved one.</p>
        )}
      </section>
    </div>
  );
}
