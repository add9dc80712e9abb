import { requireApiKey, type AppConfig } from "../config/env.js";
import { MockTransport } from "./mockTransport.js";
import { PiAiTransport } from "./piAiTransport.js";
import { SessionEngine } from "./sessionEngine.js";
import { FileTranscriptStore } from "./transcriptStore.js";
import type { ChatTransport } from "./transport.js";

export type EngineContext = {
  engine: SessionEngine;
  store: FileTranscriptStore;
  transport: ChatTransport;
  config: AppConfig;
};

export type EngineContextOptions = {
  log?: (line: string) => void;
};

export function buildTransport(config: AppConfig): ChatTransport {
  if (config.transport === "mock") {
    return new MockTransport();
  }
  return new PiAiTransport({ apiKey: requireApiKey(config), maxTokens: config.maxTokens });
}

/** Throws `missing_credential` before anything is built when the real transport has no key. */
export function buildEngineContext(config: AppConfig, options: EngineContextOptions = {}): EngineContext {
  const transport = buildTransport(config);
  const store = new FileTranscriptStore(config.conversationsDir, { log: options.log });
  const engine = new SessionEngine({ transport, store, log: options.log });
  return { engine, store, transport, config };
}
