import fs from "node:fs";
import path from "node:path";
import { config as dotenvConfig } from "dotenv";
import { ChatError } from "../chat/errors.js";
import { DEFAULT_MODEL, resolveModel } from "../pricing/pricingTable.js";

export type EnvLoadResult = {
  loaded: boolean;
  path: string;
};

export type TransportMode = "pi-ai" | "mock";

export type AppConfig = {
  apiKey: string | null;
  defaultModel: string;
  conversationsDir: string;
  transport: TransportMode;
  maxTokens: number;
  logEvents: boolean;
  logProviderHeaders: boolean;
};

const DEFAULT_MAX_TOKENS = 8000;

export function loadEnvironmentFromDotenv(cwd: string = process.cwd()): EnvLoadResult {
  const envPath = path.join(cwd, ".env");
  if (!fs.existsSync(envPath)) {
    return { loaded: false, path: envPath };
  }

  dotenvConfig({
    path: envPath,
    override: false,
  });

  return { loaded: true, path: envPath };
}

export function envFlag(value: string | undefined, defaultValue = false): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value?.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function parseTransport(value: string | undefined): TransportMode {
  return value?.trim().toLowerCase() === "mock" ? "mock" : "pi-ai";
}

/**
 * Reads the process configuration. The model override is validated against the
 * pricing table here so a typo fails at startup rather than on the first turn.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const defaultModel = env.TALLY_MODEL?.trim() || DEFAULT_MODEL;
  resolveModel(defaultModel);

  return {
    apiKey: env.ANTHROPIC_API_KEY?.trim() || null,
    defaultModel,
    conversationsDir: path.resolve(cwd, env.TALLY_CONVERSATIONS_DIR?.trim() || "conversations"),
    transport: parseTransport(env.TALLY_TRANSPORT),
    maxTokens: parsePositiveInt(env.TALLY_MAX_TOKENS, DEFAULT_MAX_TOKENS),
    logEvents: envFlag(env.TALLY_LOG_EVENTS),
    logProviderHeaders: envFlag(env.TALLY_LOG_PROVIDER_HEADERS),
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ChatError(
      "missing_credential",
      "ANTHROPIC_API_KEY is not set. Create a .env file with ANTHROPIC_API_KEY=<your key>.",
    );
  }
  return config.apiKey;
}
