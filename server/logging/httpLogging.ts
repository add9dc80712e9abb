import { describeError } from "../chat/errors.js";

const PROVIDER_HOSTS = ["anthropic.com"];
const CREDENTIAL_HEADERS = ["x-api-key", "authorization"];

type FetchLike = typeof fetch;

export type OutboundLoggerOptions = {
  enabled: boolean;
  hosts?: string[];
  log?: (line: string) => void;
  now?: () => number;
};

export type OutboundRequest = {
  host: string;
  path: string;
  method: string;
  auth: string;
};

let installed: FetchLike | null = null;

function maskSecret(secret: string): string {
  return secret.length <= 12 ? "***" : `${secret.slice(0, 6)}...${secret.slice(-4)}`;
}

/** Keeps an auth scheme readable and masks the token after it. */
export function maskCredential(value: string | null): string {
  const parts = value?.trim().split(/\s+/, 2) ?? [];
  if (parts.length === 2) {
    return `${parts[0]} ${maskSecret(parts[1] ?? "")}`;
  }
  return parts[0] ? maskSecret(parts[0]) : "missing";
}

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function hostMatches(host: string, hosts: string[]): boolean {
  return hosts.some((candidate) => host === candidate || host.endsWith(`.${candidate}`));
}

/**
 * Summarizes a fetch call bound for a provider host, or returns null for any
 * other destination. Headers given in `init` win over those on a `Request`.
 */
export function describeOutbound(
  input: RequestInfo | URL,
  init: RequestInit | undefined,
  hosts: string[] = PROVIDER_HOSTS,
): OutboundRequest | null {
  const url = parseUrl(input instanceof Request ? input.url : String(input));
  if (!url || !hostMatches(url.hostname.toLowerCase(), hosts)) {
    return null;
  }

  const headers = new Headers(input instanceof Request ? input.headers : undefined);
  new Headers(init?.headers).forEach((value, key) => headers.set(key, value));
  const credential = CREDENTIAL_HEADERS.map((name) => headers.get(name)).find((value) => value !== null) ?? null;

  return {
    host: url.hostname.toLowerCase(),
    path: url.pathname,
    method: (init?.method ?? (input instanceof Request ? input.method : "GET")).toUpperCase(),
    auth: maskCredential(credential),
  };
}

export function formatOutboundRequest(request: OutboundRequest): string {
  return `[http] provider request host=${request.host} path=${request.path} method=${request.method} auth=${request.auth}`;
}

/**
 * Wraps the global fetch so provider requests are logged with masked
 * credentials, followed by the response status and elapsed time. Returns a
 * function that restores the previous fetch.
 */
export function installOutboundRequestLogger(options: OutboundLoggerOptions): () => void {
  if (!options.enabled || installed) {
    return () => undefined;
  }

  const previous: FetchLike = globalThis.fetch.bind(globalThis);
  const hosts = options.hosts ?? PROVIDER_HOSTS;
  const log = options.log ?? ((line: string) => console.log(line));
  const now = options.now ?? (() => Date.now());

  const patched: FetchLike = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const request = describeOutbound(input, init, hosts);
    if (!request) {
      return previous(input, init);
    }
    log(formatOutboundRequest(request));
    const startedAt = now();
    try {
      const response = await previous(input, init);
      log(`[http] provider response host=${request.host} status=${response.status} elapsedMs=${now() - startedAt}`);
      return response;
    } catch (err) {
      log(`[http] provider request failed host=${request.host} elapsedMs=${now() - startedAt} error=${describeError(err)}`);
      throw err;
    }
  };
  installed = patched;
  globalThis.fetch = patched;

  return () => {
    if (installed === patched) {
      globalThis.fetch = previous;
      installed = null;
    }
  };
}
