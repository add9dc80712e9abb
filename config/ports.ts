import { z } from "zod";

export type PortSettings = {
  /** Port the Express API listens on. */
  apiPort: number;
  /** Port the Vite dev proxy forwards `/api` to. */
  proxyApiPort: number;
  webPort: number;
  webHost: string;
};

export const PORT_DEFAULTS = {
  apiPort: 43317,
  webPort: 43318,
  webHost: "127.0.0.1",
} as const;

const portSchema = z.coerce.number().int().min(1).max(65535);

function portOr(value: string | undefined, fallback: number): number {
  const parsed = portSchema.safeParse(value?.trim() || undefined);
  return parsed.success ? parsed.data : fallback;
}

/**
 * A platform `PORT` only applies to the API in production. The dev proxy
 * always follows `TALLY_API_PORT`, since that is what a local API run uses.
 */
export function resolvePorts(env: NodeJS.ProcessEnv = process.env): PortSettings {
  const platformPort = env.NODE_ENV === "production" ? env.PORT : undefined;
  return {
    apiPort: portOr(env.TALLY_API_PORT ?? platformPort, PORT_DEFAULTS.apiPort),
    proxyApiPort: portOr(env.TALLY_API_PORT, PORT_DEFAULTS.apiPort),
    webPort: portOr(env.TALLY_WEB_PORT, PORT_DEFAULTS.webPort),
    webHost: env.TALLY_WEB_HOST?.trim() || PORT_DEFAULTS.webHost,
  };
}
