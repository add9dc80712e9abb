import type { ChatSession, TokenUsage } from "../chat/chatTypes.js";
import { rateFor } from "./pricingTable.js";

const TOKENS_PER_RATE_UNIT = 1_000_000;

/**
 * Incremental spend for one exchange. Kept at full precision: rounding happens
 * only in {@link formatCost} so repeated turns do not drift.
 */
export function computeTurnCost(model: string, usage: TokenUsage): number {
  const rate = rateFor(model);
  return (
    (usage.inputTokens * rate.inputRatePerMToken) / TOKENS_PER_RATE_UNIT +
    (usage.outputTokens * rate.outputRatePerMToken) / TOKENS_PER_RATE_UNIT
  );
}

/** Adds to `session.totalCost` and returns the new cumulative value. */
export function accumulateCost(session: ChatSession, incrementalCost: number): number {
  session.totalCost += incrementalCost;
  return session.totalCost;
}

export function formatCost(value: number, digits = 4): string {
  return `$${value.toFixed(digits)}`;
}
