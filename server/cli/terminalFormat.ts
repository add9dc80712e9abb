import type { SessionSummary, TokenUsage } from "../chat/chatTypes.js";
import { formatCost } from "../pricing/costAccountant.js";
import { DEFAULT_MODEL, listModels, type ModelPricing } from "../pricing/pricingTable.js";

export const MENU_LIMIT = 20;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local `YYYY-MM-DD HH:MM`, or the raw value when it is not a date. */
export function formatCreatedAt(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatTurnStats(usage: TokenUsage, turnCost: number, totalCost: number): string {
  return `Tokens: ${usage.inputTokens} in / ${usage.outputTokens} out | Cost: ${formatCost(turnCost)} | Total: ${formatCost(totalCost)}`;
}

export function formatMenuRow(index: number, summary: SessionSummary): string {
  return `  ${index}. [${formatCreatedAt(summary.createdAt)}] ${summary.preview} (${formatCost(summary.totalCost)})`;
}

export function formatListing(summaries: SessionSummary[], limit = MENU_LIMIT): string[] {
  const grandTotal = summaries.reduce((sum, summary) => sum + summary.totalCost, 0);
  const lines = [`Total Conversations: ${summaries.length}`, `Total Cost: ${formatCost(grandTotal)}`, ""];
  summaries.slice(0, limit).forEach((summary, index) => {
    lines.push(`  ${index + 1}. [${formatCreatedAt(summary.createdAt)}] ${summary.model}`);
    lines.push(`     ${summary.preview}`);
    lines.push(`     Cost: ${formatCost(summary.totalCost)}`);
    lines.push("");
  });
  return lines;
}

export function modelChoices(): Array<{ key: string; model: ModelPricing }> {
  return listModels().map((model, index) => ({ key: String(index + 1), model }));
}

/** Empty input picks `fallback`; anything unrecognised yields null. */
export function pickModel(choice: string, fallback: string = DEFAULT_MODEL): ModelPricing | null {
  const normalized = choice.trim() || fallback;
  const match = modelChoices().find((entry) => entry.key === normalized || entry.model.id === normalized);
  return match?.model ?? null;
}

/** 1-based menu selection into `items`, or null when out of range. */
export function pickIndex<T>(items: T[], choice: string): T | null {
  const parsed = Number(choice.trim());
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > items.length) {
    return null;
  }
  return items[parsed - 1] ?? null;
}
