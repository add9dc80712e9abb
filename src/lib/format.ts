import type { ChatSession, TokenUsage } from "../types/chat.js";

export const SIDEBAR_LIMIT = 10;

export function formatUsd(value: number, digits = 4): string {
  return `$${value.toFixed(digits)}`;
}

export function formatTurnCaption(usage: TokenUsage, turnCost: number): string {
  return `Tokens: ${usage.inputTokens} in / ${usage.outputTokens} out | Cost: ${formatUsd(turnCost)}`;
}

export function countUserMessages(session: ChatSession): number {
  return session.messages.filter((message) => message.role === "user").length;
}

export function shortDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(date.getMonth() + 1)}/${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
