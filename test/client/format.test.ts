import { describe, expect, it } from "vitest";
import { countUserMessages, formatTurnCaption, formatUsd, shortDate } from "../../src/lib/format.js";

describe("client format helpers", () => {
  it("formats costs", () => {
    expect(formatUsd(0.0072)).toBe("$0.0072");
    expect(formatUsd(0.0126, 3)).toBe("$0.013");
  });

  it("builds the per-turn caption", () => {
    expect(formatTurnCaption({ inputTokens: 150, outputTokens: 450 }, 0.0072)).toBe(
      "Tokens: 150 in / 450 out | Cost: $0.0072",
    );
  });

  it("counts user messages", () => {
    expect(
      countUserMessages({
        id: "s1",
        createdAt: "2025-01-01T00:00:00.000Z",
        model: "sonnet-4.5",
        totalCost: 0,
        messages: [
          { role: "user", content: "a" },
          { role: "assistant", content: "b" },
          { role: "user", content: "c" },
        ],
      }),
    ).toBe(2);
  });

  it("shortens dates", () => {
    expect(shortDate(new Date(2025, 5, 7, 8, 9).toISOString())).toBe("06/07 08:09");
    expect(shortDate("n/a")).toBe("n/a");
  });
});
