import chalk, { type ChalkInstance } from "chalk";
import type { ChatSession, TurnCompletedEvent, TurnFailedEvent } from "../chat/chatTypes.js";
import { describeError } from "../chat/errors.js";
import type { SessionEngine } from "../chat/sessionEngine.js";
import type { TranscriptStore } from "../chat/transcriptStore.js";
import { resolveModel } from "../pricing/pricingTable.js";
import { collectInput } from "./inputCollector.js";
import type { LinePrompter } from "./prompter.js";
import { formatTurnStats } from "./terminalFormat.js";

export type TerminalDeps = {
  engine: SessionEngine;
  store: TranscriptStore;
  prompter: LinePrompter;
  write: (text: string) => void;
  colors?: ChalkInstance;
  clearScreen?: () => void;
};

type TurnResult = TurnCompletedEvent | TurnFailedEvent;

function isYes(answer: string | null): boolean {
  return answer?.trim().toLowerCase() === "y";
}

/**
 * Interactive loop for one conversation. Returns the latest committed session
 * so the caller can keep showing accurate totals.
 */
export async function runChatLoop(deps: TerminalDeps, initial: ChatSession): Promise<ChatSession> {
  const c = deps.colors ?? chalk;
  const line = (text = "") => deps.write(`${text}\n`);
  const model = resolveModel(initial.model);
  let session = initial;

  const persist = async () => {
    try {
      await deps.store.save(session);
      line(c.green("Conversation saved."));
    } catch (err) {
      line(c.red(`Save failed: ${describeError(err)}`));
    }
  };

  const offerSave = async (question: string) => {
    if (isYes(await deps.prompter.ask(c.yellow(question)))) {
      await persist();
    }
  };

  line();
  line(c.green(`Chat started with ${model.label} (conversation ${session.id})`));
  line(c.yellow("Commands: 'exit' to quit, 'save' to save and quit, 'clear' to clear screen"));
  line(c.yellow("For multi-line input, end with '###' on a new line"));
  line();

  while (true) {
    line(c.bold.blue("You:"));
    const input = await collectInput(() => deps.prompter.ask(""));

    if (input.kind === "closed") {
      line();
      await offerSave("Interrupted. Save conversation? (y/n): ");
      return session;
    }
    if (input.kind === "empty") {
      continue;
    }
    if (input.kind === "command") {
      if (input.command === "clear") {
        deps.clearScreen?.();
        continue;
      }
      if (input.command === "save") {
        await persist();
        return session;
      }
      await offerSave("Save before exiting? (y/n): ");
      return session;
    }

    line();
    line(c.bold.green(`${model.label}:`));

    const controller = new AbortController();
    let result: TurnResult | null;
    try {
      const turn = deps.engine.submitTurn(session, input.text, { signal: controller.signal });
      result = await deps.prompter.whileBusy(
        () => controller.abort(),
        async (): Promise<TurnResult | null> => {
          for await (const event of turn) {
            if (event.type === "delta") {
              deps.write(event.text);
              continue;
            }
            return event;
          }
          return null;
        },
      );
    } catch (err) {
      line(c.red(`Error: ${describeError(err)}`));
      continue;
    }
    line();

    if (!result) {
      line(c.red("Error: turn ended without a result"));
      continue;
    }

    if (result.type === "completed") {
      session = result.session;
      line();
      line(c.cyan(formatTurnStats(result.usage, result.turnCost, session.totalCost)));
      if (!result.persisted) {
        line(c.yellow(`Warning: reply kept in memory but not saved (${result.persistError ?? "unknown error"})`));
      }
      line();
      continue;
    }

    if (result.partialText) {
      line(c.yellow("[interrupted reply above was not saved]"));
    }
    if (result.reason === "cancelled") {
      line(c.yellow("Turn cancelled. Nothing was saved; send the message again to retry."));
    } else {
      line(c.red(`Error: ${result.message}`));
    }
    line();
  }
}
