import chalk from "chalk";
import type { ModelPricing } from "../pricing/pricingTable.js";
import { describeError } from "../chat/errors.js";
import { runChatLoop, type TerminalDeps } from "./chatLoop.js";
import {
  MENU_LIMIT,
  formatListing,
  formatMenuRow,
  modelChoices,
  pickIndex,
  pickModel,
} from "./terminalFormat.js";

export type MenuDeps = TerminalDeps & {
  defaultModel: string;
};

export async function selectModel(deps: MenuDeps): Promise<ModelPricing | null> {
  const c = deps.colors ?? chalk;
  const choices = modelChoices();
  deps.write(`\n${c.cyan("Available Models:")}\n`);
  for (const { key, model } of choices) {
    const marker = model.id === deps.defaultModel ? " (default)" : "";
    deps.write(`  ${key}. ${model.label}${marker}\n`);
  }

  while (true) {
    const answer = await deps.prompter.ask(c.green(`\nSelect model (1-${choices.length}): `));
    if (answer === null) {
      return null;
    }
    const picked = pickModel(answer, deps.defaultModel);
    if (picked) {
      return picked;
    }
    deps.write(`${c.red(`Invalid choice. Please select 1-${choices.length}.`)}\n`);
  }
}

export async function showConversationList(deps: MenuDeps): Promise<void> {
  const c = deps.colors ?? chalk;
  const summaries = await deps.engine.list();
  if (summaries.length === 0) {
    deps.write(`\n${c.red("No saved conversations found.")}\n`);
    return;
  }
  deps.write("\n");
  for (const text of formatListing(summaries)) {
    deps.write(`${text}\n`);
  }
}

async function loadConversation(deps: MenuDeps): Promise<void> {
  const c = deps.colors ?? chalk;
  const summaries = (await deps.engine.list()).slice(0, MENU_LIMIT);
  if (summaries.length === 0) {
    deps.write(`\n${c.red("No saved conversations found.")}\n`);
    return;
  }

  deps.write(`\n${c.cyan("Saved Conversations:")}\n`);
  summaries.forEach((summary, index) => deps.write(`${formatMenuRow(index + 1, summary)}\n`));

  const answer = await deps.prompter.ask(c.green(`\nSelect conversation (1-${summaries.length}): `));
  if (answer === null) {
    return;
  }
  const picked = pickIndex(summaries, answer);
  if (!picked) {
    deps.write(`${c.red("Invalid selection.")}\n`);
    return;
  }

  const session = await deps.engine.resume(picked.id);
  deps.write(`\n${c.green(`Loaded: ${picked.preview}`)}\n`);
  await runChatLoop(deps, session);
}

export async function runMenu(deps: MenuDeps): Promise<void> {
  const c = deps.colors ?? chalk;

  while (true) {
    deps.write(`\n${c.cyan("Menu:")}\n`);
    deps.write("  1. New conversation\n");
    deps.write("  2. Load conversation\n");
    deps.write("  3. List conversations\n");
    deps.write("  4. Exit\n");

    const choice = await deps.prompter.ask(c.green("\nChoose option: "));
    if (choice === null || choice.trim() === "4") {
      deps.write(`\n${c.green("Goodbye!")}\n`);
      return;
    }

    try {
      switch (choice.trim()) {
        case "1": {
          const model = await selectModel(deps);
          if (model) {
            await runChatLoop(deps, deps.engine.create(model.id));
          }
          break;
        }
        case "2":
          await loadConversation(deps);
          break;
        case "3":
          await showConversationList(deps);
          break;
        default:
          deps.write(`\n${c.red("Invalid choice. Please select 1-4.")}\n`);
      }
    } catch (err) {
      deps.write(`\n${c.red(`Error: ${describeError(err)}`)}\n`);
    }
  }
}
