#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { buildEngineContext, type EngineContext } from "../chat/engineContext.js";
import { describeError, isChatError } from "../chat/errors.js";
import { loadEnvironmentFromDotenv, resolveAppConfig } from "../config/env.js";
import { installOutboundRequestLogger } from "../logging/httpLogging.js";
import { runChatLoop } from "./chatLoop.js";
import { runMenu, showConversationList, type MenuDeps } from "./menu.js";
import { ReadlinePrompter } from "./prompter.js";

type ChatOptions = {
  model?: string;
  resume?: string;
};

function buildContext(): EngineContext {
  loadEnvironmentFromDotenv();
  const config = resolveAppConfig();
  const log = config.logEvents ? (line: string) => console.error(chalk.dim(line)) : undefined;
  installOutboundRequestLogger({ enabled: config.logProviderHeaders, log });
  return buildEngineContext(config, { log });
}

async function withTerminal(run: (deps: MenuDeps) => Promise<void>): Promise<void> {
  const context = buildContext();
  const prompter = new ReadlinePrompter();
  try {
    await run({
      engine: context.engine,
      store: context.store,
      prompter,
      write: (text) => process.stdout.write(text),
      clearScreen: () => console.clear(),
      defaultModel: context.config.defaultModel,
    });
  } finally {
    prompter.close();
  }
}

function printHeader(): void {
  const rule = "=".repeat(60);
  console.log(chalk.cyan(`\n${rule}`));
  console.log(chalk.bold.cyan("         TALLY CHAT"));
  console.log(chalk.cyan(`${rule}\n`));
}

const program = new Command();

program
  .name("tally-chat")
  .description("Streaming model chat with per-turn cost tracking and saved conversations")
  .version("0.1.0");

program
  .command("menu", { isDefault: true })
  .description("Interactive menu: new, load and list conversations")
  .action(async () => {
    printHeader();
    await withTerminal(runMenu);
  });

program
  .command("chat")
  .description("Start a new conversation or resume a saved one")
  .option("-m, --model <key>", "model key for a new conversation")
  .option("-r, --resume <id>", "resume the conversation with this id")
  .action(async (options: ChatOptions) => {
    await withTerminal(async (deps) => {
      const session = options.resume
        ? await deps.engine.resume(options.resume)
        : deps.engine.create(options.model ?? deps.defaultModel);
      await runChatLoop(deps, session);
    });
  });

program
  .command("list")
  .description("List saved conversations with their cost")
  .action(async () => {
    const context = buildContext();
    await showConversationList({
      engine: context.engine,
      store: context.store,
      prompter: {
        ask: async () => null,
        whileBusy: (_onInterrupt, task) => task(),
      },
      write: (text) => process.stdout.write(text),
      defaultModel: context.config.defaultModel,
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${chalk.red(`Fatal error: ${describeError(error)}`)}\n`);
  if (isChatError(error, "missing_credential")) {
    process.stderr.write(`${chalk.yellow("Create a .env file with: ANTHROPIC_API_KEY=<your key>")}\n`);
  }
  process.exit(1);
});
