import { createInterface, type Interface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

export interface LinePrompter {
  /** Resolves null when the user interrupts (Ctrl-C) or input closes. */
  ask(query: string): Promise<string | null>;
  /** Runs `task`, routing Ctrl-C to `onInterrupt` instead of the prompt. */
  whileBusy<T>(onInterrupt: () => void, task: () => Promise<T>): Promise<T>;
}

export class ReadlinePrompter implements LinePrompter {
  private rl: Interface;
  private questionController: AbortController | null = null;
  private interruptHandler: (() => void) | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = stdin, output: NodeJS.WritableStream = stdout) {
    this.rl = createInterface({ input, output });
    this.rl.on("SIGINT", () => {
      if (this.interruptHandler) {
        this.interruptHandler();
        return;
      }
      this.questionController?.abort();
    });
    this.rl.on("close", () => {
      this.closed = true;
      this.questionController?.abort();
    });
  }

  async ask(query: string): Promise<string | null> {
    if (this.closed) {
      return null;
    }
    const controller = new AbortController();
    this.questionController = controller;
    try {
      return await this.rl.question(query, { signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        return null;
      }
      throw err;
    } finally {
      this.questionController = null;
    }
  }

  async whileBusy<T>(onInterrupt: () => void, task: () => Promise<T>): Promise<T> {
    this.interruptHandler = onInterrupt;
    try {
      return await task();
    } finally {
      this.interruptHandler = null;
    }
  }

  close(): void {
    this.rl.close();
  }
}
