import { createInterface, type Interface } from "node:readline/promises";

import type { PromptResult, Prompter } from "../modules/scenarios/types.js";

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Line prompter over stdin/stdout.
 *
 * Ctrl+C and end of input both latch the prompter into the interrupted state.
 * A pending question is aborted right away; an interrupt that arrives while no
 * question is open is only observed by the next `ask`.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private interrupted = false;
  private closed = false;
  private pending: AbortController | undefined;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout
    });
    this.rl.on("SIGINT", () => {
      this.interrupt();
    });
    this.rl.on("close", () => {
      this.closed = true;
      this.interrupt();
    });
  }

  get isInterrupted(): boolean {
    return this.interrupted;
  }

  async ask(question: string): Promise<PromptResult> {
    if (this.interrupted) {
      return { kind: "interrupted" };
    }

    const controller = new AbortController();
    this.pending = controller;
    try {
      const value = await this.rl.question(question, { signal: controller.signal });
      return { kind: "answer", value };
    } catch (error) {
      if (this.interrupted) {
        return { kind: "interrupted" };
      }
      throw error;
    } finally {
      this.pending = undefined;
    }
  }

  interrupt(): void {
    this.interrupted = true;
    this.pending?.abort();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.rl.close();
  }
}
