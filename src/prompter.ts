// src/prompter.ts — Interactive prompts
// Commands ask through a Prompter so interactive flows can be scripted in tests.

import { createInterface } from "node:readline/promises";
import { UserCancelledError } from "./types.js";

export interface Prompter {
  /** Free-text answer. Rejects with UserCancelledError on Ctrl+C or end of input. */
  ask(question: string): Promise<string>;
  confirm(question: string, defaultYes?: boolean): Promise<boolean>;
  close(): void;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Prompter on stdin/stdout. Interrupt and end of input both cancel the
 * pending question.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const controller = new AbortController();
  rl.on("SIGINT", () => controller.abort());
  rl.on("close", () => controller.abort());

  const question = async (text: string): Promise<string> => {
    if (controller.signal.aborted) throw new UserCancelledError();
    try {
      return await rl.question(text, { signal: controller.signal });
    } catch (err: unknown) {
      if (isAbort(err)) throw new UserCancelledError();
      throw err;
    }
  };

  return {
    ask: (text) => question(`${text}\n> `),
    confirm: async (text, defaultYes = true) => {
      const answer = (await question(`${text} ${defaultYes ? "[Y/n]" : "[y/N]"} `)).trim().toLowerCase();
      if (answer === "") return defaultYes;
      return answer === "y" || answer === "yes";
    },
    close: () => rl.close(),
  };
}

/**
 * Prompter that replays fixed answers in order. Running out of answers
 * counts as cancellation.
 */
export function createScriptedPrompter(answers: string[], confirmations: boolean[] = []): Prompter & { asked: string[] } {
  const queue = [...answers];
  const confirms = [...confirmations];
  const asked: string[] = [];
  return {
    asked,
    ask: async (text) => {
      asked.push(text);
      const next = queue.shift();
      if (next === undefined) throw new UserCancelledError();
      return next;
    },
    confirm: async (text, defaultYes = true) => {
      asked.push(text);
      return confirms.shift() ?? defaultYes;
    },
    close: () => {},
  };
}
