import { createInterface } from "node:readline";

export interface Prompter {
  ask(prompt: string): Promise<string>;
  close(): void;
}

/** Line prompter on stdin/stdout. Resolves "" once input is closed. */
export function createConsolePrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => resolve(answer));
        rl.once("close", () => resolve(""));
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
