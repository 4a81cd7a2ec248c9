/**
 * Line-based terminal input for the interactive session.
 */

import { createInterface } from 'node:readline';

/** Raised by Prompter.ask() once input has ended (Ctrl-D, closed pipe). */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface Prompter {
  /** Show a prompt and resolve with the next input line. */
  ask(question: string): Promise<string>;
  close(): void;
}

/** Terminal I/O used by the session. */
export interface SessionIO {
  prompter: Prompter;
  print(text: string): void;
}

/**
 * Create a Prompter over readline.
 *
 * Lines are consumed through the interface's async iterator, which buffers
 * input that arrives before the prompt (piped stdin).
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string> {
      rl.setPrompt(question);
      rl.prompt();
      const next = await lines.next();
      if (next.done) {
        throw new InputClosedError();
      }
      return next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
