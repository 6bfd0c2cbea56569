/**
 * Line-based console prompts.
 *
 * `ask` resolves with the next input line, or null once input has ended
 * (Ctrl+D, a closed pipe), so callers can wind down instead of hanging.
 */

import * as readline from 'readline';

export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = readline.createInterface({ input, output, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(question: string): Promise<string | null> {
      output.write(question);
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => waiting.push(resolve));
    },
    close(): void {
      rl.close();
    },
  };
}
