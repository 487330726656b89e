// apps/cli/src/io.ts
//
// Console boundary. Commands talk to a ConsoleIo instead of stdin/stdout
// directly, so tests can script a whole game.

import { createInterface } from 'node:readline';
import { stdin, stdout } from 'node:process';

export interface ConsoleIo {
  ask(prompt: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

/** Raised to a pending ask() when the input stream ends (Ctrl-D, closed pipe). */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * Lines are queued as they arrive, so piped input that delivers several
 * answers in one chunk is read one answer per ask().
 */
export function createConsoleIo(
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout,
): ConsoleIo {
  const rl = createInterface({ input, output });
  const lines: string[] = [];
  const waiting: Waiter[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiter = waiting.shift();
    if (waiter) waiter.resolve(line);
    else lines.push(line);
  });

  rl.on('close', () => {
    closed = true;
    for (const waiter of waiting.splice(0)) waiter.reject(new InputClosedError());
  });

  return {
    ask(prompt) {
      if (!closed) rl.setPrompt(prompt);
      output.write(prompt);

      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },
    print(line = '') {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
