// apps/cli/src/__tests__/scriptedIo.ts
//
// In-memory ConsoleIo for tests: answers prompts from a script and
// records everything printed. Running out of answers behaves like the
// player closing the input.

import { InputClosedError, type ConsoleIo } from '../io.js';

export interface ScriptedIo extends ConsoleIo {
  readonly lines: string[];
  readonly prompts: string[];
  closed: boolean;
}

export function scriptedIo(answers: string[]): ScriptedIo {
  const queue = [...answers];
  const io: ScriptedIo = {
    lines: [],
    prompts: [],
    closed: false,
    ask(prompt) {
      io.prompts.push(prompt);
      const next = queue.shift();
      return next === undefined
        ? Promise.reject(new InputClosedError())
        : Promise.resolve(next);
    },
    print(line = '') {
      io.lines.push(line);
    },
    close() {
      io.closed = true;
    },
  };
  return io;
}
