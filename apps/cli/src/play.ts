// apps/cli/src/play.ts
//
// `bulls-cows play`: the player guesses the computer's secret.

import { nanoid } from 'nanoid';
import { firstIssue, playCommandSchema } from '@bulls-cows/protocol';
import {
  formatCode,
  HostGame,
  parseCode,
  type HostState,
} from '@bulls-cows/solver-core';
import type { ConsoleIo } from './io.js';
import type { Logger } from './logger.js';

export interface PlayOptions {
  maxAttempts: number;
  seed?: string;
  random?: () => number;
}

export async function playCommand(
  io: ConsoleIo,
  parent: Logger,
  options: PlayOptions,
): Promise<HostState> {
  const log = parent.child({ session: nanoid(10), mode: 'play' });
  const game = new HostGame({
    maxAttempts: options.maxAttempts,
    seed: options.seed,
    random: options.random,
  });
  log.info({ seeded: options.seed !== undefined, maxAttempts: game.maxAttempts }, 'game started');

  io.print("I've thought of a 4-digit number with unique digits.");
  io.print("Try to guess it! After each guess, I'll tell you:");
  io.print('- Bulls: correct digit in correct position');
  io.print('- Cows: correct digit in wrong position');
  io.print();
  io.print(`Initial entropy: ${game.initialEntropy.toFixed(4)} bits`);
  io.print("Enter 'quit' to give up.");

  while (game.state === 'playing') {
    io.print();
    const parsed = playCommandSchema.safeParse(
      await io.ask(`Attempt ${game.attempts + 1}. Enter your guess (4 unique digits): `),
    );
    if (!parsed.success) {
      io.print(`Invalid guess. ${firstIssue(parsed.error)}.`);
      continue;
    }

    if (parsed.data.kind === 'quit') {
      io.print(`Game over! The secret number was: ${formatCode(game.quit())}`);
      break;
    }

    const turn = game.guess(parseCode(parsed.data.code));
    log.debug(
      { attempt: turn.attempt, feedback: turn.feedback, remaining: turn.remaining },
      'guess scored',
    );
    io.print(`Feedback for ${parsed.data.code}:`);
    io.print(`Bulls: ${turn.feedback.bulls}`);
    io.print(`Cows: ${turn.feedback.cows}`);
    io.print(`Codes still possible: ${turn.remaining}`);
    io.print(`Current entropy: ${turn.entropy.toFixed(4)} bits`);

    if (turn.state === 'won') {
      io.print();
      io.print(
        `Congratulations! You found the number ${parsed.data.code} in ${turn.attempt} attempts!`,
      );
    } else if (turn.state === 'lost') {
      io.print();
      io.print(`Too many attempts! The secret number was: ${formatCode(game.quit())}`);
    }
  }

  log.info({ state: game.state, attempts: game.attempts }, 'game finished');
  return game.state;
}
