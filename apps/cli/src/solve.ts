// apps/cli/src/solve.ts
//
// `bulls-cows solve`: the computer guesses a number the player is thinking of.
//
// The console acts as the solver's collaborator: it shows each guess with
// the current uncertainty, reads the player's bulls/cows answer, and
// reports how the session ended.

import { nanoid } from 'nanoid';
import { feedbackCommandSchema, firstIssue, type Pool } from '@bulls-cows/protocol';
import {
  DEFAULT_CONFIG,
  describeOutcome,
  formatCode,
  isWin,
  remainingEntropy,
  runSolver,
  winFeedback,
  type Feedback,
  type SolverOutcome,
} from '@bulls-cows/solver-core';
import type { ConsoleIo } from './io.js';
import type { Logger } from './logger.js';

export const FEEDBACK_PROMPT = "Enter feedback as 'Bulls Cows' (or 'win' if correct): ";

export interface SolveOptions {
  pool: Pool;
}

export async function solveCommand(
  io: ConsoleIo,
  parent: Logger,
  options: SolveOptions,
): Promise<SolverOutcome> {
  const log = parent.child({ session: nanoid(10), mode: 'solve' });
  const config = DEFAULT_CONFIG;
  let scored = 0;
  let answeredWin = false;

  io.print('Think of a 4-digit number with unique digits.');
  io.print('For each guess, provide the number of bulls and cows.');
  io.print('Bulls: correct digit in correct position');
  io.print('Cows: correct digit in wrong position');

  const outcome = await runSolver(
    {
      presentGuess(option, round, remaining) {
        log.debug(
          {
            round,
            guess: formatCode(option.code),
            score: option.score,
            isCandidate: option.isCandidate,
            scored,
            remaining,
          },
          'guess chosen',
        );
        scored = 0;
        io.print();
        io.print(`Current entropy: ${remainingEntropy(remaining).toFixed(4)} bits`);
        io.print(`Possible codes remaining: ${remaining}`);
        io.print();
        io.print(`Attempt ${round}: Computer guesses ${formatCode(option.code)}`);
        io.print(`Expected information gain: ${option.score.toFixed(4)} bits`);
      },

      async requestFeedback(): Promise<Feedback> {
        for (;;) {
          const parsed = feedbackCommandSchema.safeParse(await io.ask(FEEDBACK_PROMPT));
          if (!parsed.success) {
            io.print(`Invalid feedback. ${firstIssue(parsed.error)}.`);
            continue;
          }
          const feedback =
            parsed.data.kind === 'win' ? winFeedback(config) : parsed.data.feedback;
          answeredWin = isWin(feedback, config);
          return feedback;
        }
      },

      rejectFeedback(err) {
        log.warn({ err }, 'feedback rejected');
        io.print(`Invalid feedback. ${err.message}.`);
      },

      presentResult(result) {
        log.info({ outcome: describeOutcome(result) }, 'session finished');
        io.print();
        if (result.kind === 'contradiction') {
          io.print('Error: No possible codes remain. Please check your feedback.');
        } else if (answeredWin) {
          io.print(`Computer won in ${result.rounds} attempts!`);
        } else {
          io.print(`Only one possibility remains: ${formatCode(result.code)}`);
          io.print('This must be your number!');
        }
      },
    },
    {
      config,
      pool: options.pool,
      onProgress: (n) => {
        scored = n;
      },
    },
  );

  return outcome;
}
