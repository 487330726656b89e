// apps/cli/src/simulate.ts
//
// `bulls-cows simulate <secret>`: watch the solver play against a known
// secret, with the oracle answering for the player.

import { codeTextSchema, firstIssue, type Pool } from '@bulls-cows/protocol';
import {
  formatCode,
  parseCode,
  simulate,
  type SolverOutcome,
} from '@bulls-cows/solver-core';
import type { ConsoleIo } from './io.js';
import type { Logger } from './logger.js';

export interface SimulateOptions {
  pool: Pool;
}

export function simulateCommand(
  io: ConsoleIo,
  log: Logger,
  secretText: string,
  options: SimulateOptions,
): SolverOutcome {
  const parsed = codeTextSchema.safeParse(secretText);
  if (!parsed.success) throw new Error(`Invalid secret. ${firstIssue(parsed.error)}.`);

  const started = Date.now();
  const { outcome } = simulate(parseCode(parsed.data), {
    pool: options.pool,
    onStep: (step) => {
      const { bulls, cows } = step.feedback;
      io.print(
        `Attempt ${step.round}: ${formatCode(step.guess)} → ${bulls} bulls ${cows} cows` +
          ` (${step.remaining} of ${step.before} left, ${step.score.toFixed(4)} bits)`,
      );
    },
  });
  log.info({ pool: options.pool, rounds: outcome.rounds, ms: Date.now() - started }, 'simulation done');

  io.print(
    outcome.kind === 'solved'
      ? `Solved ${formatCode(outcome.code)} in ${outcome.rounds} attempts`
      : `Contradiction after ${outcome.rounds} attempts`,
  );
  return outcome;
}
