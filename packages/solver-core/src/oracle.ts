// packages/solver-core/src/oracle.ts
//
// Honest feedback source for a known secret, and a solver run against it.
// Used by the CLI's `simulate` command and by end-to-end tests.

import {
  DEFAULT_CONFIG,
  formatCode,
  isValidCode,
  type Code,
  type GameConfig,
} from './code.js';
import { InvalidCodeError } from './errors.js';
import { evaluate, type Feedback } from './feedback.js';
import {
  SolverSession,
  type RoundRecord,
  type SolverOptions,
  type SolverOutcome,
} from './session.js';

export function createOracle(
  secret: Code,
  config: GameConfig = DEFAULT_CONFIG,
): (guess: Code) => Feedback {
  if (!isValidCode(secret, config))
    throw new InvalidCodeError(`Not a valid secret: ${formatCode(secret)}`);
  return (guess) => evaluate(secret, guess);
}

export interface SimulationStep extends RoundRecord {
  /** Candidates before the guess. */
  before: number;
  isCandidate: boolean;
}

export interface SimulationResult {
  outcome: SolverOutcome;
  steps: SimulationStep[];
}

export interface SimulateOptions extends SolverOptions {
  /** Sees every round as it completes. */
  onStep?: (step: SimulationStep) => void;
}

/** simulate plays a solver session against an oracle for `secret`. */
export function simulate(secret: Code, options: SimulateOptions = {}): SimulationResult {
  const { onStep, ...solverOptions } = options;
  const answer = createOracle(secret, solverOptions.config);
  const session = new SolverSession(solverOptions);
  const steps: SimulationStep[] = [];

  let outcome = session.outcome;
  while (!outcome) {
    const before = session.candidates.length;
    const option = session.nextGuess();
    session.submitFeedback(answer(option.code));

    const record = session.history[session.history.length - 1];
    const step = { ...record, before, isCandidate: option.isCandidate };
    steps.push(step);
    onStep?.(step);
    outcome = session.outcome;
  }

  return { outcome, steps };
}
