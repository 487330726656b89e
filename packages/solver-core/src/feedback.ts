// packages/solver-core/src/feedback.ts
//
// Bulls-and-cows scoring, shared by the solver, the host game and the CLI.
//
// Feedback legend:
//   - bulls: symbol correct, position correct
//   - cows:  symbol correct, position wrong
//
// Rules:
//   • Both codes must have the same length.
//   • Symbols never repeat inside a code, so a symbol is either shared by
//     both codes or not: cows = |shared symbols| − bulls, with no
//     per-symbol counting needed.

import { DEFAULT_CONFIG, type Code, type GameConfig } from './code.js';
import { InvalidFeedbackError } from './errors.js';

export interface Feedback {
  readonly bulls: number;
  readonly cows: number;
}

/**
 * evaluate compares a guess against the secret.
 *
 * Example:
 *   secret = [0,1,2,3], guess = [1,0,2,4]
 *   → { bulls: 1, cows: 2 }   (2 in place; 0 and 1 elsewhere)
 *
 * Swapping the arguments yields the same feedback.
 */
export function evaluate(secret: Code, guess: Code): Feedback {
  if (secret.length !== guess.length)
    throw new Error('Codes must have the same length');

  let bulls = 0;
  let shared = 0;
  for (let i = 0; i < guess.length; i++) {
    if (guess[i] === secret[i]) bulls++;
    if (secret.includes(guess[i])) shared++;
  }
  return { bulls, cows: shared - bulls };
}

/** "2B1C" style key; used to bucket feedback in maps. */
export function feedbackKey(f: Feedback): string {
  return `${f.bulls}B${f.cows}C`;
}

export function sameFeedback(a: Feedback, b: Feedback): boolean {
  return a.bulls === b.bulls && a.cows === b.cows;
}

export function isWin(f: Feedback, config: GameConfig = DEFAULT_CONFIG): boolean {
  return f.bulls === config.length;
}

export function winFeedback(config: GameConfig = DEFAULT_CONFIG): Feedback {
  return { bulls: config.length, cows: 0 };
}

/**
 * validateFeedback rejects feedback no honest answer could produce:
 * non-integers, negatives, or bulls + cows above the code length.
 */
export function validateFeedback(
  f: Feedback,
  config: GameConfig = DEFAULT_CONFIG,
): void {
  const { bulls, cows } = f;
  if (!Number.isInteger(bulls) || !Number.isInteger(cows))
    throw new InvalidFeedbackError('Bulls and cows must be whole numbers');
  if (bulls < 0 || cows < 0)
    throw new InvalidFeedbackError('Bulls and cows cannot be negative');
  if (bulls + cows > config.length) {
    throw new InvalidFeedbackError(
      `Bulls and cows should add up to at most ${config.length}`,
    );
  }
}

/**
 * Upper bound on the distinct feedbacks one guess can produce: every pair
 * with bulls + cows ≤ length, less (length-1 bulls, 1 cow), which cannot
 * happen (with every symbol shared and all but one in place, the last one
 * is in place too).
 */
export function feedbackClassCount(config: GameConfig = DEFAULT_CONFIG): number {
  const L = config.length;
  return ((L + 1) * (L + 2)) / 2 - 1;
}
