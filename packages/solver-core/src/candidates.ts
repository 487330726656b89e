// packages/solver-core/src/candidates.ts
//
// Candidate space: the codes not yet ruled out by feedback.
//
// A CandidateSet starts as every legal code and is only ever replaced by
// a subset of itself. Filtering keeps the input order, so a set built
// by initializeCandidates stays sorted lexicographically.

import { assertConfig, DEFAULT_CONFIG, type Code, type GameConfig } from './code.js';
import { ContradictionError } from './errors.js';
import { evaluate, sameFeedback, type Feedback } from './feedback.js';

export type CandidateSet = readonly Code[];

/**
 * initializeCandidates lists every code of the configuration in
 * lexicographic order: 0123, 0124, …, 9876 for the default game
 * (10·9·8·7 = 5040 codes).
 */
export function initializeCandidates(config: GameConfig = DEFAULT_CONFIG): CandidateSet {
  assertConfig(config);
  const out: Code[] = [];
  const prefix: number[] = [];
  const used = new Array<boolean>(config.alphabetSize).fill(false);

  const extend = () => {
    if (prefix.length === config.length) {
      out.push(Object.freeze(prefix.slice()));
      return;
    }
    for (let s = 0; s < config.alphabetSize; s++) {
      if (used[s]) continue;
      used[s] = true;
      prefix.push(s);
      extend();
      prefix.pop();
      used[s] = false;
    }
  };
  extend();

  return out;
}

/** Codes c with evaluate(c, guess) equal to the observed feedback. May be empty. */
export function filterCandidates(
  candidates: CandidateSet,
  guess: Code,
  observed: Feedback,
): CandidateSet {
  return candidates.filter((c) => sameFeedback(evaluate(c, guess), observed));
}

/**
 * narrowCandidates is filterCandidates for a live session: an empty result
 * means the feedback contradicts itself, and throws ContradictionError.
 */
export function narrowCandidates(
  candidates: CandidateSet,
  guess: Code,
  observed: Feedback,
): CandidateSet {
  const next = filterCandidates(candidates, guess, observed);
  if (next.length === 0) throw new ContradictionError();
  return next;
}

/** Display entropy in bits: log2 of the remaining count (0 when empty). */
export function remainingEntropy(candidates: CandidateSet | number): number {
  const n = typeof candidates === 'number' ? candidates : candidates.length;
  return n > 0 ? Math.log2(n) : 0;
}
