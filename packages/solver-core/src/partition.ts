// packages/solver-core/src/partition.ts
//
// Partitions of the candidate set induced by a hypothetical guess.
//
// For a fixed guess, every candidate answer falls into the bucket of the
// feedback it would produce. The bucket sizes n_f over N candidates give
// the Shannon entropy of the guess:
//
//   H(g) = −Σ_f (n_f / N) · log2(n_f / N)
//
// i.e. the expected information, in bits, that guessing g reveals when
// every remaining candidate is equally likely.
//
// Exports:
//   • partitionByFeedback — bucket map, for inspection and tests
//   • createPartitioner   — allocation-free scorer used by the ranker
//   • entropyOfCounts     — the entropy formula over bucket sizes

import { DEFAULT_CONFIG, type Code, type GameConfig } from './code.js';
import type { CandidateSet } from './candidates.js';
import { evaluate, feedbackKey, type Feedback } from './feedback.js';

export type PartitionMap = Map<string, { feedback: Feedback; count: number }>;

export interface PartitionSummary {
  /** Shannon entropy of the partition, in bits. */
  entropy: number;
  /** Non-empty feedback classes. */
  classes: number;
  /** Σ n_f² / N: expected candidates left after the guess. */
  expectedRemaining: number;
}

/**
 * partitionByFeedback buckets candidates by the feedback the guess would get.
 *
 * Example:
 *   candidates = [012, 021, 102], guess = 012
 *   → { "3B0C": 1, "1B2C": 2 }
 */
export function partitionByFeedback(candidates: CandidateSet, guess: Code): PartitionMap {
  const buckets: PartitionMap = new Map();
  for (const answer of candidates) {
    const feedback = evaluate(answer, guess);
    const key = feedbackKey(feedback);
    const b = buckets.get(key) ?? { feedback, count: 0 };
    b.count++;
    buckets.set(key, b);
  }
  return buckets;
}

export function entropyOfCounts(counts: Iterable<number>, total: number): number {
  if (total <= 0) return 0;
  let h = 0;
  for (const n of counts) {
    if (n <= 0) continue;
    const p = n / total;
    h -= p * Math.log2(p);
  }
  return h;
}

export function summarizePartition(partition: PartitionMap): PartitionSummary {
  const counts = [...partition.values()].map((b) => b.count);
  return summarizeCounts(counts, counts.reduce((a, b) => a + b, 0));
}

function summarizeCounts(counts: Iterable<number>, total: number): PartitionSummary {
  let classes = 0;
  let squares = 0;
  for (const n of counts) {
    if (n <= 0) continue;
    classes++;
    squares += n * n;
  }
  return {
    entropy: entropyOfCounts(counts, total),
    classes,
    expectedRemaining: total > 0 ? squares / total : 0,
  };
}

/**
 * createPartitioner fixes the candidate set and returns a function scoring
 * one guess at a time. Same results as summarizing partitionByFeedback,
 * but buckets live in a flat array indexed by bulls·(L+1) + cows, and
 * shared symbols are found through a per-guess presence table instead of
 * calling evaluate for every pair.
 */
export function createPartitioner(
  candidates: CandidateSet,
  config: GameConfig = DEFAULT_CONFIG,
): (guess: Code) => PartitionSummary {
  const L = config.length;
  const stride = L + 1;
  const counts = new Int32Array(stride * stride);
  const present = new Uint8Array(config.alphabetSize);

  return (guess) => {
    if (guess.length !== L) throw new Error('Codes must have the same length');
    counts.fill(0);
    for (const s of guess) present[s] = 1;

    for (const c of candidates) {
      let bulls = 0;
      let shared = 0;
      for (let i = 0; i < L; i++) {
        const s = c[i];
        if (s === guess[i]) bulls++;
        shared += present[s];
      }
      counts[bulls * stride + (shared - bulls)]++;
    }

    for (const s of guess) present[s] = 0;
    return summarizeCounts(counts, candidates.length);
  };
}
