// packages/solver-core/src/__tests__/ranker.test.ts
//
// Unit tests for guess ranking.
//
// Goal: bestGuess returns the greedy-optimal guess by expected information
// gain, breaks ties towards remaining candidates and then towards the
// smallest code, short-circuits a single candidate, and stops scoring once
// a guess reaches the score ceiling.
//
// Hand-checked case (2 symbols from {0,1,2}, candidates 10 and 21):
//   10, 21, 01 and 12 each split the candidates 1/1 → 1 bit
//   02 and 20 cannot tell them apart            → 0 bits

import {
  bestGuess,
  ContradictionError,
  filterCandidates,
  formatCode,
  initializeCandidates,
  partitionByFeedback,
  rankGuesses,
  summarizePartition,
} from '../index.js';

const TINY = { length: 2, alphabetSize: 3 };
const SMALL = { length: 3, alphabetSize: 6 };

describe('rankGuesses', () => {
  const space = initializeCandidates(TINY);
  const candidates = [
    [1, 0],
    [2, 1],
  ];

  it('orders by score, then candidates first, then by code', () => {
    const ranked = rankGuesses(candidates, { pool: space, config: TINY });
    expect(ranked.map((o) => formatCode(o.code))).toEqual([
      '10',
      '21',
      '01',
      '12',
      '02',
      '20',
    ]);
    expect(ranked.map((o) => o.score)).toEqual([1, 1, 1, 1, 0, 0]);
    expect(ranked.map((o) => o.isCandidate)).toEqual([
      true,
      true,
      false,
      false,
      false,
      false,
    ]);
  });

  it('defaults the pool to the candidates', () => {
    const ranked = rankGuesses(candidates, { config: TINY });
    expect(ranked.map((o) => formatCode(o.code))).toEqual(['10', '21']);
  });

  it('scores each guess by the entropy of its partition', () => {
    const small = initializeCandidates(SMALL);
    const remaining = filterCandidates(small, [0, 1, 2], { bulls: 0, cows: 1 });
    const ranked = rankGuesses(remaining, { pool: small, config: SMALL });

    expect(ranked).toHaveLength(120);
    for (const option of ranked.slice(0, 10)) {
      const { entropy } = summarizePartition(partitionByFeedback(remaining, option.code));
      expect(option.score).toBeCloseTo(entropy, 12);
    }
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i].score).toBeLessThanOrEqual(ranked[i - 1].score + 1e-9);
    }
  });
});

describe('bestGuess', () => {
  it('throws a contradiction when no candidate remains', () => {
    expect(() => bestGuess([])).toThrow(ContradictionError);
  });

  it('returns a lone candidate without scoring anything', () => {
    const onProgress = vi.fn();
    const option = bestGuess([[1, 2, 3, 4]], { onProgress });
    expect(option).toEqual({
      code: [1, 2, 3, 4],
      score: 0,
      isCandidate: true,
      classes: 1,
      expectedRemaining: 1,
    });
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('prefers a candidate over a smaller non-candidate with the same score', () => {
    const option = bestGuess(
      [
        [1, 0],
        [2, 1],
      ],
      { pool: initializeCandidates(TINY), config: TINY },
    );
    expect(formatCode(option.code)).toBe('10');
    expect(option.isCandidate).toBe(true);
  });

  it('stops scoring once a guess reaches the ceiling', () => {
    // 01 splits the two candidates perfectly: log2(2) = 1 bit, the maximum
    const onProgress = vi.fn();
    const option = bestGuess(
      [
        [0, 1],
        [1, 0],
      ],
      { pool: initializeCandidates(TINY), config: TINY, onProgress },
    );
    expect(formatCode(option.code)).toBe('01');
    expect(option.score).toBe(1);
    expect(onProgress).toHaveBeenCalledTimes(1);
    expect(onProgress).toHaveBeenCalledWith(1, 6);
  });

  it('never returns a guess scoring below another option', () => {
    const small = initializeCandidates(SMALL);
    for (const observed of [
      { bulls: 0, cows: 0 },
      { bulls: 0, cows: 1 },
      { bulls: 1, cows: 1 },
      { bulls: 0, cows: 3 },
    ]) {
      const remaining = filterCandidates(small, [0, 1, 2], observed);
      for (const pool of [remaining, small]) {
        const ranked = rankGuesses(remaining, { pool, config: SMALL });
        const best = bestGuess(remaining, { pool, config: SMALL });
        for (const option of ranked) {
          expect(best.score).toBeGreaterThanOrEqual(option.score - 1e-9);
        }
        expect(formatCode(best.code)).toBe(formatCode(ranked[0].code));
      }
    }
  });

  it('opens the standard game with 0123', () => {
    const option = bestGuess(initializeCandidates());
    expect(option.code).toEqual([0, 1, 2, 3]);
    expect(option.score).toBeCloseTo(2.7712, 4);
    expect(option.classes).toBe(14);
  });
});
