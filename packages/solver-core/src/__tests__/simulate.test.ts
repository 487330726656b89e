// packages/solver-core/src/__tests__/simulate.test.ts
//
// End-to-end runs of the solver against an honest oracle.

import { createOracle, formatCode, InvalidCodeError, simulate } from '../index.js';

describe('simulate', () => {
  it('solves 1234 on the full space, shrinking the candidates every round', () => {
    const { outcome, steps } = simulate([1, 2, 3, 4]);

    expect(outcome).toEqual({ kind: 'solved', code: [1, 2, 3, 4], rounds: 2 });
    expect(steps.map((s) => [formatCode(s.guess), s.before, s.remaining])).toEqual([
      ['0123', 5040, 264],
      ['1234', 264, 1],
    ]);
    for (const step of steps) expect(step.remaining).toBeLessThan(step.before);
  });

  it('may probe with non-candidates when the whole space is the pool', () => {
    const { outcome, steps } = simulate([1, 2, 3, 4], { pool: 'all' });

    expect(outcome).toEqual({ kind: 'solved', code: [1, 2, 3, 4], rounds: 3 });
    expect(
      steps.map((s) => [formatCode(s.guess), s.feedback, s.remaining, s.isCandidate]),
    ).toEqual([
      ['0123', { bulls: 0, cows: 3 }, 264, true],
      ['1435', { bulls: 2, cows: 1 }, 6, false],
      ['1234', { bulls: 4, cows: 0 }, 1, true],
    ]);
  });

  it('reports each step as it happens', () => {
    const onStep = vi.fn();
    const { outcome, steps } = simulate([5, 4, 3], {
      config: { length: 3, alphabetSize: 6 },
      onStep,
    });

    expect(outcome).toEqual({ kind: 'solved', code: [5, 4, 3], rounds: 4 });
    expect(steps.map((s) => [formatCode(s.guess), s.remaining])).toEqual([
      ['012', 6],
      ['345', 3],
      ['354', 2],
      ['435', 1],
    ]);
    expect(onStep).toHaveBeenCalledTimes(4);
    expect(onStep.mock.calls[3][0]).toBe(steps[3]);
  });
});

describe('createOracle', () => {
  it('answers with honest feedback', () => {
    const answer = createOracle([0, 1, 2, 3]);
    expect(answer([1, 0, 2, 4])).toEqual({ bulls: 1, cows: 2 });
  });

  it('rejects an invalid secret', () => {
    expect(() => createOracle([1, 1, 2, 3])).toThrow(InvalidCodeError);
  });
});
