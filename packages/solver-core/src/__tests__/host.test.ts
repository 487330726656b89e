// packages/solver-core/src/__tests__/host.test.ts
//
// Unit tests for the host game, where the player guesses the computer's
// secret: feedback, the remaining-uncertainty readout, the attempt budget,
// quitting and seeded secrets.

import {
  formatCode,
  HostGame,
  initializeCandidates,
  InvalidCodeError,
  pickSecret,
} from '../index.js';

describe('HostGame', () => {
  it('scores guesses and tracks the codes still possible', () => {
    const game = new HostGame({ secret: [1, 2, 3, 4] });
    expect(game.initialEntropy).toBeCloseTo(12.2992, 4);

    const turn = game.guess([0, 1, 2, 3]);
    expect(turn).toMatchObject({
      attempt: 1,
      feedback: { bulls: 0, cows: 3 },
      state: 'playing',
      remaining: 264,
    });
    expect(turn.entropy).toBeCloseTo(8.0444, 4);
    expect(game.reveal()).toBeNull();

    const win = game.guess([1, 2, 3, 4]);
    expect(win).toMatchObject({
      attempt: 2,
      feedback: { bulls: 4, cows: 0 },
      state: 'won',
      remaining: 1,
      entropy: 0,
    });
    expect(game.state).toBe('won');
    expect(game.reveal()).toEqual([1, 2, 3, 4]);
    expect(() => game.guess([1, 2, 3, 4])).toThrow('Game is over');
  });

  it('is lost when the attempts run out', () => {
    const game = new HostGame({ secret: [1, 2, 3, 4], maxAttempts: 2 });
    expect(game.guess([5, 6, 7, 8]).state).toBe('playing');
    expect(game.guess([5, 6, 7, 9]).state).toBe('lost');
    expect(game.attempts).toBe(2);
    expect(game.history.map((t) => t.state)).toEqual(['playing', 'lost']);
  });

  it('refuses malformed guesses without using an attempt', () => {
    const game = new HostGame({ secret: [1, 2, 3, 4] });
    expect(() => game.guess([1, 1, 2, 3])).toThrow(InvalidCodeError);
    expect(game.attempts).toBe(0);
  });

  it('reveals the secret on quit', () => {
    const game = new HostGame({ secret: [9, 0, 1, 2] });
    expect(game.quit()).toEqual([9, 0, 1, 2]);
    expect(game.state).toBe('lost');
  });

  it('validates its options', () => {
    expect(() => new HostGame({ secret: [1, 2, 3] })).toThrow(InvalidCodeError);
    expect(() => new HostGame({ maxAttempts: 0 })).toThrow(
      'maxAttempts must be a positive integer',
    );
  });

  it('picks the same secret for the same seed', () => {
    const a = new HostGame({ seed: 'daily-1' });
    const b = new HostGame({ seed: 'daily-1' });
    expect(formatCode(a.quit())).toBe('9645');
    expect(b.quit()).toEqual(a.reveal());
  });
});

describe('pickSecret', () => {
  const space = initializeCandidates();

  it('hashes the seed into the space', () => {
    expect(formatCode(pickSecret(space, 'abc'))).toBe('1937');
  });

  it('hashes both halves of a surrogate pair', () => {
    // U+1F600 and U+1F601 share their high surrogate
    expect(formatCode(pickSecret(space, '\u{1F600}'))).toBe('9234');
    expect(formatCode(pickSecret(space, '\u{1F601}'))).toBe('0396');
  });

  it('draws from the random source without a seed', () => {
    expect(pickSecret(space, undefined, () => 0)).toEqual([0, 1, 2, 3]);
    expect(pickSecret(space, undefined, () => 0.99999)).toEqual([9, 8, 7, 6]);
  });

  it('throws on an empty space', () => {
    expect(() => pickSecret([])).toThrow('Code space is empty');
  });
});
