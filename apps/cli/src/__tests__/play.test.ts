// apps/cli/src/__tests__/play.test.ts
//
// The `play` command with a seeded secret. Seed "daily-1" picks 9645.

import { createLogger } from '../logger.js';
import { playCommand } from '../play.js';
import { scriptedIo } from './scriptedIo.js';

const log = createLogger('silent');

describe('playCommand', () => {
  it('scores guesses until the secret is found', async () => {
    const io = scriptedIo(['12', '0123', '9645']);
    const state = await playCommand(io, log, { maxAttempts: 20, seed: 'daily-1' });

    expect(state).toBe('won');
    expect(io.lines).toEqual([
      "I've thought of a 4-digit number with unique digits.",
      "Try to guess it! After each guess, I'll tell you:",
      '- Bulls: correct digit in correct position',
      '- Cows: correct digit in wrong position',
      '',
      'Initial entropy: 12.2992 bits',
      "Enter 'quit' to give up.",
      '',
      'Invalid guess. Enter exactly 4 digits.',
      '',
      'Feedback for 0123:',
      'Bulls: 0',
      'Cows: 0',
      'Codes still possible: 360',
      'Current entropy: 8.4919 bits',
      '',
      'Feedback for 9645:',
      'Bulls: 4',
      'Cows: 0',
      'Codes still possible: 1',
      'Current entropy: 0.0000 bits',
      '',
      'Congratulations! You found the number 9645 in 2 attempts!',
    ]);
    expect(io.prompts).toEqual([
      'Attempt 1. Enter your guess (4 unique digits): ',
      'Attempt 1. Enter your guess (4 unique digits): ',
      'Attempt 2. Enter your guess (4 unique digits): ',
    ]);
  });

  it('reveals the secret when the player quits', async () => {
    const io = scriptedIo(['quit']);
    const state = await playCommand(io, log, { maxAttempts: 20, seed: 'daily-1' });

    expect(state).toBe('lost');
    expect(io.lines[io.lines.length - 1]).toBe('Game over! The secret number was: 9645');
  });

  it('ends the game when the attempts run out', async () => {
    const io = scriptedIo(['0123']);
    const state = await playCommand(io, log, { maxAttempts: 1, seed: 'daily-1' });

    expect(state).toBe('lost');
    expect(io.lines.slice(-2)).toEqual(['', 'Too many attempts! The secret number was: 9645']);
  });

  it('rejects repeated digits without using an attempt', async () => {
    const io = scriptedIo(['1123', 'quit']);
    await playCommand(io, log, { maxAttempts: 20, seed: 'daily-1' });

    expect(io.lines).toContain('Invalid guess. Digits must all be different.');
    expect(io.prompts[1]).toBe('Attempt 1. Enter your guess (4 unique digits): ');
  });
});
