// packages/solver-core/src/host.ts
//
// Host game: the computer holds a secret and a player guesses it.
//
// Each guess is scored with evaluate(). The host also keeps the codes
// still consistent with the feedback given so far, so the player can be
// shown how much uncertainty is left: log2(|consistent codes|) bits.
// The game is lost when the attempt budget runs out (20 by default) or
// the player quits.

import {
  countCodes,
  DEFAULT_CONFIG,
  formatCode,
  isValidCode,
  type Code,
  type GameConfig,
} from './code.js';
import {
  initializeCandidates,
  narrowCandidates,
  remainingEntropy,
  type CandidateSet,
} from './candidates.js';
import { InvalidCodeError } from './errors.js';
import { evaluate, isWin, type Feedback } from './feedback.js';

export const DEFAULT_MAX_ATTEMPTS = 20;

export type HostState = 'playing' | 'won' | 'lost';

export interface HostOptions {
  config?: GameConfig;
  /** Fixed secret; otherwise one is picked from the code space. */
  secret?: Code;
  /** Deterministic pick when no secret is given. */
  seed?: string;
  maxAttempts?: number;
  random?: () => number;
}

export interface HostTurn {
  attempt: number;
  guess: Code;
  feedback: Feedback;
  state: HostState;
  /** Codes still consistent with every feedback so far. */
  remaining: number;
  /** log2(remaining), in bits. */
  entropy: number;
}

/**
 * pickSecret chooses a code from the space.
 * With a seed the choice is stable (FNV-1a over the seed's UTF-16 units),
 * so seeded games and tests are reproducible.
 */
export function pickSecret(
  space: CandidateSet,
  seed?: string,
  random: () => number = Math.random,
): Code {
  if (space.length === 0) throw new Error('Code space is empty');
  if (seed === undefined) return space[Math.floor(random() * space.length)];

  let h = 2166136261;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return space[Math.abs(h) % space.length];
}

export class HostGame {
  readonly config: GameConfig;
  readonly maxAttempts: number;

  private readonly secret: Code;
  private consistent: CandidateSet;
  private turns: HostTurn[] = [];
  private status: HostState = 'playing';

  constructor(options: HostOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1)
      throw new Error('maxAttempts must be a positive integer');

    this.consistent = initializeCandidates(this.config);
    if (options.secret) {
      if (!isValidCode(options.secret, this.config))
        throw new InvalidCodeError(`Not a valid secret: ${formatCode(options.secret)}`);
      this.secret = options.secret;
    } else {
      this.secret = pickSecret(this.consistent, options.seed, options.random);
    }
  }

  get state(): HostState {
    return this.status;
  }

  get attempts(): number {
    return this.turns.length;
  }

  get history(): readonly HostTurn[] {
    return this.turns;
  }

  /** Uncertainty before any guess: log2 of the whole code space. */
  get initialEntropy(): number {
    return remainingEntropy(countCodes(this.config));
  }

  guess(code: Code): HostTurn {
    if (this.status !== 'playing') throw new Error('Game is over');
    if (!isValidCode(code, this.config)) {
      throw new InvalidCodeError(
        `Guess must be ${this.config.length} distinct symbols`,
      );
    }

    const feedback = evaluate(this.secret, code);
    this.consistent = narrowCandidates(this.consistent, code, feedback);

    const attempt = this.turns.length + 1;
    if (isWin(feedback, this.config)) this.status = 'won';
    else if (attempt >= this.maxAttempts) this.status = 'lost';

    const turn: HostTurn = {
      attempt,
      guess: code,
      feedback,
      state: this.status,
      remaining: this.consistent.length,
      entropy: remainingEntropy(this.consistent),
    };
    this.turns.push(turn);
    return turn;
  }

  /** Ends the game and reveals the secret. */
  quit(): Code {
    if (this.status === 'playing') this.status = 'lost';
    return this.secret;
  }

  /** The secret, once the game is over. */
  reveal(): Code | null {
    return this.status === 'playing' ? null : this.secret;
  }
}
