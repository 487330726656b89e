// packages/solver-core/src/session.ts
//
// Solver loop controller: the computer deduces a secret held by someone else.
//
// A SolverSession owns the candidate set for one game and moves through
//
//   init → awaiting-feedback → narrowed → awaiting-feedback → …
//                            ↘ solved | contradiction
//
// nextGuess() asks the ranker for a guess; submitFeedback() narrows the
// candidates with the answer that came back. runSolver() drives a session
// against a SolverCollaborator (a console, a test script, an oracle).
// Rounds are not capped.

import {
  DEFAULT_CONFIG,
  formatCode,
  type Code,
  type GameConfig,
} from './code.js';
import {
  filterCandidates,
  initializeCandidates,
  type CandidateSet,
} from './candidates.js';
import { ContradictionError, InvalidFeedbackError } from './errors.js';
import { isWin, validateFeedback, type Feedback } from './feedback.js';
import { bestGuess, type GuessOption } from './ranker.js';

export type SolverState =
  | 'init'
  | 'awaiting-feedback'
  | 'narrowed'
  | 'solved'
  | 'contradiction';

/**
 * Guess pool for the ranker:
 *  - "candidates" → only codes still consistent with the feedback
 *  - "all"        → every legal code (can split better, costs more)
 */
export type GuessPool = 'candidates' | 'all';

export type SolverOutcome =
  | { kind: 'solved'; code: Code; rounds: number }
  | { kind: 'contradiction'; guess: Code; rounds: number };

export interface RoundRecord {
  round: number;
  guess: Code;
  feedback: Feedback;
  /** Candidates left after this feedback. */
  remaining: number;
  /** Expected information gain the guess was chosen for. */
  score: number;
}

export interface SolverOptions {
  config?: GameConfig;
  pool?: GuessPool;
  onProgress?: (scored: number, total: number) => void;
}

export class SolverSession {
  readonly config: GameConfig;
  readonly pool: GuessPool;

  private readonly space: CandidateSet;
  private readonly onProgress?: (scored: number, total: number) => void;
  private current: CandidateSet;
  private pending: GuessOption | null = null;
  private records: RoundRecord[] = [];
  private result: SolverOutcome | null = null;
  private phase: SolverState = 'init';

  constructor(options: SolverOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.pool = options.pool ?? 'candidates';
    this.onProgress = options.onProgress;
    this.space = initializeCandidates(this.config);
    this.current = this.space;
  }

  get state(): SolverState {
    return this.phase;
  }

  get candidates(): CandidateSet {
    return this.current;
  }

  get round(): number {
    return this.records.length + (this.pending ? 1 : 0);
  }

  get history(): readonly RoundRecord[] {
    return this.records;
  }

  get outcome(): SolverOutcome | null {
    return this.result;
  }

  /** The guess to play next. Repeats the pending guess until feedback arrives. */
  nextGuess(): GuessOption {
    if (this.phase === 'contradiction') throw new ContradictionError();
    if (this.phase === 'solved') throw new Error('Session is already solved');
    if (this.pending) return this.pending;

    this.pending = bestGuess(this.current, {
      config: this.config,
      pool: this.pool === 'all' ? this.space : this.current,
      onProgress: this.onProgress,
    });
    this.phase = 'awaiting-feedback';
    return this.pending;
  }

  /**
   * Narrows the candidates with the feedback for the pending guess.
   * Invalid feedback throws InvalidFeedbackError and changes nothing.
   */
  submitFeedback(feedback: Feedback): SolverState {
    const guess = this.pending;
    if (!guess || this.phase !== 'awaiting-feedback')
      throw new Error('No guess is awaiting feedback');
    validateFeedback(feedback, this.config);

    const next = filterCandidates(this.current, guess.code, feedback);
    const round = this.records.length + 1;
    this.records.push({
      round,
      guess: guess.code,
      feedback,
      remaining: next.length,
      score: guess.score,
    });
    this.current = next;
    this.pending = null;

    if (next.length === 0) {
      this.result = { kind: 'contradiction', guess: guess.code, rounds: round };
      this.phase = 'contradiction';
    } else if (isWin(feedback, this.config)) {
      this.result = { kind: 'solved', code: guess.code, rounds: round };
      this.phase = 'solved';
    } else if (next.length === 1) {
      this.result = { kind: 'solved', code: next[0], rounds: round };
      this.phase = 'solved';
    } else {
      this.phase = 'narrowed';
    }
    return this.phase;
  }
}

export interface SolverCollaborator {
  /** The answer for a guess. May be asked again after rejectFeedback. */
  requestFeedback(guess: Code, round: number): Feedback | Promise<Feedback>;
  presentGuess(option: GuessOption, round: number, remaining: number): void;
  presentResult(outcome: SolverOutcome): void;
  rejectFeedback?(error: InvalidFeedbackError): void;
}

/** Plays a whole session against the collaborator and returns how it ended. */
export async function runSolver(
  collaborator: SolverCollaborator,
  options: SolverOptions = {},
): Promise<SolverOutcome> {
  const session = new SolverSession(options);

  for (;;) {
    const remaining = session.candidates.length;
    const option = session.nextGuess();
    collaborator.presentGuess(option, session.round, remaining);

    let state: SolverState | undefined;
    while (state === undefined) {
      const feedback = await collaborator.requestFeedback(option.code, session.round);
      try {
        state = session.submitFeedback(feedback);
      } catch (err) {
        if (!(err instanceof InvalidFeedbackError)) throw err;
        collaborator.rejectFeedback?.(err);
      }
    }

    const outcome = session.outcome;
    if (outcome) {
      collaborator.presentResult(outcome);
      return outcome;
    }
  }
}

export function describeOutcome(outcome: SolverOutcome): string {
  return outcome.kind === 'solved'
    ? `solved ${formatCode(outcome.code)} in ${outcome.rounds} rounds`
    : `contradiction after guessing ${formatCode(outcome.guess)}`;
}
