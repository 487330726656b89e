// packages/solver-core/src/errors.ts
//
// Error kinds raised by the solver core.
//
//   • InvalidCodeError     → a code breaks the length / alphabet / distinctness rules
//   • InvalidFeedbackError → bulls/cows out of range for the configured length
//   • ContradictionError   → no candidate is consistent with the feedback so far
//
// Consumers branch on `instanceof` (or on `code`) to tell user mistakes
// apart from programming errors, which stay plain `Error`s.

export type BullsCowsErrorCode =
  | 'INVALID_CODE'
  | 'INVALID_FEEDBACK'
  | 'CONTRADICTION';

export class BullsCowsError extends Error {
  readonly code: BullsCowsErrorCode;

  constructor(code: BullsCowsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCodeError extends BullsCowsError {
  constructor(message: string) {
    super('INVALID_CODE', message);
  }
}

export class InvalidFeedbackError extends BullsCowsError {
  constructor(message: string) {
    super('INVALID_FEEDBACK', message);
  }
}

/** The accumulated feedback rules out every code. */
export class ContradictionError extends BullsCowsError {
  constructor(message = 'No possible codes remain') {
    super('CONTRADICTION', message);
  }
}
