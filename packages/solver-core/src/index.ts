// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// The CLI and the tests import the solver, the host game and the code
// model through this barrel.
//
// Includes:
//   • code.ts       → Code / GameConfig model, parsing and formatting
//   • feedback.ts   → bulls-and-cows evaluator and feedback helpers
//   • candidates.ts → candidate space: initialize, filter, narrow
//   • partition.ts  → feedback partitions and their entropy
//   • ranker.ts     → expected-information-gain guess ranking
//   • session.ts    → solver loop controller (SolverSession, runSolver)
//   • oracle.ts     → honest feedback for a known secret, simulate()
//   • host.ts       → host game: the player guesses the computer's secret
//   • errors.ts     → InvalidCodeError, InvalidFeedbackError, ContradictionError
//
// Example usage:
//   import { SolverSession, parseCode } from '@bulls-cows/solver-core';

export * from './errors.js';
export * from './code.js';
export * from './feedback.js';
export * from './candidates.js';
export * from './partition.js';
export * from './ranker.js';
export * from './session.js';
export * from './oracle.js';
export * from './host.js';
