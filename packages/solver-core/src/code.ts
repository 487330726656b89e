// packages/solver-core/src/code.ts
//
// Code model shared by the solver and the host game.
//
// A code is an ordered run of `length` symbols taken from an alphabet of
// `alphabetSize` symbols (0 … alphabetSize-1), no symbol repeated.
// Its text form writes one base-36 digit per symbol, so the standard
// 4-of-10 game reads as plain digits ("0123").

import { InvalidCodeError } from './errors.js';

export type Code = readonly number[];

export interface GameConfig {
  /** Symbols per code. */
  readonly length: number;
  /** Symbols available, 0 … alphabetSize-1. */
  readonly alphabetSize: number;
}

export const DEFAULT_CONFIG: GameConfig = { length: 4, alphabetSize: 10 };

/** Base-36 text digits cap the alphabet. */
export const MAX_ALPHABET = 36;

export function assertConfig(config: GameConfig): void {
  const { length, alphabetSize } = config;
  if (!Number.isInteger(length) || !Number.isInteger(alphabetSize))
    throw new Error('Code length and alphabet size must be integers');
  if (length < 1 || alphabetSize > MAX_ALPHABET || length > alphabetSize) {
    throw new Error(
      `Unsupported configuration: length ${length}, alphabet ${alphabetSize}`,
    );
  }
}

export function isValidCode(
  code: readonly number[],
  config: GameConfig = DEFAULT_CONFIG,
): boolean {
  if (code.length !== config.length) return false;
  const seen = new Set<number>();
  for (const s of code) {
    if (!Number.isInteger(s) || s < 0 || s >= config.alphabetSize) return false;
    if (seen.has(s)) return false;
    seen.add(s);
  }
  return true;
}

/**
 * parseCode turns "0123"-style text into a Code.
 *
 * Surrounding whitespace is ignored and letters are case-insensitive.
 * Throws InvalidCodeError with a message naming the broken rule.
 */
export function parseCode(text: string, config: GameConfig = DEFAULT_CONFIG): Code {
  const raw = text.trim().toLowerCase();
  if (raw.length !== config.length)
    throw new InvalidCodeError(`Code must have exactly ${config.length} symbols`);

  const code: number[] = [];
  for (const ch of raw) {
    const s = Number.parseInt(ch, 36);
    if (Number.isNaN(s) || s >= config.alphabetSize) {
      throw new InvalidCodeError(
        `Symbol "${ch}" is outside the alphabet of ${config.alphabetSize}`,
      );
    }
    if (code.includes(s))
      throw new InvalidCodeError(`Symbol "${ch}" appears more than once`);
    code.push(s);
  }
  return code;
}

export function formatCode(code: Code): string {
  return code.map((s) => s.toString(36)).join('');
}

/** Stable identity for Sets and Maps; codes are arrays and compare by reference. */
export const codeKey = formatCode;

/** Lexicographic order by symbol; the order the code space is generated in. */
export function compareCodes(a: Code, b: Code): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

/** alphabetSize! / (alphabetSize - length)! */
export function countCodes(config: GameConfig = DEFAULT_CONFIG): number {
  let n = 1;
  for (let i = 0; i < config.length; i++) n *= config.alphabetSize - i;
  return n;
}
