// packages/protocol/src/index.ts
//
// Shared text-boundary definitions for the bulls-and-cows console.
// Each schema checks raw console text at run time and infers the type the
// rest of the app works with.
//
// Defines:
//   - codeText:        a secret or guess typed as digits ("0123").
//   - feedback:        { bulls, cows } as the solver consumes it.
//   - feedbackCommand: what the player types while the computer guesses
//                      ("2 1", "2 bulls 1 cow", "win").
//   - playCommand:     what the player types while guessing ("0123", "quit").
//   - pool:            which codes the solver may guess.
//
// The console validates everything it reads with these schemas before it
// reaches the solver core.

import { z } from 'zod';

export const CODE_LENGTH = 4;

/** Guess pool for the solver: remaining candidates, or every code. */
export const poolSchema = z.enum(['candidates', 'all']);
export type Pool = z.infer<typeof poolSchema>;

/* -------------------------------------------------------------------------- */
/*                                   Codes                                    */
/* -------------------------------------------------------------------------- */

/**
 * Code text: exactly four digits, none repeated. Whitespace around the
 * digits is dropped before checking.
 */
export const codeTextSchema = z
  .string()
  .trim()
  .regex(/^\d{4}$/, 'Enter exactly 4 digits')
  .refine((s) => new Set(s).size === s.length, 'Digits must all be different');

/* -------------------------------------------------------------------------- */
/*                                  Feedback                                  */
/* -------------------------------------------------------------------------- */

export const feedbackSchema = z
  .object({
    bulls: z.number().int().min(0),
    cows: z.number().int().min(0),
  })
  .refine((f) => f.bulls + f.cows <= CODE_LENGTH, {
    message: `Bulls and cows should be between 0 and ${CODE_LENGTH}, and their sum ≤ ${CODE_LENGTH}`,
  });
export type Feedback = z.infer<typeof feedbackSchema>;

/**
 * Feedback command, as typed by the player:
 *  - "win"                      → the guess was right
 *  - "<bulls> <cows>"           → e.g. "2 1"
 *  - "<n> bull(s) <m> cow(s)"   → e.g. "2 bulls 1 cow"
 * Case and extra spaces are ignored.
 */
const FEEDBACK_TEXT = /^(\d+)\s*(?:b|bulls?)?[\s,]+(\d+)\s*(?:c|cows?)?$/;

export const feedbackCommandSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((s, ctx) => {
    if (s === 'win') return { kind: 'win' as const };

    const m = FEEDBACK_TEXT.exec(s);
    if (!m) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Please enter two numbers separated by space, or 'win'",
      });
      return z.NEVER;
    }

    const parsed = feedbackSchema.safeParse({ bulls: Number(m[1]), cows: Number(m[2]) });
    if (!parsed.success) {
      for (const issue of parsed.error.issues) ctx.addIssue(issue);
      return z.NEVER;
    }
    return { kind: 'feedback' as const, feedback: parsed.data };
  });
export type FeedbackCommand = z.infer<typeof feedbackCommandSchema>;

/* -------------------------------------------------------------------------- */
/*                                Play commands                               */
/* -------------------------------------------------------------------------- */

/**
 * Play command:
 *  - "quit"   → give up and see the secret
 *  - "<code>" → a guess, validated by codeTextSchema
 */
export const playCommandSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((s, ctx) => {
    if (s === 'quit') return { kind: 'quit' as const };

    const parsed = codeTextSchema.safeParse(s);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) ctx.addIssue(issue);
      return z.NEVER;
    }
    return { kind: 'guess' as const, code: parsed.data };
  });
export type PlayCommand = z.infer<typeof playCommandSchema>;

/** First issue message of a failed parse, for showing to the player. */
export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid input';
}
