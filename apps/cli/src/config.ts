// apps/cli/src/config.ts
//
// Environment configuration for the console app.
//
//   LOG_LEVEL     pino level for the stderr log       (default "warn")
//   GUESS_POOL    "candidates" | "all"                (default "all")
//   MAX_ATTEMPTS  attempt budget in the play mode     (default 20)
//
// `.env` is loaded by the entry point (dotenv/config) before this runs.
// Command-line flags override these values.

import { z } from 'zod';
import { poolSchema, type Pool } from '@bulls-cows/protocol';
import { DEFAULT_MAX_ATTEMPTS } from '@bulls-cows/solver-core';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('warn'),
  GUESS_POOL: poolSchema.default('all'),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
});

export interface CliConfig {
  logLevel: LogLevel;
  pool: Pool;
  maxAttempts: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message}`);
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    pool: parsed.data.GUESS_POOL,
    maxAttempts: parsed.data.MAX_ATTEMPTS,
  };
}
