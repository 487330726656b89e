// apps/cli/src/logger.ts
//
// pino logger for the console app. Logs go to stderr so prompts and
// results on stdout stay readable.

import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel): Logger {
  return pino({ level, name: 'bulls-cows' }, pino.destination(2));
}
