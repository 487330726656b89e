// apps/cli/src/program.ts
//
// commander program for the `bulls-cows` console app.
//
//   bulls-cows solve    [--pool candidates|all]
//   bulls-cows play     [--seed <text>] [--max-attempts <n>]
//   bulls-cows simulate <secret> [--pool candidates|all]
//
// Dependencies come in through ProgramDeps so tests can run commands
// against a scripted console without touching the process.

import { Command, InvalidArgumentError, Option } from 'commander';
import { poolSchema, type Pool } from '@bulls-cows/protocol';
import type { CliConfig } from './config.js';
import { InputClosedError, type ConsoleIo } from './io.js';
import type { Logger } from './logger.js';
import { playCommand } from './play.js';
import { simulateCommand } from './simulate.js';
import { solveCommand } from './solve.js';

export interface ProgramDeps {
  config: CliConfig;
  log: Logger;
  /** Opens the console for one command; closed when the command ends. */
  openIo: () => ConsoleIo;
  /** Receives a non-zero exit status. */
  setExitCode: (code: number) => void;
  /** Shows a failed command's message to the user. */
  reportError: (message: string) => void;
}

export const INPUT_ENDED_NOTICE = 'Input ended before the game finished.';

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1)
    throw new InvalidArgumentError('Must be a positive whole number.');
  return n;
}

function poolOption(fallback: Pool): Option {
  return new Option('--pool <pool>', 'codes the solver may guess')
    .choices(poolSchema.options)
    .default(fallback);
}

async function withIo<T>(deps: ProgramDeps, run: (io: ConsoleIo) => Promise<T> | T): Promise<T> {
  const io = deps.openIo();
  try {
    return await run(io);
  } catch (err) {
    if (err instanceof InputClosedError) io.print(INPUT_ENDED_NOTICE);
    throw err;
  } finally {
    io.close();
  }
}

export function createProgram(deps: ProgramDeps): Command {
  const { config, log } = deps;
  const program = new Command()
    .name('bulls-cows')
    .description('Bulls and Cows: guess the computer\'s number, or let it guess yours')
    .version('0.1.0');

  program
    .command('solve')
    .description('the computer guesses a number you are thinking of')
    .addOption(poolOption(config.pool))
    .action(async (opts: { pool: Pool }) => {
      const outcome = await withIo(deps, (io) => solveCommand(io, log, opts));
      if (outcome.kind === 'contradiction') deps.setExitCode(1);
    });

  program
    .command('play')
    .description('you guess a number the computer is thinking of')
    .option('--seed <text>', 'pick the secret deterministically from this text')
    .option('--max-attempts <n>', 'attempts before the game is lost', positiveInt, config.maxAttempts)
    .action(async (opts: { seed?: string; maxAttempts: number }) => {
      await withIo(deps, (io) => playCommand(io, log, opts));
    });

  program
    .command('simulate')
    .description('watch the solver find a secret you give it')
    .argument('<secret>', '4 distinct digits')
    .addOption(poolOption(config.pool))
    .action(async (secret: string, opts: { pool: Pool }) => {
      await withIo(deps, (io) => simulateCommand(io, log, secret, opts));
    });

  return program;
}

/**
 * Parses argv and runs the chosen command. Failures are logged, reported
 * and turned into exit status 1; an unfinished game counts as a failure.
 */
export async function runCli(
  deps: ProgramDeps,
  argv: string[],
  from: 'node' | 'user' = 'node',
): Promise<void> {
  try {
    await createProgram(deps).parseAsync(argv, { from });
  } catch (err) {
    if (err instanceof InputClosedError) {
      deps.log.warn('input closed before the game finished');
    } else {
      deps.log.error({ err }, 'command failed');
      deps.reportError(err instanceof Error ? err.message : String(err));
    }
    deps.setExitCode(1);
  }
}
