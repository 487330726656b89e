#!/usr/bin/env node
// apps/cli/src/index.ts
//
// Entry point for the bulls-cows console app.
// Loads `.env`, reads the configuration, and hands argv to commander.

import 'dotenv/config';
import { loadConfig } from './config.js';
import { createConsoleIo } from './io.js';
import { createLogger } from './logger.js';
import { runCli } from './program.js';

const config = loadConfig();
const log = createLogger(config.logLevel);

await runCli(
  {
    config,
    log,
    openIo: () => createConsoleIo(),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    reportError: (message) => console.error(message),
  },
  process.argv,
);
