#!/usr/bin/env node
/**
 * CLI entrypoint
 *
 * Usage:
 *   npx tsx src/run.ts
 *   npx tsx src/run.ts --start 2024-01-01 --end 2024-01-07
 *   npx tsx src/run.ts "Today        09:00 - 10:00    📹 Standup ... abc-defg-hij"
 */

import chalk from 'chalk';
import { createProgram } from './cli.js';
import { errorMessage, exitCodeFor } from './errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(exitCodeFor(error));
  });
