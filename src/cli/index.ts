#!/usr/bin/env node
/**
 * soap-daemon CLI
 *
 * Usage: soap-daemon <command> [arguments]
 *
 * Run `soap-daemon --help` for detailed usage information.
 */

import chalk from 'chalk';
import { initializeLogging } from '../logging/index.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  initializeLogging();
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
