#!/usr/bin/env node

/**
 * BankFind parse CLI - FDIC institutions and failures to parquet with field metadata
 */

import { Command } from 'commander';
import { createParseCommand } from './commands/parse.js';
import { createDictionaryCommand } from './commands/dictionary.js';
import { logger } from '../utils/logger.js';

const pkg = {
  name: 'bankfind',
  version: '0.1.0',
  description: 'Parse FDIC BankFind data into parquet files with embedded field metadata',
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version);

  program.addCommand(createParseCommand());
  program.addCommand(createDictionaryCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unexpected error', { error: message });
  console.error(JSON.stringify({
    status: 'error',
    error: {
      code: 'UNEXPECTED_ERROR',
      message,
    },
  }, null, 2));
  process.exit(1);
});
