#!/usr/bin/env node
/**
 * tabletrace CLI Entry Point
 */

import { Command } from 'commander';
import { VERSION } from '../index.js';
import { scanCommand } from '../commands/index.js';

/**
 * Create and configure the main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('tabletrace')
    .description('Find every place in a Rails codebase that depends on a database table')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(scanCommand);

  program.addHelpText(
    'after',
    `
Examples:
  $ tabletrace scan . --table rewards                    CSV to stdout
  $ tabletrace scan ../shop -t rewards -m MEDIUM         Only MEDIUM and HIGH
  $ tabletrace scan . -t rewards --strict -o deps.csv    Drop unverified columns
  $ tabletrace scan . -t rewards --format json           JSON with stats
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env['DEBUG']) {
        console.error(error.stack);
      }
    } else {
      console.error('An unexpected error occurred');
    }
    process.exit(1);
  }
}

// Run the CLI
void main();
