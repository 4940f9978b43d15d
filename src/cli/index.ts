#!/usr/bin/env node
/**
 * Hotwords CLI
 *
 * Main entry point for the hotwords CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   hotwords --help
 *   hotwords minutes/2021-04-06.pdf
 *   hotwords generate minutes.txt --range-min 5 --range-max 50
 *   hotwords phrases minutes.pdf --counts
 *   hotwords show minutes.csv
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { describeError } from '../pipeline/errors.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('hotwords')
    .description('Build speech-recognition hotword tables from meeting documents')
    .version(VERSION, '-V, --version', 'Display version number')
    .addHelpText('beforeAll', getVersionInfo());

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const raw = thisCommand.opts();
    const opts: GlobalOptions = {
      verbose: raw.verbose === true,
      quiet: raw.quiet === true,
      color: raw.color !== false,
    };
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Commander's own failures (unknown option, bad argument) are usage errors
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commands report their own errors; this catches anything left over
    console.error(`Error: ${describeError(error)}`);
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
