/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - generate: Build a hotword table from a document (default)
 * - phrases: Print the proper-noun candidates of a document
 * - show: Print an existing hotword table
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerGenerateCommand } from './generate.js';
import { registerPhrasesCommand } from './phrases.js';
import { registerShowCommand } from './show.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerGenerateCommand(program);
  registerPhrasesCommand(program);
  registerShowCommand(program);
}
