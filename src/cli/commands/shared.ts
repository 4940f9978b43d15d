/**
 * Shared Command Helpers
 *
 * Option parsers and collaborator wiring used by more than one command.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';
import type { TextSource, TokenTagger } from '../../pipeline/types.js';
import { FileTextSource } from '../../sources/text-source.js';
import { WinkTokenTagger } from '../../sources/wink-tagger.js';
import { getConfig, type RunDefaults } from '../../config/index.js';

/**
 * Overrides for the collaborators a command builds. Tests pass stubs here;
 * the CLI leaves it empty.
 */
export interface CommandDependencies {
  source?: TextSource;
  /** Builds the tagger for the configured model */
  createTagger?: (model: string) => TokenTagger;
  /** Run defaults; read from the environment when absent */
  defaults?: RunDefaults;
}

/**
 * Commander argument parser for whole-number options.
 */
export function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

/**
 * Commander argument parser for counts that must be at least 1.
 */
export function parsePositiveIntegerOption(value: string): number {
  const parsed = parseIntegerOption(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

export function resolveDefaults(deps: CommandDependencies): RunDefaults {
  return deps.defaults ?? getConfig().defaults;
}

export function resolveSource(deps: CommandDependencies): TextSource {
  return deps.source ?? new FileTextSource();
}

export function resolveTagger(deps: CommandDependencies, model: string): TokenTagger {
  return deps.createTagger ? deps.createTagger(model) : new WinkTokenTagger(model);
}
