/**
 * Generate Command
 *
 * Builds a hotword table from one document and writes it beside the
 * document (or to --output). This is the default command.
 *
 * @module cli/commands/generate
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { runHotwordPipeline } from '../../pipeline/executor.js';
import type { PipelineResult } from '../../pipeline/types.js';
import { createRunConfig, type RunConfig } from '../../schemas/run-config.js';
import {
  DEFAULT_PREVIEW_ROWS,
  createStageProgress,
  formatEntriesTable,
  formatRunSummary,
} from '../formatters/index.js';
import {
  parseIntegerOption,
  resolveDefaults,
  resolveSource,
  resolveTagger,
  type CommandDependencies,
} from './shared.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the generate command.
 */
export interface GenerateOptions {
  rangeMin?: number;
  rangeMax?: number;
  taggerModel?: string;
  /** Undefined unless --rescale or --no-rescale was given */
  rescale?: boolean;
  output?: string;
  /** Print entries as JSON instead of the summary */
  json?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <document>', { isDefault: true })
    .description('Build a hotword table from a PDF or text document')
    .option('--range-min <n>', 'Lowest boost value', parseIntegerOption)
    .option('--range-max <n>', 'Highest boost value', parseIntegerOption)
    .option('--tagger-model <name>', 'Tagger model package to load')
    .option('--rescale', 'Rescale counts onto the boost range (default)')
    .option('--no-rescale', 'Write raw frequencies instead of boost values')
    .option('-o, --output <path>', 'Output table path (default: <document>.csv)')
    .option('--json', 'Print the written entries as JSON')
    .action(async (document: string, options: GenerateOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleGenerate(document, options, base);
      } catch (error) {
        base.abort(error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Merge flags over the configured defaults.
 *
 * @throws ConfigError when the merged values are invalid
 */
export function buildRunConfig(options: GenerateOptions, deps: CommandDependencies = {}): RunConfig {
  const defaults = resolveDefaults(deps);

  return createRunConfig({
    rangeMin: options.rangeMin ?? defaults.rangeMin,
    rangeMax: options.rangeMax ?? defaults.rangeMax,
    rescale: options.rescale ?? defaults.rescale,
    taggerModel: options.taggerModel ?? defaults.taggerModel,
    outputPath: options.output,
  });
}

/**
 * Handle the generate command.
 */
export async function handleGenerate(
  document: string,
  options: GenerateOptions,
  base: BaseCommand,
  deps: CommandDependencies = {}
): Promise<PipelineResult> {
  const config = buildRunConfig(options, deps);
  base.debug(
    `Run config: range [${config.rangeMin}, ${config.rangeMax}], rescale ${config.rescale}, model ${config.taggerModel}`
  );

  const showProgress = !options.json && !base.isQuiet();
  const progress = showProgress ? createStageProgress() : undefined;

  const result = await runHotwordPipeline(
    { inputPath: document, config },
    {
      source: resolveSource(deps),
      tagger: resolveTagger(deps, config.taggerModel),
      // stdout carries only the JSON document under --json
      logger: options.json ? undefined : base.asLogger(),
      callbacks: progress?.callbacks(),
    }
  );

  if (options.json) {
    base.json(result.entries);
    return result;
  }

  if (progress && base.isVerbose()) {
    progress.skipPending();
    progress.printSummary();
  }
  base.blank();
  base.info(formatRunSummary(result));
  base.blank();
  base.info(formatEntriesTable(result.entries, result.variant, DEFAULT_PREVIEW_ROWS));

  return result;
}
