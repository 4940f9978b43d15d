/**
 * Phrases Command
 *
 * Prints the proper-noun candidates found in a document as JSON, without
 * writing a table. With --counts, prints the normalized frequency table.
 *
 * @module cli/commands/phrases
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { HotwordPipeline } from '../../pipeline/executor.js';
import { resolveDefaults, resolveSource, resolveTagger, type CommandDependencies } from './shared.js';

export interface PhrasesOptions {
  taggerModel?: string;
  /** Print term counts instead of the raw phrase list */
  counts?: boolean;
}

export function registerPhrasesCommand(program: Command): void {
  program
    .command('phrases <document>')
    .description('Print the proper-noun candidates found in a document as JSON')
    .option('--tagger-model <name>', 'Tagger model package to load')
    .option('-c, --counts', 'Print normalized term counts instead of phrases')
    .action(async (document: string, options: PhrasesOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handlePhrases(document, options, base);
      } catch (error) {
        base.abort(error);
      }
    });
}

/**
 * Handle the phrases command.
 *
 * @returns The printed value: a phrase list, or term counts in first-seen order
 */
export async function handlePhrases(
  document: string,
  options: PhrasesOptions,
  base: BaseCommand,
  deps: CommandDependencies = {}
): Promise<string[] | Record<string, number>> {
  const model = options.taggerModel ?? resolveDefaults(deps).taggerModel;
  base.debug(`Tagger model: ${model}`);

  const pipeline = new HotwordPipeline({
    source: resolveSource(deps),
    tagger: resolveTagger(deps, model),
  });

  if (options.counts) {
    const counts = Object.fromEntries(await pipeline.countTerms(document));
    base.json(counts);
    return counts;
  }

  const phrases = await pipeline.listPhrases(document);
  base.json(phrases);
  return phrases;
}
