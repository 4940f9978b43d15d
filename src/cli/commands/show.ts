/**
 * Show Command
 *
 * Reads a hotword table back from disk and prints its entries,
 * highest value first.
 *
 * @module cli/commands/show
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { readHotwordTable, type ParsedHotwordTable } from '../../storage/hotword-table.js';
import { VALUE_COLUMNS } from '../../schemas/hotwords.js';
import { formatEntriesTable } from '../formatters/index.js';
import { parsePositiveIntegerOption } from './shared.js';

export interface ShowOptions {
  /** Maximum rows to print */
  limit?: number;
  json?: boolean;
}

export function registerShowCommand(program: Command): void {
  program
    .command('show <table>')
    .description('Print the entries of a hotword table')
    .option('-n, --limit <count>', 'Maximum number of rows to show', parsePositiveIntegerOption)
    .option('--json', 'Print entries as JSON in file order')
    .action(async (table: string, options: ShowOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleShow(table, options, base);
      } catch (error) {
        base.abort(error);
      }
    });
}

/**
 * Handle the show command.
 */
export async function handleShow(
  tablePath: string,
  options: ShowOptions,
  base: BaseCommand
): Promise<ParsedHotwordTable> {
  const table = await readHotwordTable(tablePath);
  base.debug(`Read ${table.entries.length} rows (${VALUE_COLUMNS[table.variant]})`);

  if (options.json) {
    base.json(table.entries);
    return table;
  }

  base.keyValue('Table', tablePath);
  base.keyValue('Column', VALUE_COLUMNS[table.variant]);
  base.keyValue('Entries', table.entries.length);
  base.blank();
  // the table itself is the command's output, so it prints under --quiet too
  console.log(formatEntriesTable(table.entries, table.variant, options.limit));

  return table;
}
