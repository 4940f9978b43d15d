/**
 * Run Summary Formatters
 *
 * CLI output formatters for hotword runs:
 * - Run summary (counts, timing, output path)
 * - Hotword entry table
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineResult } from '../../pipeline/types.js';
import { VALUE_COLUMNS, type HotwordEntry, type TableVariant } from '../../schemas/hotwords.js';
import { formatDuration } from './progress.js';

/** Rows shown in the summary preview before eliding the rest */
export const DEFAULT_PREVIEW_ROWS = 10;

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Hotwords Complete ===
 * Input:    /data/minutes/2021-04-06.pdf
 * Output:   /data/minutes/2021-04-06.csv
 * Variant:  boost_value
 * Duration: 1.2s
 *
 * Results:
 *   Tokens tagged:       5234
 *   Candidates:          312
 *   Dropped:             14
 *   Unique hotwords:     97
 * ```
 */
export function formatRunSummary(result: PipelineResult): string {
  const lines: string[] = [];
  const { stats } = result;

  lines.push(chalk.bold('=== Hotwords Complete ==='));
  lines.push(`Input:    ${chalk.cyan(result.inputPath)}`);
  lines.push(`Output:   ${chalk.cyan(result.outputPath)}`);
  lines.push(`Variant:  ${VALUE_COLUMNS[result.variant]}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);
  lines.push('');

  lines.push('Results:');
  lines.push(`  Tokens tagged:       ${stats.tokens}`);
  lines.push(`  Candidates:          ${stats.candidates}`);
  lines.push(`  Dropped:             ${stats.dropped}`);
  lines.push(`  Unique hotwords:     ${stats.uniqueTerms}`);

  if (stats.uniqueTerms === 0) {
    lines.push('');
    lines.push(chalk.yellow('Warning:  no proper-noun candidates found; table has a header only'));
  }

  return lines.join('\n');
}

/**
 * Format hotword entries as aligned columns, highest value first.
 * Ties keep file order.
 *
 * @param limit - Show at most this many rows; the rest are summarised
 */
export function formatEntriesTable(
  entries: readonly HotwordEntry[],
  variant: TableVariant,
  limit?: number
): string {
  const valueColumn = VALUE_COLUMNS[variant];
  if (entries.length === 0) {
    return chalk.dim('(no hotwords)');
  }

  const sorted = [...entries].sort((a, b) => b.value - a.value);
  const shown = limit === undefined ? sorted : sorted.slice(0, limit);
  const wordWidth = Math.max('word'.length, ...shown.map((entry) => entry.word.length));

  const lines = [chalk.bold(`${'word'.padEnd(wordWidth)}  ${valueColumn}`)];
  for (const entry of shown) {
    lines.push(`${entry.word.padEnd(wordWidth)}  ${formatValue(entry.value)}`);
  }
  if (shown.length < sorted.length) {
    lines.push(chalk.dim(`... ${sorted.length - shown.length} more`));
  }

  return lines.join('\n');
}

/**
 * Weights print with at most two decimals; whole numbers print bare.
 */
export function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
