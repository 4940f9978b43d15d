/**
 * Frequency Counter Stage
 *
 * @module stages/frequency
 */

import type { FrequencyTable } from '../schemas/hotwords.js';

/**
 * Tally normalized terms into term -> occurrence count.
 * Keys keep first-occurrence order. Empty input yields an empty table.
 */
export function countFrequencies(terms: Iterable<string>): FrequencyTable {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

/**
 * Lowest and highest count present in a table, or undefined when empty.
 */
export function countBounds(table: FrequencyTable): { min: number; max: number } | undefined {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const count of table.values()) {
    if (count < min) min = count;
    if (count > max) max = count;
  }

  return table.size === 0 ? undefined : { min, max };
}
