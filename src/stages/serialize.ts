/**
 * Serialization Stage
 *
 * Writes the final weighted terms as a hotword table. The header names the
 * variant (`word,boost_value` or `word,frequency`); rows follow map order.
 * An empty map still produces the header row.
 *
 * @module stages/serialize
 */

import type { HotwordEntry, TableVariant, WeightedTerms } from '../schemas/hotwords.js';
import { toEntries } from '../schemas/hotwords.js';
import { formatHotwordTable } from '../storage/hotword-table.js';
import { atomicWriteText } from '../storage/atomic.js';

/**
 * Write `weighted` to `outputPath`.
 *
 * @returns the rows written, in file order
 * @throws OutputWriteError if the destination cannot be written; no retry
 */
export async function serializeHotwords(
  outputPath: string,
  weighted: WeightedTerms,
  variant: TableVariant
): Promise<HotwordEntry[]> {
  await atomicWriteText(outputPath, formatHotwordTable(weighted, variant));
  return toEntries(weighted);
}
