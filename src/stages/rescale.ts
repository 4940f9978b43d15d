/**
 * Weight Rescaling Stage
 *
 * Maps occurrence counts linearly onto a boost range:
 *
 * ```
 * weight = (count - minCount) / (maxCount - minCount) * (range.max - range.min) + range.min
 * ```
 *
 * where minCount and maxCount are the extremes found in the table. The least
 * frequent term lands exactly on `range.min` and the most frequent exactly on
 * `range.max`.
 *
 * When every term has the same count there is no spread to scale, and each
 * term gets the midpoint of the range.
 *
 * @module stages/rescale
 */

import type { FrequencyTable, WeightedTerms, WeightRange } from '../schemas/hotwords.js';
import { EmptyInputError } from '../pipeline/errors.js';
import { countBounds } from './frequency.js';

/**
 * Weight given to every term when all counts are equal.
 */
export function uniformWeight(range: WeightRange): number {
  return (range.min + range.max) / 2;
}

/**
 * Rescale a frequency table onto `range`.
 *
 * @returns a new map with the same keys, in the same order
 * @throws RangeError when the range is not finite or `min >= max`
 * @throws EmptyInputError when the table is empty
 */
export function rescaleWeights(table: FrequencyTable, range: WeightRange): WeightedTerms {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min >= range.max) {
    throw new RangeError(`Invalid weight range [${range.min}, ${range.max}]: min must be less than max`);
  }

  const bounds = countBounds(table);
  if (!bounds) {
    throw new EmptyInputError();
  }

  const spread = bounds.max - bounds.min;
  const width = range.max - range.min;
  const weighted = new Map<string, number>();

  for (const [term, count] of table) {
    const weight =
      spread === 0 ? uniformWeight(range) : ((count - bounds.min) / spread) * width + range.min;
    weighted.set(term, weight);
  }

  return weighted;
}
