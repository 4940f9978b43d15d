/**
 * Hotword Data Types
 *
 * Frequency tables, weighted terms and the row form written to disk.
 *
 * @module schemas/hotwords
 */

import { z } from 'zod';

// ============================================================================
// Table Variant
// ============================================================================

/**
 * Output variants:
 * - boost: counts rescaled onto the configured weight range
 * - frequency: raw occurrence counts
 */
export const TableVariantSchema = z.enum(['boost', 'frequency']);

export type TableVariant = z.infer<typeof TableVariantSchema>;

/** Name of the term column in every table */
export const WORD_COLUMN = 'word';

/**
 * Name of the value column for each variant.
 */
export const VALUE_COLUMNS: Record<TableVariant, string> = {
  boost: 'boost_value',
  frequency: 'frequency',
} as const;

/**
 * Resolve a value column name back to its variant.
 */
export function variantForColumn(column: string): TableVariant | undefined {
  return TableVariantSchema.options.find((variant) => VALUE_COLUMNS[variant] === column);
}

// ============================================================================
// Maps
// ============================================================================

/**
 * Normalized term -> occurrence count. Iteration order is first occurrence.
 */
export type FrequencyTable = ReadonlyMap<string, number>;

/**
 * Normalized term -> weight (rescaled boost or raw count).
 */
export type WeightedTerms = ReadonlyMap<string, number>;

/**
 * Inclusive target range for rescaled weights.
 */
export interface WeightRange {
  min: number;
  max: number;
}

// ============================================================================
// Hotword Entry
// ============================================================================

export const HotwordEntrySchema = z.object({
  word: z.string().min(1),
  value: z.number().finite(),
});

export type HotwordEntry = z.infer<typeof HotwordEntrySchema>;

/**
 * Flatten a weighted-term map into rows, keeping iteration order.
 */
export function toEntries(weighted: WeightedTerms): HotwordEntry[] {
  return Array.from(weighted, ([word, value]) => ({ word, value }));
}
