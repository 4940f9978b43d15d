/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the schema definitions used in the pipeline.
 */

export {
  PosClassSchema,
  PROPER_NOUN,
  TokenSchema,
  createToken,
  toPosClass,
  type PosClass,
  type Token,
} from './token.js';

export {
  TableVariantSchema,
  HotwordEntrySchema,
  WORD_COLUMN,
  VALUE_COLUMNS,
  variantForColumn,
  toEntries,
  type TableVariant,
  type FrequencyTable,
  type WeightedTerms,
  type WeightRange,
  type HotwordEntry,
} from './hotwords.js';

export {
  RunConfigSchema,
  DEFAULT_RUN_CONFIG,
  DEFAULT_TAGGER_MODEL,
  createRunConfig,
  type RunConfig,
} from './run-config.js';
