/**
 * Run Configuration Schema
 *
 * Options for a single hotword run. Values come from command-line flags,
 * then environment variables, then the defaults below.
 *
 * @module schemas/run-config
 */

import { z } from 'zod';
import { ConfigError } from '../pipeline/errors.js';

// ============================================================================
// Defaults
// ============================================================================

/** Tagger model package loaded when none is configured */
export const DEFAULT_TAGGER_MODEL = 'wink-eng-lite-web-model';

export const DEFAULT_RUN_CONFIG = {
  rangeMin: 1,
  rangeMax: 20,
  rescale: true,
  taggerModel: DEFAULT_TAGGER_MODEL,
} as const;

// ============================================================================
// Schema
// ============================================================================

/**
 * The weight range only matters when rescaling is on, so the ordering
 * check is skipped for raw-frequency runs.
 */
export const RunConfigSchema = z
  .object({
    /** Lowest boost value assigned (rescaled output only) */
    rangeMin: z.number().int(),

    /** Highest boost value assigned (rescaled output only) */
    rangeMax: z.number().int(),

    /** Rescale counts onto [rangeMin, rangeMax]; false writes raw counts */
    rescale: z.boolean(),

    /** Model identifier passed through to the tagger */
    taggerModel: z.string().min(1),

    /** Explicit output path; derived from the input path when absent */
    outputPath: z.string().min(1).optional(),
  })
  .refine((data) => !data.rescale || data.rangeMin < data.rangeMax, {
    message: 'rangeMin must be less than rangeMax',
    path: ['rangeMax'],
  });

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Build a validated run config from partial overrides.
 *
 * @throws ConfigError listing every invalid field
 */
export function createRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  const result = RunConfigSchema.safeParse({ ...DEFAULT_RUN_CONFIG, ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid run configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
