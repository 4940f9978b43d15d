/**
 * Configuration Module
 *
 * Loads and validates environment variables that set the defaults for a
 * hotword run. Uses Zod for runtime validation; command-line flags
 * override anything set here.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../pipeline/errors.js';
import { DEFAULT_RUN_CONFIG, type RunConfig } from '../schemas/run-config.js';

/**
 * Integer given as a string, e.g. "20".
 */
const IntegerStringSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform((value) => parseInt(value, 10));

/**
 * Boolean given as a string: true/false, 1/0, yes/no.
 */
const BooleanStringSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

// Environment schema with optional values and defaults
const envSchema = z.object({
  HOTWORDS_RANGE_MIN: IntegerStringSchema.optional(),
  HOTWORDS_RANGE_MAX: IntegerStringSchema.optional(),
  HOTWORDS_RESCALE: BooleanStringSchema.optional(),
  HOTWORDS_TAGGER_MODEL: z.string().trim().min(1).optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type EnvInput = Record<string, string | undefined>;

/**
 * Parse an environment into the application configuration.
 *
 * Empty strings are treated as unset.
 *
 * @throws ConfigError listing each invalid variable
 */
export function loadConfig(env: EnvInput = process.env) {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parseResult = envSchema.safeParse(present);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }

  const parsed = parseResult.data;

  return Object.freeze({
    // Environment
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isDevelopment: parsed.NODE_ENV === 'development',
    isTest: parsed.NODE_ENV === 'test',

    // Run defaults (before command-line overrides)
    defaults: Object.freeze({
      rangeMin: parsed.HOTWORDS_RANGE_MIN ?? DEFAULT_RUN_CONFIG.rangeMin,
      rangeMax: parsed.HOTWORDS_RANGE_MAX ?? DEFAULT_RUN_CONFIG.rangeMax,
      rescale: parsed.HOTWORDS_RESCALE ?? DEFAULT_RUN_CONFIG.rescale,
      taggerModel: parsed.HOTWORDS_TAGGER_MODEL ?? DEFAULT_RUN_CONFIG.taggerModel,
    } satisfies Omit<RunConfig, 'outputPath'>),
  });
}

export type Config = ReturnType<typeof loadConfig>;
export type RunDefaults = Config['defaults'];

let cached: Config | undefined;

/**
 * Application configuration singleton, read from process.env on first use.
 */
export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}

/**
 * Drop the cached singleton so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
  cached = undefined;
}
