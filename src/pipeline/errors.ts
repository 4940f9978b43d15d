/**
 * Pipeline Errors
 *
 * Every failure in the hotword pipeline surfaces as one of these classes.
 * Each carries a stable `code` so the CLI can map it to an exit code
 * without matching on messages.
 *
 * @module pipeline/errors
 */

/**
 * Stable error codes, one per failure class.
 */
export type HotwordsErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'TAGGER_UNAVAILABLE'
  | 'EMPTY_INPUT'
  | 'OUTPUT_WRITE'
  | 'INVALID_TABLE'
  | 'INVALID_CONFIG';

/**
 * Base class for all domain errors raised by this package.
 */
export class HotwordsError extends Error {
  constructor(
    message: string,
    public readonly code: HotwordsErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HotwordsError';
  }
}

/**
 * The text source could not produce text for the given document
 * (missing, unreadable, unsupported or corrupt).
 */
export class SourceUnavailableError extends HotwordsError {
  constructor(
    message: string,
    public readonly documentPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'SOURCE_UNAVAILABLE', options);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * The token tagger could not be initialized, or was used before it was.
 */
export class TaggerUnavailableError extends HotwordsError {
  constructor(
    message: string,
    public readonly model: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TAGGER_UNAVAILABLE', options);
    this.name = 'TaggerUnavailableError';
  }
}

/**
 * No proper-noun candidates survived filtering and normalization,
 * so no weight range can be derived.
 */
export class EmptyInputError extends HotwordsError {
  constructor(message = 'No proper-noun candidates found; cannot rescale an empty frequency table') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

/**
 * The output destination could not be opened or written.
 */
export class OutputWriteError extends HotwordsError {
  constructor(
    message: string,
    public readonly outputPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'OUTPUT_WRITE', options);
    this.name = 'OutputWriteError';
  }
}

/**
 * A hotword table file did not match the expected layout.
 */
export class HotwordTableError extends HotwordsError {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`Line ${line}: ${message}`, 'INVALID_TABLE');
    this.name = 'HotwordTableError';
  }
}

/**
 * Environment variables or command options failed validation.
 */
export class ConfigError extends HotwordsError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Type guard for any error raised by this package.
 */
export function isHotwordsError(error: unknown): error is HotwordsError {
  return error instanceof HotwordsError;
}

/**
 * Check a Node.js system error's `code` (e.g. ENOENT) without casting.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Message of an Error, or the stringified value for anything else thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
