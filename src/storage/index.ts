/**
 * Storage Layer
 *
 * File-level concerns of the hotword table: path derivation, atomic
 * writes and the CSV layout.
 *
 * @module storage
 */

// Path derivation
export { TABLE_EXTENSION, deriveOutputPath, resolveOutputPath } from './paths.js';

// Atomic file operations
export { atomicWriteText } from './atomic.js';

// CSV fields and records
export { formatField, formatRow, formatRows, parseRecords, type CsvRecord } from './csv.js';

// Hotword tables
export {
  formatHotwordTable,
  parseHotwordTable,
  readHotwordTable,
  toWeightedTerms,
  type ParsedHotwordTable,
} from './hotword-table.js';
