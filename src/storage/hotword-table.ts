/**
 * Hotword Table Format
 *
 * Reads and writes the two-column table consumed by speech recognizers:
 *
 * ```
 * word,boost_value
 * dallas,10.5
 * park,20
 * ```
 *
 * The raw-count variant uses `frequency` as the value column. Values are
 * written with the default number-to-string conversion.
 *
 * @module storage/hotword-table
 */

import * as fs from 'node:fs/promises';
import {
  VALUE_COLUMNS,
  WORD_COLUMN,
  variantForColumn,
  type HotwordEntry,
  type TableVariant,
  type WeightedTerms,
} from '../schemas/hotwords.js';
import {
  HotwordTableError,
  SourceUnavailableError,
  describeError,
  hasErrorCode,
} from '../pipeline/errors.js';
import { formatRows, parseRecords } from './csv.js';

/** Decimal or exponent notation only */
const DECIMAL_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * A table read back from disk.
 */
export interface ParsedHotwordTable {
  variant: TableVariant;
  entries: HotwordEntry[];
}

/**
 * Encode weighted terms as a table, header first, rows in map order.
 */
export function formatHotwordTable(weighted: WeightedTerms, variant: TableVariant): string {
  const header = [WORD_COLUMN, VALUE_COLUMNS[variant]];
  const rows = Array.from(weighted, ([word, value]) => [word, String(value)]);
  return formatRows([header, ...rows]);
}

/**
 * Decode a hotword table.
 *
 * @throws HotwordTableError naming the offending line
 */
export function parseHotwordTable(content: string): ParsedHotwordTable {
  const records = parseRecords(content.replace(/^\uFEFF/, '')).filter(
    (record) => !(record.fields.length === 1 && record.fields[0].trim() === '')
  );

  const [header, ...rows] = records;
  if (!header) {
    throw new HotwordTableError('missing header row', 1);
  }

  const headerError = new HotwordTableError(
    `expected header "${WORD_COLUMN},${VALUE_COLUMNS.boost}" or "${WORD_COLUMN},${VALUE_COLUMNS.frequency}"`,
    header.line
  );
  if (header.fields.length !== 2 || header.fields[0] !== WORD_COLUMN) {
    throw headerError;
  }
  const variant = variantForColumn(header.fields[1]);
  if (!variant) {
    throw headerError;
  }

  const entries = rows.map((record): HotwordEntry => {
    if (record.fields.length !== 2) {
      throw new HotwordTableError(`expected 2 fields, found ${record.fields.length}`, record.line);
    }
    const [word, rawValue] = record.fields;
    if (word === '') {
      throw new HotwordTableError('empty word', record.line);
    }
    const value = DECIMAL_PATTERN.test(rawValue) ? Number(rawValue) : Number.NaN;
    if (!Number.isFinite(value)) {
      throw new HotwordTableError(`"${rawValue}" is not a number`, record.line);
    }
    return { word, value };
  });

  return { variant, entries };
}

/**
 * Read and decode a hotword table file.
 *
 * @throws SourceUnavailableError if the file cannot be read
 * @throws HotwordTableError if its content is malformed
 */
export async function readHotwordTable(filePath: string): Promise<ParsedHotwordTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = hasErrorCode(error, 'ENOENT') ? 'file not found' : describeError(error);
    throw new SourceUnavailableError(`Cannot read hotword table ${filePath}: ${reason}`, filePath, {
      cause: error,
    });
  }
  return parseHotwordTable(content);
}

/**
 * Rebuild a weighted-term map from table rows. Later duplicates win.
 */
export function toWeightedTerms(entries: readonly HotwordEntry[]): WeightedTerms {
  return new Map(entries.map((entry) => [entry.word, entry.value]));
}
