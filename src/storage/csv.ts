/**
 * Comma-Separated Table Encoding
 *
 * Minimal quoting, matching what spreadsheet tools and most CSV readers
 * expect: a field is wrapped in double quotes only when it contains the
 * delimiter, a double quote or a line break, and inner quotes are doubled.
 *
 * @module storage/csv
 */

import { HotwordTableError } from '../pipeline/errors.js';

export const DELIMITER = ',';
const QUOTE = '"';

/**
 * A parsed record with the 1-based line it starts on.
 */
export interface CsvRecord {
  line: number;
  fields: string[];
}

// ============================================================================
// Encoding
// ============================================================================

export function needsQuoting(field: string): boolean {
  return field.includes(DELIMITER) || field.includes(QUOTE) || /[\r\n]/.test(field);
}

export function formatField(field: string): string {
  if (!needsQuoting(field)) {
    return field;
  }
  return QUOTE + field.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
}

export function formatRow(fields: readonly string[]): string {
  return fields.map(formatField).join(DELIMITER);
}

/**
 * Encode rows as a table, one `\n`-terminated line per row.
 */
export function formatRows(rows: ReadonlyArray<readonly string[]>): string {
  return rows.map((row) => formatRow(row) + '\n').join('');
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Split table content into records. Accepts `\n` and `\r\n` line endings
 * and quoted fields spanning several lines.
 *
 * @throws HotwordTableError on an unterminated quoted field
 */
export function parseRecords(content: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === QUOTE) {
        if (content[i + 1] === QUOTE) {
          field += QUOTE;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === QUOTE) {
      inQuotes = true;
    } else if (char === DELIMITER) {
      fields.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      fields.push(field);
      records.push({ line: recordLine, fields });
      fields = [];
      field = '';
      line++;
      recordLine = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new HotwordTableError('unterminated quoted field', recordLine);
  }

  // Final line without a trailing newline
  if (field !== '' || fields.length > 0) {
    fields.push(field);
    records.push({ line: recordLine, fields });
  }

  return records;
}
