/**
 * File Text Source
 *
 * Reads the text of a minutes document from disk. PDFs go through
 * pdf-parse (pages in order); plain-text formats are read as UTF-8.
 *
 * @module sources/text-source
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { TextSource } from '../pipeline/types.js';
import { SourceUnavailableError, describeError, hasErrorCode } from '../pipeline/errors.js';

/** Extensions read verbatim as UTF-8 text */
export const TEXT_EXTENSIONS: readonly string[] = ['.txt', '.text', '.md'];

export const PDF_EXTENSION = '.pdf';

/**
 * Converts raw PDF bytes into text.
 */
export type PdfTextParser = (data: Buffer) => Promise<string>;

/**
 * Default PDF parser. pdf-parse is loaded on first use so plain-text
 * runs never pull it in.
 */
export async function parsePdfText(data: Buffer): Promise<string> {
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(data);
  return result.text;
}

/**
 * Whether a path has an extension this source can read.
 */
export function isSupportedDocument(documentPath: string): boolean {
  const ext = path.extname(documentPath).toLowerCase();
  return ext === PDF_EXTENSION || TEXT_EXTENSIONS.includes(ext);
}

export class FileTextSource implements TextSource {
  constructor(private readonly parsePdf: PdfTextParser = parsePdfText) {}

  /**
   * @throws SourceUnavailableError for missing, unreadable, unsupported or corrupt documents
   */
  async extract(documentPath: string): Promise<string> {
    const ext = path.extname(documentPath).toLowerCase();
    if (!isSupportedDocument(documentPath)) {
      throw new SourceUnavailableError(
        `Unsupported document type "${ext || '(none)'}" for ${documentPath}; ` +
          `expected ${[PDF_EXTENSION, ...TEXT_EXTENSIONS].join(', ')}`,
        documentPath
      );
    }

    let data: Buffer;
    try {
      data = await fs.readFile(documentPath);
    } catch (error) {
      const message = hasErrorCode(error, 'ENOENT')
        ? `Document not found: ${documentPath}`
        : `Cannot read document ${documentPath}: ${describeError(error)}`;
      throw new SourceUnavailableError(message, documentPath, { cause: error });
    }

    if (ext !== PDF_EXTENSION) {
      return data.toString('utf-8');
    }

    try {
      return await this.parsePdf(data);
    } catch (error) {
      throw new SourceUnavailableError(
        `Cannot extract text from ${documentPath}: ${describeError(error)}`,
        documentPath,
        { cause: error }
      );
    }
  }
}
