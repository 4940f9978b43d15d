import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileTextSource, isSupportedDocument } from './text-source.js';
import { SourceUnavailableError } from '../pipeline/errors.js';

describe('FileTextSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'text-source-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads text documents as UTF-8', async () => {
    const filePath = path.join(tempDir, 'minutes.txt');
    await fs.writeFile(filePath, 'Council met in Zürich Hall.', 'utf-8');

    const text = await new FileTextSource().extract(filePath);

    expect(text).toBe('Council met in Zürich Hall.');
  });

  it('accepts upper-case extensions', async () => {
    const filePath = path.join(tempDir, 'AGENDA.MD');
    await fs.writeFile(filePath, '# Agenda');

    expect(await new FileTextSource().extract(filePath)).toBe('# Agenda');
  });

  it('passes PDF bytes to the parser', async () => {
    const filePath = path.join(tempDir, 'minutes.pdf');
    await fs.writeFile(filePath, 'fake pdf bytes');
    const parsePdf = jest.fn(async (data: Buffer) => `parsed ${data.length} bytes`);

    const text = await new FileTextSource(parsePdf).extract(filePath);

    expect(text).toBe('parsed 14 bytes');
    expect(parsePdf).toHaveBeenCalledTimes(1);
  });

  it('wraps parser failures in SourceUnavailableError', async () => {
    const filePath = path.join(tempDir, 'broken.pdf');
    await fs.writeFile(filePath, 'not a pdf');
    const parsePdf = async (): Promise<string> => {
      throw new Error('Invalid PDF structure');
    };

    await expect(new FileTextSource(parsePdf).extract(filePath)).rejects.toThrow(
      `Cannot extract text from ${filePath}: Invalid PDF structure`
    );
  });

  it('rejects missing documents', async () => {
    const filePath = path.join(tempDir, 'missing.txt');

    const error = await new FileTextSource().extract(filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    if (error instanceof SourceUnavailableError) {
      expect(error.message).toBe(`Document not found: ${filePath}`);
      expect(error.documentPath).toBe(filePath);
    }
  });

  it('rejects unsupported types without reading them', async () => {
    const filePath = path.join(tempDir, 'minutes.docx');

    await expect(new FileTextSource().extract(filePath)).rejects.toThrow(
      `Unsupported document type ".docx" for ${filePath}; expected .pdf, .txt, .text, .md`
    );
  });

  it('names missing extensions', async () => {
    const filePath = path.join(tempDir, 'minutes');

    await expect(new FileTextSource().extract(filePath)).rejects.toThrow(
      `Unsupported document type "(none)" for ${filePath}`
    );
  });
});

describe('isSupportedDocument', () => {
  it('accepts PDF and text formats', () => {
    expect(isSupportedDocument('a.pdf')).toBe(true);
    expect(isSupportedDocument('a.txt')).toBe(true);
    expect(isSupportedDocument('a.text')).toBe(true);
    expect(isSupportedDocument('a.md')).toBe(true);
  });

  it('rejects other formats', () => {
    expect(isSupportedDocument('a.docx')).toBe(false);
    expect(isSupportedDocument('a')).toBe(false);
  });
});
