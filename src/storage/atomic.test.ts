import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { atomicWriteText } from './atomic.js';
import { OutputWriteError } from '../pipeline/errors.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteText', () => {
    it('creates file with exact content', async () => {
      const filePath = path.join(tempDir, 'table.csv');

      await atomicWriteText(filePath, 'word,frequency\ndallas,2\n');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('word,frequency\ndallas,2\n');
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'table.csv');
      await atomicWriteText(filePath, 'x\n');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('x\n');
    });

    it('overwrites existing file', async () => {
      const filePath = path.join(tempDir, 'table.csv');
      await atomicWriteText(filePath, 'first\n');
      await atomicWriteText(filePath, 'second\n');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('second\n');
    });

    it('leaves no temp files behind', async () => {
      const filePath = path.join(tempDir, 'table.csv');
      await atomicWriteText(filePath, 'x\n');

      const files = await fs.readdir(tempDir);
      expect(files).toEqual(['table.csv']);
    });

    it('throws OutputWriteError when the parent path is a file', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const filePath = path.join(blocker, 'table.csv');

      const error = await atomicWriteText(filePath, 'x\n').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OutputWriteError);
      if (error instanceof OutputWriteError) {
        expect(error.outputPath).toBe(filePath);
        expect(error.code).toBe('OUTPUT_WRITE');
        expect(error.message.startsWith(`Cannot write ${filePath}: `)).toBe(true);
        expect(error.cause).toBeInstanceOf(Error);
      }
    });
  });
});
