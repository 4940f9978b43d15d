/**
 * Atomic File Operations for Storage Layer
 *
 * Writes go to a temp file beside the target and are renamed into place,
 * so a failed run never leaves a half-written table behind.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { OutputWriteError, describeError } from '../pipeline/errors.js';

/**
 * Write text to a file atomically (temp file + rename).
 * Creates the parent directory if it doesn't exist.
 *
 * @throws OutputWriteError if the destination cannot be written
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw new OutputWriteError(`Cannot write ${filePath}: ${describeError(error)}`, filePath, {
      cause: error,
    });
  }
}
