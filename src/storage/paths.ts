/**
 * Path Resolution Utilities
 *
 * The hotword table lands beside its source document:
 *
 * ```
 * minutes/
 * ├── 2021-04-06.pdf      # input
 * └── 2021-04-06.csv      # output
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';

/** Extension of written hotword tables */
export const TABLE_EXTENSION = '.csv';

/**
 * Derive the output table path from an input document path: same
 * directory, same base name, extension replaced.
 *
 * @example
 * ```typescript
 * deriveOutputPath('/data/minutes/2021-04-06.pdf'); // '/data/minutes/2021-04-06.csv'
 * deriveOutputPath('agenda');                       // 'agenda.csv'
 * ```
 */
export function deriveOutputPath(inputPath: string, extension: string = TABLE_EXTENSION): string {
  if (!inputPath || inputPath.trim() === '') {
    throw new Error('inputPath is required');
  }
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, name + extension);
}

/**
 * Resolve the table path for a run: an explicit path wins, otherwise it
 * is derived from the absolute input path.
 */
export function resolveOutputPath(inputPath: string, explicitPath?: string): string {
  if (explicitPath) {
    return path.resolve(explicitPath);
  }
  return deriveOutputPath(path.resolve(inputPath));
}
