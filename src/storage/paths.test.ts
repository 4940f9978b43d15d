/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import * as path from 'node:path';
import { TABLE_EXTENSION, deriveOutputPath, resolveOutputPath } from './paths.js';

describe('storage/paths', () => {
  describe('deriveOutputPath', () => {
    it('replaces the extension in the same directory', () => {
      expect(deriveOutputPath('/data/minutes/2021-04-06.pdf')).toBe('/data/minutes/2021-04-06.csv');
    });

    it('appends the extension when the input has none', () => {
      expect(deriveOutputPath('agenda')).toBe('agenda.csv');
    });

    it('replaces only the last extension', () => {
      expect(deriveOutputPath('/data/minutes.final.txt')).toBe('/data/minutes.final.csv');
    });

    it('accepts a custom extension', () => {
      expect(deriveOutputPath('/data/minutes.pdf', '.tsv')).toBe('/data/minutes.tsv');
    });

    it('uses .csv by default', () => {
      expect(TABLE_EXTENSION).toBe('.csv');
    });

    it('throws on empty input', () => {
      expect(() => deriveOutputPath('')).toThrow('inputPath is required');
      expect(() => deriveOutputPath('   ')).toThrow('inputPath is required');
    });
  });

  describe('resolveOutputPath', () => {
    it('derives an absolute path from a relative input', () => {
      expect(resolveOutputPath('minutes.pdf')).toBe(path.resolve('minutes.csv'));
    });

    it('prefers an explicit path, made absolute', () => {
      expect(resolveOutputPath('/data/minutes.pdf', 'out/hotwords.csv')).toBe(
        path.resolve('out/hotwords.csv')
      );
    });
  });
});
