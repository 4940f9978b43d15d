import { describe, it, expect } from '@jest/globals';
import { countBounds, countFrequencies } from './frequency.js';

describe('countFrequencies', () => {
  it('counts occurrences in first-occurrence order', () => {
    const table = countFrequencies(['dallas', 'dallas', 'park', 'park', 'park', 'city']);

    expect(Array.from(table)).toEqual([
      ['dallas', 2],
      ['park', 3],
      ['city', 1],
    ]);
  });

  it('sums to the number of input terms', () => {
    const terms = ['plano', 'frisco', 'plano', 'allen', 'plano'];
    const total = Array.from(countFrequencies(terms).values()).reduce((a, b) => a + b, 0);

    expect(total).toBe(terms.length);
  });

  it('accepts any iterable', () => {
    const table = countFrequencies(new Set(['garland', 'mesquite']));
    expect(table.get('garland')).toBe(1);
    expect(table.get('mesquite')).toBe(1);
  });

  it('returns an empty table for empty input', () => {
    expect(countFrequencies([]).size).toBe(0);
  });
});

describe('countBounds', () => {
  it('returns the lowest and highest counts', () => {
    expect(countBounds(new Map([['a', 4], ['b', 1], ['c', 9]]))).toEqual({ min: 1, max: 9 });
  });

  it('returns equal bounds for a single term', () => {
    expect(countBounds(new Map([['dallas', 3]]))).toEqual({ min: 3, max: 3 });
  });

  it('returns undefined for an empty table', () => {
    expect(countBounds(new Map())).toBeUndefined();
  });
});
