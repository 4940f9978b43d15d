/**
 * Tests for term normalization
 */

import { describe, it, expect } from '@jest/globals';
import { isAlphabetic, normalizeTerm, normalizeTerms } from './normalize.js';

describe('isAlphabetic', () => {
  it('accepts letters from any script', () => {
    expect(isAlphabetic('Dallas')).toBe(true);
    expect(isAlphabetic('Zürich')).toBe(true);
    expect(isAlphabetic('Москва')).toBe(true);
  });

  it('rejects digits, punctuation, whitespace and empty text', () => {
    expect(isAlphabetic('I35')).toBe(false);
    expect(isAlphabetic("O'Brien")).toBe(false);
    expect(isAlphabetic('Fort Worth')).toBe(false);
    expect(isAlphabetic('')).toBe(false);
  });
});

describe('normalizeTerm', () => {
  it('lower-cases alphabetic terms', () => {
    expect(normalizeTerm('Dallas')).toBe('dallas');
    expect(normalizeTerm('McKinney')).toBe('mckinney');
    expect(normalizeTerm('Zürich')).toBe('zürich');
  });

  it('drops non-alphabetic terms whole instead of stripping them', () => {
    expect(normalizeTerm("O'Brien")).toBeUndefined();
    expect(normalizeTerm('I-35')).toBeUndefined();
    expect(normalizeTerm('Dallas.')).toBeUndefined();
  });

  it('drops terms whose lower-case form gains a combining mark', () => {
    // "İ" lower-cases to "i" followed by U+0307
    expect(normalizeTerm('İstanbul')).toBeUndefined();
  });
});

describe('normalizeTerms', () => {
  it('splits survivors from dropped candidates, keeping order', () => {
    const result = normalizeTerms(['Dallas', "O'Brien", 'Park', 'I-35', 'Dallas']);

    expect(result.terms).toEqual(['dallas', 'park', 'dallas']);
    expect(result.dropped).toEqual(["O'Brien", 'I-35']);
  });

  it('produces only lower-case alphabetic terms', () => {
    const { terms } = normalizeTerms(['Ann', 'ARLINGTON', 'Grand-Prairie', 'Irving2']);

    expect(terms).toEqual(['ann', 'arlington']);
    for (const term of terms) {
      expect(term).toBe(term.toLowerCase());
      expect(isAlphabetic(term)).toBe(true);
    }
  });

  it('handles an empty list', () => {
    expect(normalizeTerms([])).toEqual({ terms: [], dropped: [] });
  });
});
