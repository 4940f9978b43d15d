/**
 * Normalization Stage
 *
 * Case-folds candidate terms and rejects anything that is not purely
 * alphabetic. A rejected term is dropped whole; nothing is stripped or
 * repaired, so "O'Brien" and "I-35" produce no entry at all.
 *
 * @module stages/normalize
 */

/** One or more Unicode letters and nothing else */
const ALPHABETIC = /^\p{L}+$/u;

/**
 * Outcome of normalizing a batch of candidates.
 */
export interface NormalizationResult {
  /** Lower-cased terms, in candidate order */
  terms: string[];
  /** Candidates rejected as non-alphabetic, in candidate order */
  dropped: string[];
}

/**
 * Unicode-aware alphabetic test. Empty strings are not alphabetic.
 */
export function isAlphabetic(term: string): boolean {
  return ALPHABETIC.test(term);
}

/**
 * Normalize one candidate.
 *
 * The alphabetic test runs on the untransformed term. The lower-cased form
 * is checked again because a few letters lower-case into a letter plus a
 * combining mark (e.g. "İ").
 *
 * @returns the lower-cased term, or undefined when the term is dropped
 */
export function normalizeTerm(term: string): string | undefined {
  if (!isAlphabetic(term)) {
    return undefined;
  }
  const lowered = term.toLowerCase();
  return isAlphabetic(lowered) ? lowered : undefined;
}

/**
 * Normalize every candidate, splitting survivors from rejects.
 */
export function normalizeTerms(candidates: readonly string[]): NormalizationResult {
  const terms: string[] = [];
  const dropped: string[] = [];

  for (const candidate of candidates) {
    const normalized = normalizeTerm(candidate);
    if (normalized === undefined) {
      dropped.push(candidate);
    } else {
      terms.push(normalized);
    }
  }

  return { terms, dropped };
}
