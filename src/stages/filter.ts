/**
 * Candidate Filter Stage
 *
 * Selects proper-noun tokens worth boosting. A token qualifies when it is
 * tagged PROPN, is neither a stop word nor punctuation, has text, and is
 * not written entirely in upper case (those are treated as acronyms or
 * headings).
 *
 * @module stages/filter
 */

import type { Token } from '../schemas/token.js';
import { PROPER_NOUN } from '../schemas/token.js';
import type { TokenTagger } from '../pipeline/types.js';

/**
 * True when the text has at least one cased character and every cased
 * character is upper case. "NASA" and "A1" qualify; "1990" and "McKinney" do not.
 */
export function isFullyUpperCase(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

/**
 * Check a single token against every candidate rule.
 */
export function isCandidate(token: Token): boolean {
  return (
    token.posClass === PROPER_NOUN &&
    token.text.length > 0 &&
    !isFullyUpperCase(token.text) &&
    !token.isStop &&
    !token.isPunctuation
  );
}

/**
 * Keep the text of every qualifying token, in input order.
 */
export function filterCandidates(tokens: readonly Token[]): string[] {
  return tokens.filter(isCandidate).map((token) => token.text);
}

/**
 * Tag `text` and return the raw candidate phrases, duplicates and original
 * casing kept. The tagger must already be initialized.
 */
export async function listCandidatePhrases(text: string, tagger: TokenTagger): Promise<string[]> {
  const tokens = await tagger.tag(text);
  return filterCandidates(tokens);
}
