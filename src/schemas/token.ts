/**
 * Token Schema
 *
 * A token is one language unit produced by the tagger: surface text plus
 * a coarse part-of-speech class and stop-word / punctuation flags.
 * Taggers validate their output against this schema before handing it
 * to the candidate filter.
 *
 * @module schemas/token
 */

import { z } from 'zod';

// ============================================================================
// Part of Speech
// ============================================================================

/**
 * Coarse part-of-speech classes (Universal Dependencies tag set).
 * `SPACE` is emitted by some taggers for runs of whitespace.
 */
export const PosClassSchema = z.enum([
  'ADJ',
  'ADP',
  'ADV',
  'AUX',
  'CCONJ',
  'DET',
  'INTJ',
  'NOUN',
  'NUM',
  'PART',
  'PRON',
  'PROPN',
  'PUNCT',
  'SCONJ',
  'SYM',
  'VERB',
  'X',
  'SPACE',
]);

export type PosClass = z.infer<typeof PosClassSchema>;

/** The class that marks a proper-noun candidate */
export const PROPER_NOUN: PosClass = 'PROPN';

/**
 * Map an arbitrary tag string onto a PosClass.
 * Unknown tags collapse to `X`.
 */
export function toPosClass(tag: string): PosClass {
  const parsed = PosClassSchema.safeParse(tag.toUpperCase());
  return parsed.success ? parsed.data : 'X';
}

// ============================================================================
// Token
// ============================================================================

export const TokenSchema = z
  .object({
    /** Original surface text, casing and punctuation intact */
    text: z.string(),
    posClass: PosClassSchema,
    isStop: z.boolean(),
    isPunctuation: z.boolean(),
  })
  .readonly();

export type Token = z.infer<typeof TokenSchema>;

/**
 * Build a token, filling unset flags with `false`.
 */
export function createToken(
  text: string,
  posClass: PosClass,
  flags: { isStop?: boolean; isPunctuation?: boolean } = {}
): Token {
  return TokenSchema.parse({
    text,
    posClass,
    isStop: flags.isStop ?? false,
    isPunctuation: flags.isPunctuation ?? false,
  });
}
