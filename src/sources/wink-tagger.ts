/**
 * wink-nlp Token Tagger
 *
 * Tags text with a wink-nlp language model. The model is an npm package
 * named by `taggerModel` and is loaded by `initialize()`; nothing is
 * downloaded at run time, so a missing package reports not-ready with an
 * install hint instead.
 *
 * @module sources/wink-tagger
 */

import winkNLP, { type ItemToken } from 'wink-nlp';
import type { TaggerInitResult, TokenTagger } from '../pipeline/types.js';
import { TaggerUnavailableError, describeError } from '../pipeline/errors.js';
import { createToken, toPosClass, type Token } from '../schemas/token.js';
import { DEFAULT_TAGGER_MODEL } from '../schemas/run-config.js';

// ============================================================================
// Types
// ============================================================================

type WinkModel = Parameters<typeof winkNLP>[0];
type WinkInstance = ReturnType<typeof winkNLP>;

/**
 * Resolves a model package name to its exported model.
 */
export type ModelLoader = (name: string) => Promise<unknown>;

/**
 * The wink token properties the tagger reads.
 */
export interface WinkTokenFields {
  /** its.value */
  value: string;
  /** its.pos */
  pos: string;
  /** its.stopWordFlag */
  stopWord: boolean;
  /** its.type, e.g. "word", "punctuation", "number" */
  type: string;
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * wink-nlp rejects any model without a `core` function.
 */
function isWinkModel(value: unknown): value is WinkModel {
  return isRecord(value) && typeof value.core === 'function';
}

/**
 * Default loader: import the package and unwrap its default export.
 */
export async function importModel(name: string): Promise<unknown> {
  const mod: unknown = await import(name);
  return isRecord(mod) && 'default' in mod ? mod.default : mod;
}

/**
 * Convert wink token properties into a Token.
 */
export function toToken(fields: WinkTokenFields): Token {
  const posClass = toPosClass(fields.pos);
  return createToken(fields.value, posClass, {
    isStop: fields.stopWord,
    isPunctuation: fields.type === 'punctuation' || posClass === 'PUNCT',
  });
}

// ============================================================================
// Tagger
// ============================================================================

export class WinkTokenTagger implements TokenTagger {
  private nlp: WinkInstance | undefined;

  constructor(
    readonly model: string = DEFAULT_TAGGER_MODEL,
    private readonly loadModel: ModelLoader = importModel
  ) {}

  /**
   * Load the model package and build the wink pipeline. Safe to call more
   * than once; later calls reuse the loaded instance.
   */
  async initialize(): Promise<TaggerInitResult> {
    if (this.nlp) {
      return { ready: true, model: this.model };
    }

    let loaded: unknown;
    try {
      loaded = await this.loadModel(this.model);
    } catch (error) {
      return {
        ready: false,
        model: this.model,
        reason: `cannot load model package (${describeError(error)}); install it with "npm install ${this.model}"`,
      };
    }

    if (!isWinkModel(loaded)) {
      return {
        ready: false,
        model: this.model,
        reason: 'package does not export a wink-nlp language model',
      };
    }

    try {
      this.nlp = winkNLP(loaded);
    } catch (error) {
      return { ready: false, model: this.model, reason: describeError(error) };
    }

    return { ready: true, model: this.model };
  }

  isReady(): boolean {
    return this.nlp !== undefined;
  }

  /**
   * @throws TaggerUnavailableError if initialize() has not succeeded
   */
  async tag(text: string): Promise<readonly Token[]> {
    const nlp = this.nlp;
    if (!nlp) {
      throw new TaggerUnavailableError(
        `Tagger model "${this.model}" used before initialization`,
        this.model
      );
    }

    const its = nlp.its;
    const tokens: Token[] = [];
    nlp
      .readDoc(text)
      .tokens()
      .each((token: ItemToken) => {
        tokens.push(
          toToken({
            value: String(token.out(its.value)),
            pos: String(token.out(its.pos)),
            stopWord: Boolean(token.out(its.stopWordFlag)),
            type: String(token.out(its.type)),
          })
        );
      });

    return tokens;
  }
}
