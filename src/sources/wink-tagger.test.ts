import { describe, it, expect, jest } from '@jest/globals';
import { WinkTokenTagger, toToken } from './wink-tagger.js';
import { TaggerUnavailableError } from '../pipeline/errors.js';
import { filterCandidates } from '../stages/filter.js';

describe('toToken', () => {
  it('maps wink fields onto a token', () => {
    expect(toToken({ value: 'Dallas', pos: 'PROPN', stopWord: false, type: 'word' })).toEqual({
      text: 'Dallas',
      posClass: 'PROPN',
      isStop: false,
      isPunctuation: false,
    });
  });

  it('flags punctuation by type or tag', () => {
    expect(toToken({ value: ',', pos: 'PUNCT', stopWord: false, type: 'word' }).isPunctuation).toBe(true);
    expect(toToken({ value: '-', pos: 'SYM', stopWord: false, type: 'punctuation' }).isPunctuation).toBe(
      true
    );
  });

  it('keeps the stop-word flag and collapses unknown tags', () => {
    const token = toToken({ value: 'the', pos: 'det', stopWord: true, type: 'word' });
    expect(token.posClass).toBe('DET');
    expect(token.isStop).toBe(true);
    expect(toToken({ value: '@x', pos: 'MENTION', stopWord: false, type: 'mention' }).posClass).toBe('X');
  });
});

describe('WinkTokenTagger', () => {
  it('reports not ready when the model package cannot be loaded', async () => {
    const loader = jest.fn(async (_name: string): Promise<unknown> => {
      throw new Error("Cannot find module 'missing-model'");
    });
    const tagger = new WinkTokenTagger('missing-model', loader);

    const result = await tagger.initialize();

    expect(result).toEqual({
      ready: false,
      model: 'missing-model',
      reason:
        'cannot load model package (Cannot find module \'missing-model\'); install it with "npm install missing-model"',
    });
    expect(loader).toHaveBeenCalledWith('missing-model');
    expect(tagger.isReady()).toBe(false);
  });

  it('reports not ready when the package is not a language model', async () => {
    const tagger = new WinkTokenTagger('lodash', async () => ({ map: () => [] }));

    const result = await tagger.initialize();

    expect(result).toEqual({
      ready: false,
      model: 'lodash',
      reason: 'package does not export a wink-nlp language model',
    });
  });

  it('refuses to tag before initialization', async () => {
    const tagger = new WinkTokenTagger('missing-model', async () => undefined);

    await expect(tagger.tag('Dallas')).rejects.toThrow(TaggerUnavailableError);
    await expect(tagger.tag('Dallas')).rejects.toThrow(
      'Tagger model "missing-model" used before initialization'
    );
  });

  it('tags text with the default model', async () => {
    const tagger = new WinkTokenTagger();

    const init = await tagger.initialize();
    expect(init).toEqual({ ready: true, model: 'wink-eng-lite-web-model' });
    expect(await tagger.initialize()).toEqual(init);

    const tokens = await tagger.tag('Dallas voted.');

    expect(tokens.map((token) => token.text)).toEqual(['Dallas', 'voted', '.']);
    expect(tokens[2].isPunctuation).toBe(true);
    expect(tokens[2].posClass).toBe('PUNCT');
  });

  it('feeds proper nouns from the default model to the candidate filter', async () => {
    const tagger = new WinkTokenTagger();
    await tagger.initialize();

    const candidates = filterCandidates(await tagger.tag("O'Brien met DART in McKinney."));

    expect(candidates).toContain('McKinney');
    expect(candidates).not.toContain('DART');
    expect(candidates).not.toContain('met');
  });
});
