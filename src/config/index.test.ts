/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getConfig, loadConfig, resetConfig } from './index.js';
import { ConfigError } from '../pipeline/errors.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should fall back to built-in defaults', () => {
      const config = loadConfig({});

      expect(config.defaults).toEqual({
        rangeMin: 1,
        rangeMax: 20,
        rescale: true,
        taggerModel: 'wink-eng-lite-web-model',
      });
      expect(config.nodeEnv).toBe('development');
      expect(config.isDevelopment).toBe(true);
    });

    it('should read run defaults from the environment', () => {
      const config = loadConfig({
        HOTWORDS_RANGE_MIN: '5',
        HOTWORDS_RANGE_MAX: ' 50 ',
        HOTWORDS_RESCALE: 'No',
        HOTWORDS_TAGGER_MODEL: 'custom-model',
      });

      expect(config.defaults).toEqual({
        rangeMin: 5,
        rangeMax: 50,
        rescale: false,
        taggerModel: 'custom-model',
      });
    });

    it('should accept every boolean spelling', () => {
      expect(loadConfig({ HOTWORDS_RESCALE: '1' }).defaults.rescale).toBe(true);
      expect(loadConfig({ HOTWORDS_RESCALE: 'yes' }).defaults.rescale).toBe(true);
      expect(loadConfig({ HOTWORDS_RESCALE: 'FALSE' }).defaults.rescale).toBe(false);
      expect(loadConfig({ HOTWORDS_RESCALE: '0' }).defaults.rescale).toBe(false);
    });

    it('should treat empty values as unset', () => {
      expect(loadConfig({ HOTWORDS_RANGE_MIN: '' }).defaults.rangeMin).toBe(1);
    });

    it('should have environment flags', () => {
      const config = loadConfig({ NODE_ENV: 'test' });
      expect(config.isTest).toBe(true);
      expect(config.isProduction).toBe(false);
      expect(config.isDevelopment).toBe(false);
    });

    it('should throw ConfigError for invalid values', () => {
      expect(() => loadConfig({ HOTWORDS_RANGE_MIN: 'ten' })).toThrow(ConfigError);
      expect(() => loadConfig({ HOTWORDS_RANGE_MIN: 'ten' })).toThrow(
        'Invalid environment variables: HOTWORDS_RANGE_MIN: must be an integer'
      );
      expect(() => loadConfig({ HOTWORDS_RESCALE: 'maybe' })).toThrow(ConfigError);
    });

    it('should return a frozen object', () => {
      const config = loadConfig({});
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.defaults)).toBe(true);
    });
  });

  describe('getConfig', () => {
    const original = process.env.HOTWORDS_RANGE_MAX;

    beforeEach(() => {
      resetConfig();
    });

    afterEach(() => {
      if (original === undefined) {
        delete process.env.HOTWORDS_RANGE_MAX;
      } else {
        process.env.HOTWORDS_RANGE_MAX = original;
      }
      resetConfig();
    });

    it('should cache until reset', () => {
      process.env.HOTWORDS_RANGE_MAX = '30';
      const first = getConfig();
      process.env.HOTWORDS_RANGE_MAX = '40';

      expect(getConfig()).toBe(first);
      expect(first.defaults.rangeMax).toBe(30);

      resetConfig();
      expect(getConfig().defaults.rangeMax).toBe(40);
    });
  });
});
