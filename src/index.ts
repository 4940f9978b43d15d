/**
 * Hotword table generation for meeting documents.
 *
 * @example
 * ```typescript
 * import { FileTextSource, WinkTokenTagger, createRunConfig, runHotwordPipeline } from 'minutes-hotwords';
 *
 * const config = createRunConfig({ rangeMin: 1, rangeMax: 20 });
 * const result = await runHotwordPipeline(
 *   { inputPath: 'minutes.pdf', config },
 *   { source: new FileTextSource(), tagger: new WinkTokenTagger(config.taggerModel) }
 * );
 * ```
 *
 * @module minutes-hotwords
 */

export * from './pipeline/index.js';
export * from './schemas/index.js';
export * from './stages/index.js';
export * from './sources/index.js';
export * from './storage/index.js';
export { loadConfig, getConfig, resetConfig, type Config, type RunDefaults } from './config/index.js';
