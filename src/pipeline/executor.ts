/**
 * Pipeline Executor
 *
 * Runs the hotword pipeline for one document:
 *
 *   extract -> tag -> filter -> normalize -> count -> rescale -> serialize
 *
 * Stages run sequentially. Any failure aborts the run and propagates to the
 * caller; nothing is written unless every earlier stage succeeded.
 *
 * Key features:
 * - Explicit tagger initialization before tagging
 * - Per-stage timing and lifecycle callbacks
 * - Raw-frequency variant that skips rescaling
 *
 * @module pipeline/executor
 */

import * as path from 'node:path';
import type { FrequencyTable, TableVariant, WeightedTerms } from '../schemas/hotwords.js';
import { filterCandidates } from '../stages/filter.js';
import { normalizeTerms } from '../stages/normalize.js';
import { countFrequencies } from '../stages/frequency.js';
import { rescaleWeights } from '../stages/rescale.js';
import { serializeHotwords } from '../stages/serialize.js';
import { resolveOutputPath } from '../storage/paths.js';
import { TaggerUnavailableError } from './errors.js';
import type {
  PipelineDependencies,
  PipelineRequest,
  PipelineResult,
  PipelineStats,
  StageName,
  TokenTagger,
} from './types.js';

// ============================================================================
// Pipeline Class
// ============================================================================

/**
 * Hotword pipeline bound to a set of collaborators.
 *
 * @example
 * ```typescript
 * const pipeline = new HotwordPipeline({
 *   source: new FileTextSource(),
 *   tagger: new WinkTokenTagger(config.taggerModel),
 * });
 *
 * const result = await pipeline.run({ inputPath: 'minutes.pdf', config });
 * console.log(result.outputPath); // /abs/path/minutes.csv
 * ```
 */
export class HotwordPipeline {
  private perStage: Partial<Record<StageName, number>> = {};

  constructor(private readonly deps: PipelineDependencies) {}

  /**
   * Run the full pipeline and write the hotword table.
   *
   * @throws SourceUnavailableError, TaggerUnavailableError, EmptyInputError, OutputWriteError
   */
  async run(request: PipelineRequest): Promise<PipelineResult> {
    const { config } = request;
    const { logger } = this.deps;
    const startedAt = new Date().toISOString();
    const start = Date.now();
    this.perStage = {};

    const inputPath = path.resolve(request.inputPath);
    const outputPath = resolveOutputPath(inputPath, config.outputPath);
    const variant: TableVariant = config.rescale ? 'boost' : 'frequency';

    logger?.debug(`Input: ${inputPath}`);
    logger?.debug(`Output: ${outputPath} (${variant})`);

    const text = await this.stage('extract', () => this.deps.source.extract(inputPath));
    logger?.debug(`Extracted ${text.length} characters`);

    const tokens = await this.stage('tag', async () => {
      await ensureInitialized(this.deps.tagger);
      return this.deps.tagger.tag(text);
    });
    logger?.debug(`Tagged ${tokens.length} tokens`);

    const candidates = await this.stage('filter', async () => filterCandidates(tokens));
    const normalized = await this.stage('normalize', async () => normalizeTerms(candidates));
    if (normalized.dropped.length > 0) {
      logger?.debug(`Dropped non-alphabetic candidates: ${normalized.dropped.join(', ')}`);
    }

    const table = await this.stage('count', async () => countFrequencies(normalized.terms));
    if (table.size === 0) {
      logger?.warn(`No proper-noun candidates found in ${inputPath}`);
    }

    let weighted: WeightedTerms = table;
    if (config.rescale) {
      weighted = await this.stage('rescale', async () =>
        rescaleWeights(table, { min: config.rangeMin, max: config.rangeMax })
      );
    }

    const entries = await this.stage('serialize', () =>
      serializeHotwords(outputPath, weighted, variant)
    );
    logger?.info(`Wrote ${entries.length} hotwords to ${outputPath}`);

    const stats: PipelineStats = {
      tokens: tokens.length,
      candidates: candidates.length,
      normalized: normalized.terms.length,
      dropped: normalized.dropped.length,
      uniqueTerms: table.size,
    };

    return {
      inputPath,
      outputPath,
      variant,
      entries,
      stats,
      timing: {
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - start,
        perStage: { ...this.perStage },
      },
    };
  }

  /**
   * Extract, tag and filter only, returning the raw candidate phrases.
   */
  async listPhrases(inputPath: string): Promise<string[]> {
    this.perStage = {};
    const text = await this.stage('extract', () =>
      this.deps.source.extract(path.resolve(inputPath))
    );
    const tokens = await this.stage('tag', async () => {
      await ensureInitialized(this.deps.tagger);
      return this.deps.tagger.tag(text);
    });
    return this.stage('filter', async () => filterCandidates(tokens));
  }

  /**
   * Count normalized terms without rescaling or writing anything.
   */
  async countTerms(inputPath: string): Promise<FrequencyTable> {
    const candidates = await this.listPhrases(inputPath);
    const normalized = await this.stage('normalize', async () => normalizeTerms(candidates));
    return this.stage('count', async () => countFrequencies(normalized.terms));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async stage<T>(name: StageName, fn: () => Promise<T>): Promise<T> {
    const { callbacks } = this.deps;
    const stageStart = Date.now();
    callbacks?.onStageStart?.(name);

    try {
      const result = await fn();
      const durationMs = Date.now() - stageStart;
      this.perStage[name] = durationMs;
      callbacks?.onStageComplete?.(name, durationMs);
      return result;
    } catch (error) {
      this.perStage[name] = Date.now() - stageStart;
      if (error instanceof Error) {
        callbacks?.onStageError?.(name, error);
      }
      throw error;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run the tagger's initialization step and turn a not-ready outcome into
 * a TaggerUnavailableError.
 */
export async function ensureInitialized(tagger: TokenTagger): Promise<void> {
  const init = await tagger.initialize();
  if (!init.ready) {
    throw new TaggerUnavailableError(
      `Tagger model "${init.model}" is unavailable: ${init.reason}`,
      init.model
    );
  }
}

/**
 * Run the pipeline once with the given collaborators.
 */
export async function runHotwordPipeline(
  request: PipelineRequest,
  deps: PipelineDependencies
): Promise<PipelineResult> {
  return new HotwordPipeline(deps).run(request);
}
