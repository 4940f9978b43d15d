/**
 * Pipeline Type Definitions
 *
 * Contracts between the hotword pipeline, its injected collaborators
 * (text source and token tagger) and its callers.
 *
 * @module pipeline/types
 */

import type { HotwordEntry, TableVariant, Token } from '../schemas/index.js';
import type { RunConfig } from '../schemas/run-config.js';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * Stages in execution order.
 */
export type StageName =
  | 'extract'
  | 'tag'
  | 'filter'
  | 'normalize'
  | 'count'
  | 'rescale'
  | 'serialize';

export const STAGE_ORDER: readonly StageName[] = [
  'extract',
  'tag',
  'filter',
  'normalize',
  'count',
  'rescale',
  'serialize',
] as const;

/**
 * Human-readable labels for progress output.
 */
export const STAGE_LABELS: Record<StageName, string> = {
  extract: 'Extract text',
  tag: 'Tag tokens',
  filter: 'Filter candidates',
  normalize: 'Normalize terms',
  count: 'Count frequencies',
  rescale: 'Rescale weights',
  serialize: 'Write table',
};

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Supplies the full text of one input document.
 */
export interface TextSource {
  /**
   * @throws SourceUnavailableError when the document cannot be read
   */
  extract(documentPath: string): Promise<string>;
}

/**
 * Outcome of a tagger's explicit initialization step.
 */
export type TaggerInitResult =
  | { ready: true; model: string }
  | { ready: false; model: string; reason: string };

/**
 * Splits text into tagged tokens.
 *
 * `initialize()` must succeed before `tag()` is called; the pipeline
 * calls it once per run and fails the run if it reports not ready.
 */
export interface TokenTagger {
  /** Model identifier, passed through from configuration */
  readonly model: string;

  initialize(): Promise<TaggerInitResult>;

  /**
   * @throws TaggerUnavailableError if called before a successful initialize()
   */
  tag(text: string): Promise<readonly Token[]>;
}

// ============================================================================
// Requests and Results
// ============================================================================

/**
 * Input to a single pipeline run.
 */
export interface PipelineRequest {
  /** Document to build hotwords from */
  inputPath: string;

  /** Validated run configuration */
  config: RunConfig;
}

/**
 * Collaborators injected into a run.
 */
export interface PipelineDependencies {
  source: TextSource;
  tagger: TokenTagger;
  logger?: Logger;
  callbacks?: PipelineCallbacks;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface PipelineCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stage: StageName) => void;
  /** Called when a stage completes successfully */
  onStageComplete?: (stage: StageName, durationMs: number) => void;
  /** Called when a stage fails; the run aborts afterwards */
  onStageError?: (stage: StageName, error: Error) => void;
}

/**
 * Counts gathered while the run progresses.
 */
export interface PipelineStats {
  /** Tokens returned by the tagger */
  tokens: number;
  /** Proper-noun candidates that passed the filter */
  candidates: number;
  /** Candidates that survived normalization */
  normalized: number;
  /** Candidates rejected by normalization */
  dropped: number;
  /** Distinct normalized terms */
  uniqueTerms: number;
}

/**
 * Timing information for a run.
 */
export interface PipelineTiming {
  /** ISO8601 timestamp when the run started */
  startedAt: string;
  /** ISO8601 timestamp when the run completed */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per executed stage in milliseconds */
  perStage: Partial<Record<StageName, number>>;
}

/**
 * Result of a completed run.
 */
export interface PipelineResult {
  inputPath: string;
  outputPath: string;
  variant: TableVariant;
  /** Rows written to the table, in file order */
  entries: HotwordEntry[];
  stats: PipelineStats;
  timing: PipelineTiming;
}
