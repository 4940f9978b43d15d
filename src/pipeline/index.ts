/**
 * Pipeline Infrastructure
 *
 * Sequential execution of the hotword stages, the contracts for the
 * injected text source and tagger, and the error classes every stage
 * reports through.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  type StageName,
  STAGE_ORDER,
  STAGE_LABELS,

  // Collaborators
  type Logger,
  type TextSource,
  type TokenTagger,
  type TaggerInitResult,

  // Requests and results
  type PipelineRequest,
  type PipelineDependencies,
  type PipelineCallbacks,
  type PipelineStats,
  type PipelineTiming,
  type PipelineResult,
} from './types.js';

// Execution
export { HotwordPipeline, runHotwordPipeline, ensureInitialized } from './executor.js';

// Errors
export {
  HotwordsError,
  SourceUnavailableError,
  TaggerUnavailableError,
  EmptyInputError,
  OutputWriteError,
  HotwordTableError,
  ConfigError,
  isHotwordsError,
  hasErrorCode,
  describeError,
  type HotwordsErrorCode,
} from './errors.js';
