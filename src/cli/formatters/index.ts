/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  createSpinner,
  createStageProgress,
  formatDuration,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatEntriesTable,
  formatValue,
  DEFAULT_PREVIEW_ROWS,
} from './run-summary.js';
