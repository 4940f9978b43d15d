/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  STAGE_LABELS,
  STAGE_ORDER,
  type PipelineCallbacks,
  type StageName,
} from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage display status for progress tracking.
 */
export type StageStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/**
 * Stage display information.
 */
export interface StageDisplay {
  name: StageName;
  status: StageStatus;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
}

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Status Icons
// ============================================================================

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: chalk.dim('\u25CB'), // ○
  running: chalk.cyan('\u25CF'), // ●
  completed: chalk.green('\u2714'), // ✔
  failed: chalk.red('\u2718'), // ✘
  skipped: chalk.yellow('\u2212'), // −
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  failed: '[X]',
  skipped: '[-]',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 * Renders nothing when stdout is not a TTY.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading tagger model...').start();
 *
 * try {
 *   await tagger.initialize();
 *   spinner.succeed('Tagger ready');
 * } catch (err) {
 *   spinner.fail('Tagger unavailable');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: ReturnType<typeof ora>;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with a success symbol and the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * On a TTY each running stage shows a spinner; otherwise one plain line is
 * printed per transition. Hook it into a run through `callbacks()`.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * await runHotwordPipeline(request, { source, tagger, callbacks: progress.callbacks() });
 * progress.printSummary();
 * ```
 */
export class StageProgressDisplay {
  private stages: Map<StageName, StageDisplay> = new Map();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(isTTY: boolean = process.stdout.isTTY === true) {
    this.isTTY = isTTY;

    for (const name of STAGE_ORDER) {
      this.stages.set(name, { name, status: 'pending' });
    }
  }

  startStage(name: StageName): void {
    const stage = this.stages.get(name);
    if (!stage) return;
    stage.status = 'running';

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[name]}...`).start();
    } else {
      console.log(`${STATUS_ICONS_PLAIN.running} ${STAGE_LABELS[name]}...`);
    }
  }

  completeStage(name: StageName, durationMs: number): void {
    const stage = this.stages.get(name);
    if (!stage) return;
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(STAGE_LABELS[name]);
      this.currentSpinner = null;
    } else {
      console.log(`${STATUS_ICONS_PLAIN.completed} ${STAGE_LABELS[name]} (${formatDuration(durationMs)})`);
    }
  }

  failStage(name: StageName, error: string): void {
    const stage = this.stages.get(name);
    if (!stage) return;
    stage.status = 'failed';
    stage.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${STAGE_LABELS[name]} failed`);
      this.currentSpinner = null;
    } else {
      console.log(`${STATUS_ICONS_PLAIN.failed} ${STAGE_LABELS[name]} - ${error}`);
    }
  }

  /**
   * Mark every stage still pending as skipped (e.g. rescale in raw-frequency runs).
   */
  skipPending(): void {
    for (const stage of this.stages.values()) {
      if (stage.status === 'pending') {
        stage.status = 'skipped';
      }
    }
  }

  getStageDisplay(name: StageName): StageDisplay | undefined {
    return this.stages.get(name);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY ? STATUS_ICONS[stage.status] : STATUS_ICONS_PLAIN[stage.status];
    let line = `${icon} ${STAGE_LABELS[stage.name]}`;

    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }

    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }

    return line;
  }

  printSummary(): void {
    console.log();
    console.log(chalk.bold('Pipeline Progress'));
    console.log(chalk.dim('\u2500'.repeat(40)));

    for (const stage of this.getAllStages()) {
      console.log(this.formatStageLine(stage));
    }

    console.log();
  }

  /**
   * Lifecycle callbacks that drive this display.
   */
  callbacks(): PipelineCallbacks {
    return {
      onStageStart: (name) => this.startStage(name),
      onStageComplete: (name, durationMs) => this.completeStage(name, durationMs),
      onStageError: (name, error) => this.failStage(name, error.message),
    };
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}

export function createStageProgress(isTTY?: boolean): StageProgressDisplay {
  return new StageProgressDisplay(isTTY);
}
