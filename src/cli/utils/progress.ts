/**
 * Progress Reporter
 *
 * Manages progress display for `docfuse ingest`.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripting
 * - Text: Simple text output for non-TTY environments
 *
 * Throttles spinner updates (100ms minimum) and respects NO_COLOR.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IngestStage, StageStats } from '../../ingest/types.js';

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<IngestStage, string> = {
  loading: 'Loading',
  embedding: 'Embedding',
  merging: 'Merging',
};

const STAGE_ORDER: IngestStage[] = ['loading', 'embedding', 'merging'];

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show stage breakdown and warnings in the summary */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;

  /** Where lines and events go @default console.log */
  write?: (line: string) => void;
}

/**
 * Final result of an ingestion run.
 */
export interface IngestResult {
  /** Fragments file that was read */
  inputPath: string;

  /** File the merged nodes were written to */
  outputPath: string;

  /** Pipeline that ran */
  pipeline: string;

  /** Embedding provider/model, for the semantic pipeline */
  embedding?: { provider: string; model: string };

  /** Fragments in the input file */
  fragments: number;

  /** Nodes entering the pipeline (blank fragments are skipped) */
  nodesIn: number;

  /** Nodes leaving the pipeline */
  nodesOut: number;

  /** Total time in milliseconds */
  totalDurationMs: number;

  /** Time breakdown by stage */
  stageDurations: Partial<Record<IngestStage, number>>;

  /** Any warnings encountered */
  warnings: string[];
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false });
 *
 * reporter.startStage('embedding', 120);
 * reporter.updateProgress(40);
 * reporter.completeStage({ stage: 'embedding', processed: 120, total: 120, durationMs: 900 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    // Apply NO_COLOR if set
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  private write(line: string): void {
    (this.options.write ?? console.log)(line);
  }

  /**
   * Start a new stage.
   *
   * @param total - Expected total items (0 if unknown)
   */
  startStage(stage: IngestStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();

      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      this.write(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.options.isInteractive && this.spinner && this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(
        `${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    } else {
      this.write(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop any running spinner without marking it successful.
   */
  fail(message: string): void {
    this.spinner?.fail(message);
    this.spinner = null;
    this.currentStage = null;
  }

  /**
   * Display a warning message.
   */
  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message },
      });
      return;
    }

    // In interactive mode, warnings are only shown in verbose mode
    // (to not clutter the spinner output)
    if (this.options.verbose || !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  /**
   * Display the final summary.
   *
   * @param extra - additional fields for the JSON `complete` event
   */
  showSummary(result: IngestResult, extra: Record<string, unknown> = {}): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result, ...extra },
      });
      return;
    }

    const duration = formatDuration(result.totalDurationMs);

    this.write('');
    this.write(chalk.green.bold('Ingest Complete ✓'));
    this.write('');
    this.write(`  ${chalk.dim('Pipeline:')}         ${result.pipeline}`);
    if (result.embedding) {
      this.write(`  ${chalk.dim('Embeddings:')}       ${result.embedding.provider}/${result.embedding.model}`);
    }
    this.write(`  ${chalk.dim('Nodes:')}            ${result.nodesIn.toLocaleString()} → ${result.nodesOut.toLocaleString()}`);
    this.write(`  ${chalk.dim('Time elapsed:')}     ${duration}`);
    this.write(`  ${chalk.dim('Output:')}           ${result.outputPath}`);

    if (this.options.verbose && Object.keys(result.stageDurations).length > 0) {
      this.write('');
      this.write(chalk.dim('  Breakdown:'));
      for (const stage of STAGE_ORDER) {
        const label = STAGE_LABELS[stage];
        const durationMs = result.stageDurations[stage];
        if (durationMs === undefined) continue;
        this.write(`    ${chalk.dim(label + ':')}${' '.repeat(12 - label.length)}${formatDuration(durationMs)}`);
      }
    }

    if (result.warnings.length > 0) {
      this.write('');
      this.write(chalk.yellow(`  ${result.warnings.length} warning(s) during ingestion`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          this.write(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          this.write(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    this.write('');
  }

  private emitJson(event: ProgressEvent): void {
    this.write(JSON.stringify(event));
  }

  private getStageUnit(stage: IngestStage): string {
    switch (stage) {
      case 'loading':
        return 'fragments';
      case 'embedding':
        return 'nodes embedded';
      case 'merging':
        return 'nodes compared';
    }
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    write: options.write,
  });
}
