/**
 * Progress Reporter
 *
 * Progress display for `chunkwise ingest` and `chunkwise chunk`.
 * Output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI
 * - Text: plain lines for non-TTY output
 *
 * Spinner updates are throttled (100ms) and long paths are truncated.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IngestionReport, IngestionStage, StageStats } from '../../indexer/pipeline.js';

/**
 * Stages shown by the reporter: loading files from disk, then the
 * pipeline's own stages.
 */
export type ProgressStage = 'loading' | IngestionStage;

export type ReporterStageStats = Omit<StageStats, 'stage'> & { stage: ProgressStage };

const STAGE_LABELS: Record<ProgressStage, string> = {
  loading: 'Loading',
  chunking: 'Chunking',
  planning: 'Planning',
  dispatching: 'Dispatching',
};

const STAGE_UNITS: Record<ProgressStage, string> = {
  loading: 'files',
  chunking: 'documents',
  planning: 'batches planned',
  dispatching: 'batches sent',
};

export interface ProgressReporterOptions {
  /** NDJSON events instead of human-readable text */
  json: boolean;
  /** Show per-file lines and warnings */
  verbose: boolean;
  /** Disable colors (NO_COLOR) */
  noColor: boolean;
  /** stdout is a TTY (spinners allowed) */
  isInteractive: boolean;
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'error'
  | 'complete';

export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: ProgressStage;
  data: Record<string, unknown>;
}

export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: ProgressStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;
  private verboseLines: string[] = [];

  private static readonly UPDATE_THROTTLE_MS = 100;
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected items (0 when unknown)
   */
  startStage(stage: ProgressStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', timestamp: new Date().toISOString(), stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number, current?: string): void {
    if (!this.currentStage) return;

    if (this.options.verbose && current) {
      this.verboseLines.push(`  → ${current}`);
    }

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
        data: { processed, total: this.currentTotal, current },
      });
      return;
    }

    const progressText =
      this.currentTotal > 0
        ? `${processed}/${this.currentTotal} (${Math.round((processed / this.currentTotal) * 100)}%)`
        : `${processed} ${STAGE_UNITS[this.currentStage]}`;

    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = current
        ? `${progressText.padEnd(25)} ${chalk.dim(this.truncatePath(current))}`
        : progressText;
    }
  }

  completeStage(stats: ReporterStageStats): void {
    const summary = `${stats.processed.toLocaleString()} ${STAGE_UNITS[stats.stage]}`;

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
      this.spinner.succeed(summary);
      this.printVerboseLines();
    } else {
      console.log(`${STAGE_LABELS[stats.stage]} complete: ${summary}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /** Stop the active spinner after a fatal error */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // Interactive mode keeps warnings out of the spinner unless verbose
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'error',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }
    const contextStr = context ? ` (${context})` : '';
    console.error(chalk.red(`Error: ${message}${contextStr}`));
  }

  showSummary(report: IngestionReport): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', timestamp: new Date().toISOString(), data: { report } });
      return;
    }

    console.log('');
    console.log(chalk.green.bold(report.dryRun ? 'Dry Run Complete ✓' : 'Ingest Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Documents:')}        ${report.documentsProcessed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks created:')}   ${report.chunksCreated.toLocaleString()}`);
    if (report.dryRun) {
      console.log(`  ${chalk.dim('Batches planned:')}  ${report.batchesPlanned.toLocaleString()}`);
    } else {
      console.log(`  ${chalk.dim('Batches sent:')}     ${report.batchesSent.toLocaleString()}`);
    }
    if (report.oversizedBatches > 0) {
      console.log(`  ${chalk.dim('Oversized:')}        ${report.oversizedBatches.toLocaleString()}`);
    }
    if (report.fallbackDocuments > 0) {
      console.log(`  ${chalk.dim('Fallback chunked:')} ${report.fallbackDocuments.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(report.totalDurationMs)}`);

    if (this.options.verbose) {
      const stages = Object.entries(report.stageDurations).filter(
        (entry): entry is [string, number] => entry[1] !== undefined
      );
      if (stages.length > 0) {
        console.log('');
        console.log(chalk.dim('  Breakdown:'));
        for (const [stage, durationMs] of stages) {
          console.log(`    ${chalk.dim(`${stage}:`.padEnd(13))}${formatDuration(durationMs)}`);
        }
      }
    }

    if (report.documentsFailed > 0 || report.chunksFailed.length > 0) {
      console.log('');
      console.log(
        chalk.red(`  ${report.documentsFailed} document(s) failed, ${report.chunksFailed.length} chunk(s) not sent`)
      );
    }

    if (report.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${report.warnings.length} warning(s)`));
      if (this.options.verbose) {
        for (const warning of report.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (report.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${report.warnings.length - 5} more`));
        }
      }
    }
    console.log('');
  }

  private printVerboseLines(): void {
    if (!this.options.verbose || this.verboseLines.length === 0) {
      return;
    }
    for (const line of this.verboseLines.slice(0, 10)) {
      console.log(chalk.dim(line));
    }
    if (this.verboseLines.length > 10) {
      console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
    }
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

/**
 * Milliseconds as `250ms`, `1.5s` or `2m 5s`.
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

export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? process.stdout.isTTY ?? false,
  });
}
