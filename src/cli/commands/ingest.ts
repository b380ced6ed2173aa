/**
 * Ingest Command
 *
 * Runs the full pipeline over a directory: load, chunk, plan batches under
 * the token budget and write every dispatched batch to a JSONL file.
 *
 * Usage:
 *   chunkwise ingest <path> --out batches.jsonl
 *   chunkwise ingest . --dry-run              Plan batches, write nothing
 *   chunkwise ingest . --out b.jsonl --token-limit 8000
 *                                             Refuse batches above 8000 tokens,
 *                                             exercising halve-and-retry
 *   chunkwise ingest . --json                 NDJSON progress events
 *
 * Ctrl-C stops the run between documents or batches.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import { CancelledError, CLIError } from '../../errors/index.js';
import { JsonlBatchWriter } from '../../indexer/embedder/sinks.js';
import { ingest, type IngestionReport } from '../../indexer/pipeline.js';
import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { IngestOptionsSchema, validateOptions } from '../validation.js';
import { loadCommandConfig, loadSourceDocuments, resolveDirectory } from './shared.js';

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<path>', 'Directory to ingest')
    .description('Chunk a directory and write token-budgeted batches to a JSONL file')
    .option('-o, --out <file>', 'JSONL file receiving one line per batch')
    .option('--dry-run', 'Plan batches without writing them', false)
    .option('--token-limit <n>', 'Refuse batches estimated above n tokens, like an embedding service would')
    .option('-e, --ext <list>', 'Comma-separated extensions to include (e.g. py,cs)')
    .option('--repository <name>', 'Repository recorded on every chunk')
    .option('--branch <name>', 'Branch recorded on every chunk')
    .option('--commit <sha>', 'Commit recorded on every chunk')
    .action(async (path: string, rawOptions: unknown) => {
      const ctx = getContext();
      const options = validateOptions(IngestOptionsSchema, rawOptions);
      const root = resolveDirectory(path, 'ingest');
      const config = loadCommandConfig(ctx);

      const reporter = createProgressReporter({ json: ctx.options.json, verbose: ctx.options.verbose });

      reporter.startStage('loading');
      let loadedCount = 0;
      const loaded = await loadSourceDocuments(root, config, options, {
        onDocument: (file) => reporter.updateProgress(++loadedCount, file),
        onSkip: (file, reason) => reporter.warn(reason, file),
      });
      reporter.completeStage({
        stage: 'loading',
        processed: loaded.documents.length,
        total: loaded.documents.length,
        durationMs: loaded.stats.scanDurationMs,
      });

      const out = options.out === undefined ? undefined : resolve(options.out);
      const sink =
        options.dryRun || out === undefined ? undefined : new JsonlBatchWriter(out, { tokenLimit: options.tokenLimit });
      ctx.debug(sink ? `Writing batches to ${out}` : 'Dry run: planning only');

      const controller = new AbortController();
      const onSigint = (): void => {
        reporter.warn('Stopping after the current document or batch...');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      let report: IngestionReport;
      try {
        report = await ingest(loaded.documents, {
          config,
          sink,
          dryRun: sink === undefined,
          signal: controller.signal,
          logger: { warn: () => {}, debug: (message) => ctx.debug(message) },
          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (_stage, processed, _total, current) => reporter.updateProgress(processed, current),
          onStageComplete: (_stage, stats) => reporter.completeStage(stats),
          onWarning: (message, context) => reporter.warn(message, context),
          onError: (error, context) => reporter.error(error.message, context),
        });
      } catch (error) {
        reporter.fail(error instanceof CancelledError ? 'Cancelled' : 'Failed');
        if (error instanceof CLIError) {
          throw error;
        }
        throw new CLIError(
          `Ingest failed: ${error instanceof Error ? error.message : String(error)}`,
          'Run with --verbose for details'
        );
      } finally {
        process.off('SIGINT', onSigint);
      }

      reporter.showSummary(report);
      if (report.documentsFailed > 0 || report.chunksFailed.length > 0) {
        process.exitCode = 1;
      }
    });
}
