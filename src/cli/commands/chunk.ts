/**
 * Chunk Command
 *
 * Chunks a directory and prints what came out, without batching or
 * dispatching anything. Useful for tuning chunk sizes.
 *
 * Usage:
 *   chunkwise chunk <path>                 Summary by chunk type and chunker
 *   chunkwise chunk . --ext py,cs          Only these extensions
 *   chunkwise chunk . --show 20            List the first 20 chunks
 *   chunkwise chunk . --json               Every chunk as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { ChunkingFactory } from '../../indexer/chunker/factory.js';
import type { Chunk } from '../../indexer/chunker/types.js';
import { formatTable } from '../../utils/table.js';
import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { ChunkOptionsSchema, validateOptions } from '../validation.js';
import { loadCommandConfig, loadSourceDocuments, resolveDirectory } from './shared.js';

/**
 * Count chunks by a metadata field, most frequent first.
 */
export function countBy(chunks: readonly Chunk[], pick: (chunk: Chunk) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const chunk of chunks) {
    const key = pick(chunk);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function createChunkCommand(getContext: () => CommandContext): Command {
  return new Command('chunk')
    .argument('<path>', 'Directory to chunk')
    .description('Chunk a directory and summarise the result')
    .option('-e, --ext <list>', 'Comma-separated extensions to include (e.g. py,cs)')
    .option('--show <n>', 'List the first n chunks')
    .option('--repository <name>', 'Repository recorded on every chunk')
    .option('--branch <name>', 'Branch recorded on every chunk')
    .option('--commit <sha>', 'Commit recorded on every chunk')
    .action(async (path: string, rawOptions: unknown) => {
      const ctx = getContext();
      const options = validateOptions(ChunkOptionsSchema, rawOptions);
      const root = resolveDirectory(path, 'chunk');
      const config = loadCommandConfig(ctx);

      const reporter = createProgressReporter({ json: ctx.options.json, verbose: ctx.options.verbose });

      reporter.startStage('loading');
      const loaded = await loadSourceDocuments(root, config, options, {
        onSkip: (file, reason) => reporter.warn(reason, file),
      });
      reporter.completeStage({
        stage: 'loading',
        processed: loaded.documents.length,
        total: loaded.documents.length,
        durationMs: loaded.stats.scanDurationMs,
      });

      const started = performance.now();
      reporter.startStage('chunking', loaded.documents.length);
      const factory = new ChunkingFactory({ config, logger: { warn: (message) => reporter.warn(message) } });
      const result = await factory.chunkDocumentsWithResult(loaded.documents, {
        onDocument: (outcome, completed) => reporter.updateProgress(completed, outcome.path),
      });
      reporter.completeStage({
        stage: 'chunking',
        processed: loaded.documents.length,
        total: loaded.documents.length,
        durationMs: Math.round(performance.now() - started),
      });

      for (const failure of result.failures) {
        reporter.error(failure.message, failure.documentPath);
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify({
            documents: loaded.documents.length,
            failures: result.failures.map((failure) => ({ path: failure.documentPath, error: failure.message })),
            chunks: result.chunks,
          })
        );
        return;
      }

      const fallbackDocuments = result.outcomes.filter((outcome) => outcome.usedFallback).length;
      ctx.log('');
      ctx.log(
        chalk.bold(`${result.chunks.length.toLocaleString()} chunks from ${loaded.documents.length} documents`) +
          (fallbackDocuments > 0 ? chalk.dim(` (${fallbackDocuments} via fallback)`) : '')
      );
      ctx.log('');
      ctx.log(
        formatTable(
          [
            { header: 'Chunk type', key: 'type' },
            { header: 'Count', key: 'count', align: 'right' },
          ],
          countBy(result.chunks, (chunk) => chunk.metadata.chunkType).map(([type, count]) => ({ type, count }))
        )
      );

      if (options.show !== undefined) {
        ctx.log('');
        ctx.log(
          formatTable(
            [
              { header: 'File', key: 'path' },
              { header: 'Lines', key: 'lines' },
              { header: 'Type', key: 'type' },
              { header: 'Symbol', key: 'symbol' },
              { header: 'Chars', key: 'chars', align: 'right' },
            ],
            result.chunks.slice(0, options.show).map((chunk) => ({
              path: chunk.metadata.source.path,
              lines: `${chunk.metadata.lineStart}-${chunk.metadata.lineEnd}`,
              type: chunk.metadata.chunkType,
              symbol: chunk.metadata.parentSymbol
                ? `${chunk.metadata.parentSymbol}.${chunk.metadata.symbolName ?? ''}`
                : chunk.metadata.symbolName,
              chars: chunk.text.length,
            }))
          )
        );
      }

      if (result.failures.length > 0) {
        process.exitCode = 1;
      }
    });
}
