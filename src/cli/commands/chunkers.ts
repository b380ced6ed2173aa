/**
 * Chunkers Command
 *
 * Lists the registered chunkers and the extensions each one handles.
 *
 * Usage:
 *   chunkwise chunkers
 *   chunkwise chunkers --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { ChunkingFactory } from '../../indexer/chunker/factory.js';
import { formatTable } from '../../utils/table.js';
import type { CommandContext } from '../types.js';
import { loadCommandConfig } from './shared.js';

export function createChunkersCommand(getContext: () => CommandContext): Command {
  return new Command('chunkers')
    .description('List chunkers and the file extensions they handle')
    .action(() => {
      const ctx = getContext();
      const config = loadCommandConfig(ctx);
      const factory = new ChunkingFactory({ config, logger: ctx });
      const info = factory.chunkerInfo();

      if (ctx.options.json) {
        console.log(JSON.stringify({ structural: config.use_structural_chunking, chunkers: info }, null, 2));
        return;
      }

      const rows = Object.entries(info).map(([name, extensions]) => ({ name, extensions: extensions.join(' ') }));
      ctx.log(
        formatTable(
          [
            { header: 'Chunker', key: 'name' },
            { header: 'Extensions', key: 'extensions' },
          ],
          rows
        )
      );
      if (!config.use_structural_chunking) {
        ctx.log(chalk.yellow('use_structural_chunking is off: every file goes to FallbackChunker'));
      }
    });
}
