/**
 * Helpers shared by the commands that read a directory.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import { loadConfig, type Config } from '../../config/index.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { loadDocuments, type LoadResult } from '../../indexer/loader.js';
import type { CommandContext } from '../types.js';
import type { SourceOptions } from '../validation.js';

/**
 * Absolute path of an existing directory.
 *
 * @throws FileNotFoundError when the path does not exist
 * @throws CLIError when it is not a directory
 */
export function resolveDirectory(path: string, commandName: string): string {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    throw new FileNotFoundError(absolute);
  }
  if (!statSync(absolute).isDirectory()) {
    throw new CLIError(
      `Path is not a directory: ${absolute}`,
      `chunkwise ${commandName} requires a directory path, not a file`
    );
  }
  return absolute;
}

export function loadCommandConfig(ctx: CommandContext): Readonly<Config> {
  const config = loadConfig({ configPath: ctx.options.config });
  ctx.debug(
    `chunk_size=${config.chunk_size} hard_chunk_ceiling=${config.hard_chunk_ceiling} ` +
      `max_tokens_per_batch=${config.max_tokens_per_batch} structural=${config.use_structural_chunking}`
  );
  return config;
}

/**
 * Read the documents under `root` with the loader settings from config.
 */
export async function loadSourceDocuments(
  root: string,
  config: Readonly<Config>,
  options: SourceOptions,
  hooks: { onDocument?: (path: string) => void; onSkip?: (path: string, reason: string) => void } = {}
): Promise<LoadResult> {
  return loadDocuments(root, {
    extensions: options.ext,
    additionalIgnorePatterns: config.loader.ignore_patterns ? [...config.loader.ignore_patterns] : undefined,
    maxFileSize: config.loader.max_file_size_kb * 1024,
    source: { repository: options.repository, branch: options.branch, commit: options.commit },
    onDocument: (document) => hooks.onDocument?.(document.path),
    onSkip: hooks.onSkip,
  });
}
