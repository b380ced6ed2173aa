/**
 * Bundled embedding sinks.
 */

import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { CollaboratorUnavailableError, TokenLimitExceededError } from '../../errors/index.js';
import type { Batch, EmbeddingSink } from './types.js';

export interface JsonlBatchWriterOptions {
  /** Truncate the file on the first dispatch instead of appending (default: true) */
  truncate?: boolean;
  /**
   * Refuse batches estimated above this many tokens, the way an embedding
   * service does. Unset: accept everything.
   */
  tokenLimit?: number;
}

/**
 * One JSON line per batch: `{ batch, estimatedTokens, oversized, chunks }`.
 * Lets the pipeline run end to end and hands a later embedding stage a
 * ready-made request log.
 */
export class JsonlBatchWriter implements EmbeddingSink {
  private opened = false;

  constructor(
    readonly filePath: string,
    private readonly options: JsonlBatchWriterOptions = {}
  ) {}

  async dispatch(batch: Batch): Promise<void> {
    const { tokenLimit } = this.options;
    if (tokenLimit !== undefined && batch.estimatedTokens > tokenLimit) {
      throw new TokenLimitExceededError(`Batch ${batch.id} estimates ${batch.estimatedTokens} tokens`, {
        tokens: batch.estimatedTokens,
        limit: tokenLimit,
      });
    }

    const line =
      JSON.stringify({
        batch: batch.id,
        estimatedTokens: batch.estimatedTokens,
        oversized: batch.oversized,
        chunks: batch.chunks,
      }) + '\n';

    try {
      if (!this.opened) {
        await mkdir(dirname(this.filePath), { recursive: true });
        if (this.options.truncate !== false) {
          await writeFile(this.filePath, '', 'utf-8');
        }
        this.opened = true;
      }
      await appendFile(this.filePath, line, 'utf-8');
    } catch (error) {
      throw new CollaboratorUnavailableError(`Cannot write batches to ${this.filePath}`, error);
    }
  }
}

/**
 * Keeps dispatched batches in memory. Useful for tests and for callers
 * that embed in-process.
 */
export class MemorySink implements EmbeddingSink {
  readonly batches: Batch[] = [];

  async dispatch(batch: Batch): Promise<void> {
    this.batches.push(batch);
  }
}
