/**
 * Embedder Types
 *
 * The core never talks to an embedding service directly. It hands sealed
 * batches to an `EmbeddingSink`, which embeds and stores them (or, for the
 * bundled JSONL writer, records them for a later stage).
 */

import type { Chunk } from '../chunker/types.js';

/**
 * Chunks dispatched together under the token budget.
 */
export interface Batch {
  /** Sequence number within the run, from 1 */
  readonly id: number;
  readonly chunks: readonly Chunk[];
  readonly estimatedTokens: number;
  /**
   * A single chunk whose estimate alone exceeds the budget. The only batch
   * allowed over `max_tokens_per_batch`.
   */
  readonly oversized: boolean;
}

/**
 * Output collaborator.
 *
 * `dispatch` resolves once the batch is accepted. It rejects with
 * `TokenLimitExceededError` when the service refuses the batch for size,
 * and with `CollaboratorUnavailableError` when it cannot be reached at
 * all. Any other rejection fails the batch without retry.
 */
export interface EmbeddingSink {
  dispatch(batch: Batch): Promise<void>;
  /** Flush and release resources after the last batch */
  close?(): Promise<void>;
}

/**
 * Planner states. A batch moves accumulating → full → dispatching and
 * ends in success or overflow (refused for size, then halved).
 */
export type BatchState = 'accumulating' | 'full' | 'dispatching' | 'success' | 'overflow';

export interface ChunkFailure {
  chunkId: string;
  documentPath: string;
  reason: string;
}

export interface DispatchReport {
  /** Batches the sink accepted */
  batchesSent: number;
  chunksSent: number;
  oversizedBatches: number;
  /** Times a batch was halved after a token-limit refusal */
  halvings: number;
  /** Batches requeued after a timeout */
  requeued: number;
  failedChunks: ChunkFailure[];
  /** Non-retryable sink errors, one message per failed batch */
  errors: string[];
}
