/**
 * Batch Planner
 *
 * Packs chunks, in document order, into batches under a token budget and
 * dispatches them to an EmbeddingSink one at a time.
 *
 * Each batch walks a small state machine:
 *
 *   accumulating → full → dispatching → success
 *                                     ↘ overflow → (halve, requeue) → ...
 *
 * - A chunk whose estimate alone exceeds the budget is sent by itself as
 *   an `oversized` batch, with a warning.
 * - On `TokenLimitExceededError` the batch is halved: the second half goes
 *   back to the front of the queue, the first half is retried. After
 *   `maxHalvingRetries` halvings the chunks are sent one by one.
 * - A dispatch that outlives `dispatchTimeoutMs` is requeued once, then
 *   its chunks are recorded as failed.
 * - Any other sink error fails the batch; `CollaboratorUnavailableError`
 *   aborts the run.
 */

import type { Config } from '../../config/schema.js';
import {
  CancelledError,
  CollaboratorUnavailableError,
  describeError,
  DispatchTimeoutError,
  TokenLimitExceededError,
} from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { Chunk } from '../chunker/types.js';
import { TokenEstimator } from './tokens.js';
import type { Batch, BatchState, DispatchReport, EmbeddingSink } from './types.js';

export interface BatchPlannerOptions {
  maxTokensPerBatch: number;
  /** Most chunks in one batch */
  maxBatchSize: number;
  /** @default 3 */
  maxHalvingRetries?: number;
  /** @default 120000 */
  dispatchTimeoutMs?: number;
  estimator?: TokenEstimator;
  logger?: Logger;
  onStateChange?: (state: BatchState, batch: Batch) => void;
  /** Called after every accepted batch */
  onBatch?: (batch: Batch, report: Readonly<DispatchReport>) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Queue entry. Entries requeued as a unit (the second half of a halved
 * batch, a timed-out batch) share a segment and are never mixed with
 * other chunks.
 */
interface Entry {
  chunk: Chunk;
  tokens: number;
  /** 0 for fresh chunks */
  segment: number;
  /** Halvings already applied to the segment */
  halvings: number;
  /** Already requeued after a timeout */
  timedOut: boolean;
}

type DispatchOutcome = 'success' | 'overflow' | 'timeout' | 'failed';

export class BatchPlanner {
  private readonly maxTokensPerBatch: number;
  private readonly maxBatchSize: number;
  private readonly maxHalvingRetries: number;
  private readonly dispatchTimeoutMs: number;
  private readonly estimator: TokenEstimator;
  private readonly logger: Logger;
  private readonly onStateChange?: (state: BatchState, batch: Batch) => void;
  private readonly onBatch?: (batch: Batch, report: Readonly<DispatchReport>) => void;

  private nextBatchId = 1;
  private nextSegment = 1;

  constructor(options: BatchPlannerOptions) {
    if (options.maxTokensPerBatch < 1 || options.maxBatchSize < 1) {
      throw new RangeError('maxTokensPerBatch and maxBatchSize must be at least 1');
    }
    this.maxTokensPerBatch = options.maxTokensPerBatch;
    this.maxBatchSize = options.maxBatchSize;
    this.maxHalvingRetries = options.maxHalvingRetries ?? 3;
    this.dispatchTimeoutMs = options.dispatchTimeoutMs ?? 120_000;
    this.estimator = options.estimator ?? new TokenEstimator();
    this.logger = options.logger ?? silentLogger;
    this.onStateChange = options.onStateChange;
    this.onBatch = options.onBatch;
  }

  static fromConfig(
    config: Readonly<Config>,
    options: Pick<BatchPlannerOptions, 'logger' | 'onStateChange' | 'onBatch'> = {}
  ): BatchPlanner {
    return new BatchPlanner({
      maxTokensPerBatch: config.max_tokens_per_batch,
      maxBatchSize: config.embedding_batch_size,
      maxHalvingRetries: config.batching.max_halving_retries,
      dispatchTimeoutMs: config.batching.dispatch_timeout_ms,
      estimator: new TokenEstimator(config.batching.token_model),
      ...options,
    });
  }

  /**
   * Batches the planner would send, without dispatching anything.
   */
  plan(chunks: readonly Chunk[]): Batch[] {
    this.nextBatchId = 1;
    const queue = this.toEntries(chunks);
    const batches: Batch[] = [];
    while (queue.length > 0) {
      batches.push(this.takeBatch(queue).batch);
    }
    return batches;
  }

  /**
   * Dispatch every chunk. Resolves with a report even when chunks failed;
   * rejects only on cancellation or an unavailable sink.
   *
   * @throws CancelledError when the signal aborts between batches
   * @throws CollaboratorUnavailableError from the sink
   */
  async run(chunks: readonly Chunk[], sink: EmbeddingSink, options: RunOptions = {}): Promise<DispatchReport> {
    this.nextBatchId = 1;
    const report: DispatchReport = {
      batchesSent: 0,
      chunksSent: 0,
      oversizedBatches: 0,
      halvings: 0,
      requeued: 0,
      failedChunks: [],
      errors: [],
    };
    const queue = this.toEntries(chunks);

    while (queue.length > 0) {
      if (options.signal?.aborted) {
        throw new CancelledError('dispatch');
      }

      const { batch, entries } = this.takeBatch(queue);
      if (batch.oversized) {
        this.logger.warn(
          `Oversized batch: chunk ${batch.chunks[0]?.id ?? '?'} estimates ${batch.estimatedTokens} tokens ` +
            `(limit ${this.maxTokensPerBatch}); sending it alone`
        );
      }
      await this.dispatchWithRetry(batch, entries, queue, sink, report);
    }

    return report;
  }

  private toEntries(chunks: readonly Chunk[]): Entry[] {
    return chunks.map((chunk) => ({
      chunk,
      tokens: this.estimator.estimate(chunk.text),
      segment: 0,
      halvings: 0,
      timedOut: false,
    }));
  }

  /**
   * Seal the next batch from the front of the queue.
   */
  private takeBatch(queue: Entry[]): { batch: Batch; entries: Entry[] } {
    const first = queue.shift();
    if (!first) {
      throw new Error('takeBatch called on an empty queue');
    }

    const entries = [first];
    let tokens = first.tokens;

    if (first.tokens <= this.maxTokensPerBatch) {
      for (let next = queue[0]; next !== undefined; next = queue[0]) {
        if (
          next.segment !== first.segment ||
          tokens + next.tokens > this.maxTokensPerBatch ||
          entries.length >= this.maxBatchSize
        ) {
          break;
        }
        entries.push(next);
        tokens += next.tokens;
        queue.shift();
      }
    }

    const batch = this.makeBatch(entries);
    this.onStateChange?.('accumulating', batch);
    this.onStateChange?.('full', batch);
    return { batch, entries };
  }

  private makeBatch(entries: readonly Entry[]): Batch {
    const estimatedTokens = entries.reduce((sum, entry) => sum + entry.tokens, 0);
    return {
      id: this.nextBatchId++,
      chunks: entries.map((entry) => entry.chunk),
      estimatedTokens,
      oversized: entries.length === 1 && estimatedTokens > this.maxTokensPerBatch,
    };
  }

  private async dispatchWithRetry(
    batch: Batch,
    entries: Entry[],
    queue: Entry[],
    sink: EmbeddingSink,
    report: DispatchReport
  ): Promise<void> {
    let current = batch;
    let currentEntries = entries;

    for (;;) {
      const outcome = await this.dispatch(current, sink, report);

      if (outcome === 'success' || outcome === 'failed') {
        return;
      }

      if (outcome === 'timeout') {
        if (currentEntries.some((entry) => entry.timedOut)) {
          this.fail(current, report, `dispatch timed out after ${this.dispatchTimeoutMs}ms (retried once)`);
        } else {
          const segment = this.nextSegment++;
          queue.unshift(...currentEntries.map((entry) => ({ ...entry, segment, timedOut: true })));
          report.requeued++;
          this.logger.warn(`Batch ${current.id} timed out; requeued`);
        }
        return;
      }

      // overflow
      const halvings = currentEntries[0]?.halvings ?? 0;
      if (currentEntries.length === 1) {
        this.fail(current, report, 'token limit exceeded for a single chunk');
        return;
      }
      if (halvings >= this.maxHalvingRetries) {
        await this.dispatchIndividually(currentEntries, sink, report);
        return;
      }

      const middle = Math.ceil(currentEntries.length / 2);
      const segment = this.nextSegment++;
      const head = currentEntries.slice(0, middle).map((entry) => ({ ...entry, halvings: halvings + 1 }));
      const tail = currentEntries.slice(middle).map((entry) => ({ ...entry, segment, halvings: halvings + 1 }));
      queue.unshift(...tail);
      report.halvings++;
      this.logger.debug?.(`Batch ${current.id} exceeded the token limit; halved to ${head.length} + ${tail.length}`);

      currentEntries = head;
      current = this.makeBatch(head);
      this.onStateChange?.('full', current);
    }
  }

  private async dispatchIndividually(
    entries: readonly Entry[],
    sink: EmbeddingSink,
    report: DispatchReport
  ): Promise<void> {
    for (const entry of entries) {
      let batch = this.makeBatch([entry]);
      let outcome = await this.dispatch(batch, sink, report);
      if (outcome === 'timeout' && !entry.timedOut) {
        report.requeued++;
        this.logger.warn(`Batch ${batch.id} timed out; requeued`);
        batch = this.makeBatch([entry]);
        outcome = await this.dispatch(batch, sink, report);
      }
      if (outcome === 'overflow') {
        this.fail(batch, report, 'token limit exceeded for a single chunk');
      } else if (outcome === 'timeout') {
        this.fail(batch, report, `dispatch timed out after ${this.dispatchTimeoutMs}ms (retried once)`);
      }
    }
  }

  /**
   * One dispatch attempt. Non-retryable errors are recorded here.
   */
  private async dispatch(batch: Batch, sink: EmbeddingSink, report: DispatchReport): Promise<DispatchOutcome> {
    this.onStateChange?.('dispatching', batch);
    try {
      await this.withTimeout(sink.dispatch(batch));
    } catch (error) {
      if (error instanceof TokenLimitExceededError) {
        this.onStateChange?.('overflow', batch);
        return 'overflow';
      }
      if (error instanceof DispatchTimeoutError) {
        return 'timeout';
      }
      if (error instanceof CollaboratorUnavailableError) {
        throw error;
      }
      const message = `Batch ${batch.id} failed: ${describeError(error)}`;
      report.errors.push(message);
      this.logger.warn(message);
      this.fail(batch, report, describeError(error));
      return 'failed';
    }

    this.onStateChange?.('success', batch);
    report.batchesSent++;
    report.chunksSent += batch.chunks.length;
    if (batch.oversized) {
      report.oversizedBatches++;
    }
    this.onBatch?.(batch, report);
    return 'success';
  }

  private fail(batch: Batch, report: DispatchReport, reason: string): void {
    for (const chunk of batch.chunks) {
      report.failedChunks.push({ chunkId: chunk.id, documentPath: chunk.metadata.source.path, reason });
    }
  }

  private async withTimeout(dispatch: Promise<void>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new DispatchTimeoutError(this.dispatchTimeoutMs)), this.dispatchTimeoutMs);
    });
    try {
      await Promise.race([dispatch, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
