/**
 * Ingestion Pipeline
 *
 * Documents → Chunk (factory + enforcer) → Plan batches → Dispatch to sink
 *
 * The pipeline doesn't know how progress is displayed; it fires stage
 * callbacks and leaves rendering to the CLI's ProgressReporter. Per-document
 * and per-batch failures are collected into the report; only cancellation
 * and an unavailable sink end the run early.
 */

import type { Config } from '../config/schema.js';
import { CancelledError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ChunkingFactory } from './chunker/factory.js';
import type { ParserPool } from './chunker/parsers/pool.js';
import type { Chunk } from './chunker/types.js';
import { BatchPlanner } from './embedder/batch-planner.js';
import type { Batch, ChunkFailure, DispatchReport, EmbeddingSink } from './embedder/types.js';
import type { Document } from './types.js';

/**
 * Stages of an ingestion run, in order. `planning` replaces `dispatching`
 * on a dry run.
 */
export type IngestionStage = 'chunking' | 'planning' | 'dispatching';

export interface StageStats {
  stage: IngestionStage;
  processed: number;
  total: number;
  durationMs: number;
  details?: Record<string, unknown>;
}

export interface IngestionReport {
  documentsProcessed: number;
  /** Whitespace-only documents */
  documentsSkipped: number;
  /** Documents whose chunking threw; parse failures that fell back are not counted */
  documentsFailed: number;
  /** Documents chunked by the fallback chunker */
  fallbackDocuments: number;
  chunksCreated: number;
  /** Batches planned (dry run) or accepted by the sink */
  batchesPlanned: number;
  batchesSent: number;
  oversizedBatches: number;
  halvings: number;
  chunksFailed: ChunkFailure[];
  dryRun: boolean;
  totalDurationMs: number;
  stageDurations: Partial<Record<IngestionStage, number>>;
  warnings: string[];
  /** Non-fatal errors: document failures and failed batches */
  errors: string[];
}

export interface IngestOptions {
  config: Readonly<Config>;
  /** Required unless `dryRun` */
  sink?: EmbeddingSink;
  /** Plan batches without dispatching */
  dryRun?: boolean;
  logger?: Logger;
  pool?: ParserPool;
  signal?: AbortSignal;

  onStageStart?: (stage: IngestionStage, total: number) => void;
  onProgress?: (stage: IngestionStage, processed: number, total: number, current?: string) => void;
  onStageComplete?: (stage: IngestionStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
  /** Every chunk, in document order, once chunking completes */
  onChunks?: (chunks: readonly Chunk[]) => void;
}

function checkCancelled(signal: AbortSignal | undefined, stage: IngestionStage): void {
  if (signal?.aborted) {
    throw new CancelledError(stage);
  }
}

/**
 * Chunk documents and dispatch them in token-budgeted batches.
 *
 * @example
 * ```typescript
 * const report = await ingest(documents, {
 *   config: loadConfig(),
 *   sink: new JsonlBatchWriter('out/batches.jsonl'),
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, path) => reporter.updateProgress(processed, path),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 * });
 * ```
 *
 * @throws CancelledError when the signal aborts between documents or batches
 * @throws CollaboratorUnavailableError when the sink cannot be reached
 */
export async function ingest(documents: readonly Document[], options: IngestOptions): Promise<IngestionReport> {
  const { config, sink, signal, onStageStart, onProgress, onStageComplete, onWarning, onError } = options;
  const dryRun = options.dryRun ?? false;
  const logger = options.logger ?? silentLogger;

  if (!dryRun && !sink) {
    throw new TypeError('ingest needs a sink unless dryRun is set');
  }

  const pipelineStart = performance.now();
  const stageDurations: Partial<Record<IngestionStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  // Warnings from chunkers and the planner surface through the callback as well
  const pipelineLogger: Logger = {
    ...logger,
    warn: (message) => {
      warnings.push(message);
      logger.warn(message);
      onWarning?.(message);
    },
  };

  // =========================================================================
  // STAGE 1: CHUNKING
  // =========================================================================
  checkCancelled(signal, 'chunking');
  const chunkStart = performance.now();
  onStageStart?.('chunking', documents.length);

  const factory = new ChunkingFactory({ config, logger: pipelineLogger, pool: options.pool });
  const chunking = await factory.chunkDocumentsWithResult(documents, {
    signal,
    onDocument: (outcome, completed, total) => onProgress?.('chunking', completed, total, outcome.path),
  });

  for (const failure of chunking.failures) {
    errors.push(failure.message);
    onError?.(failure, failure.documentPath);
  }

  const { chunks } = chunking;
  const fallbackDocuments = chunking.outcomes.filter((outcome) => outcome.usedFallback).length;
  const documentsSkipped = chunking.outcomes.filter((outcome) => outcome.skipped).length;
  options.onChunks?.(chunks);

  stageDurations.chunking = Math.round(performance.now() - chunkStart);
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: documents.length,
    total: documents.length,
    durationMs: stageDurations.chunking,
    details: {
      chunksCreated: chunks.length,
      documentsFailed: chunking.failures.length,
      fallbackDocuments,
    },
  });

  const report: IngestionReport = {
    documentsProcessed: documents.length,
    documentsSkipped,
    documentsFailed: chunking.failures.length,
    fallbackDocuments,
    chunksCreated: chunks.length,
    batchesPlanned: 0,
    batchesSent: 0,
    oversizedBatches: 0,
    halvings: 0,
    chunksFailed: [],
    dryRun,
    totalDurationMs: 0,
    stageDurations,
    warnings,
    errors,
  };

  // =========================================================================
  // STAGE 2: PLANNING / DISPATCHING
  // =========================================================================
  const stage: IngestionStage = dryRun || !sink ? 'planning' : 'dispatching';
  checkCancelled(signal, stage);
  const batchStart = performance.now();
  onStageStart?.(stage, chunks.length);

  let chunksDone = 0;
  const onBatch = (batch: Batch): void => {
    chunksDone += batch.chunks.length;
    onProgress?.(stage, chunksDone, chunks.length, `batch ${batch.id}`);
  };
  const planner = BatchPlanner.fromConfig(config, { logger: pipelineLogger, onBatch });

  if (stage === 'planning' || !sink) {
    const batches = planner.plan(chunks);
    report.batchesPlanned = batches.length;
    report.oversizedBatches = batches.filter((batch) => batch.oversized).length;
  } else {
    let dispatch: DispatchReport;
    try {
      dispatch = await planner.run(chunks, sink, { signal });
    } finally {
      await sink.close?.();
    }

    report.batchesPlanned = dispatch.batchesSent;
    report.batchesSent = dispatch.batchesSent;
    report.oversizedBatches = dispatch.oversizedBatches;
    report.halvings = dispatch.halvings;
    report.chunksFailed = dispatch.failedChunks;
    errors.push(...dispatch.errors);
    for (const failure of dispatch.failedChunks) {
      onError?.(new Error(`Chunk ${failure.chunkId}: ${failure.reason}`), failure.documentPath);
    }
  }

  stageDurations[stage] = Math.round(performance.now() - batchStart);
  onStageComplete?.(stage, {
    stage,
    processed: report.batchesPlanned,
    total: report.batchesPlanned,
    durationMs: stageDurations[stage] ?? 0,
    details: {
      oversizedBatches: report.oversizedBatches,
      halvings: report.halvings,
      chunksFailed: report.chunksFailed.length,
    },
  });

  report.totalDurationMs = Math.round(performance.now() - pipelineStart);
  return report;
}
