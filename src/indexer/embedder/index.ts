/**
 * Embedder Module
 *
 * Token estimation and token-budgeted batching of chunks for an external
 * embedding service.
 */

export { BatchPlanner, type BatchPlannerOptions, type RunOptions } from './batch-planner.js';
export {
  TokenEstimator,
  DEFAULT_CHARS_PER_TOKEN,
  MODEL_CHARS_PER_TOKEN,
  TOKENS_PER_TEXT_OVERHEAD,
} from './tokens.js';
export { JsonlBatchWriter, MemorySink, type JsonlBatchWriterOptions } from './sinks.js';
export type { Batch, BatchState, ChunkFailure, DispatchReport, EmbeddingSink } from './types.js';
