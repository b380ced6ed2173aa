/**
 * Configuration Schema
 *
 * Defines the shape of ~/.chunkwise/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Cross-field rules (overlap below size, sizes below the hard ceiling)
 * live in `validateConfig` in loader.ts so that `deepPartial()` keeps
 * working on the object schema.
 */

import { z } from 'zod';

const positiveInt = () => z.number().int().positive();

/**
 * Per-extension overrides. Every field is optional; a missing field falls
 * back to the global value (or the built-in default for booleans).
 */
export const ExtensionSettingsSchema = z.object({
  max_chunk_size: positiveInt()
    .optional()
    .describe('Maximum characters in a structural chunk for this extension'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Overlap in characters when this extension falls back to windowed splitting'),
  preserve_type_boundaries: z
    .boolean()
    .optional()
    .describe('Keep a whole class/interface in one chunk when it fits'),
  preserve_function_boundaries: z
    .boolean()
    .optional()
    .describe('Emit an oversized function whole and leave splitting to the enforcer'),
  include_docstrings: z
    .boolean()
    .optional()
    .describe('Emit module docstrings / file headers as their own chunk'),
  max_type_members: positiveInt()
    .optional()
    .describe('Types with more methods than this are split into signature + members (no cap when unset)'),
});

/**
 * Batching of chunks into embedding requests
 */
export const BatchingConfigSchema = z.object({
  max_halving_retries: z
    .number()
    .int()
    .min(0)
    .max(16)
    .describe('How many times an over-budget batch is halved before chunks go one by one'),
  dispatch_timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single batch dispatch (1000-600000, default 120000)'),
  token_model: z.string().min(1).describe('Embedding model whose tokenizer the estimator calibrates to'),
});

/**
 * Document discovery for the bundled directory loader
 */
export const LoaderConfigSchema = z.object({
  ignore_patterns: z
    .array(z.string())
    .optional()
    .describe('Additional gitignore-style patterns to skip'),
  max_file_size_kb: positiveInt().describe('Files larger than this are skipped'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  chunk_size: positiveInt().describe('Window size in characters for the fallback chunker'),
  chunk_overlap: z.number().int().min(0).describe('Characters shared by consecutive fallback windows'),
  use_structural_chunking: z.boolean().describe('Use language-aware chunkers where available'),
  hard_chunk_ceiling: positiveInt().describe('No chunk text may exceed this many characters'),
  max_tokens_per_batch: positiveInt().describe('Token budget of one embedding request'),
  embedding_batch_size: positiveInt().describe('Maximum chunks in one embedding request'),
  max_workers: z
    .number()
    .int()
    .min(0)
    .describe('Documents chunked concurrently (0 = number of CPUs)'),
  batching: BatchingConfigSchema,
  loader: LoaderConfigSchema,
  extensions: z
    .record(z.string(), ExtensionSettingsSchema)
    .describe('Per-extension overrides keyed by extension (".py" or "py")'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ExtensionSettingsOverride = z.infer<typeof ExtensionSettingsSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
