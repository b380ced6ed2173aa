/**
 * Environment Variable Handler
 *
 * CHUNKWISE_* variables override config.toml. A .env file in the working
 * directory is honoured for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { PartialConfig } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

const intVar = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => Number.parseInt(value, 10));

const boolVar = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const EnvSchema = z.object({
  CHUNKWISE_CHUNK_SIZE: intVar.optional(),
  CHUNKWISE_CHUNK_OVERLAP: intVar.optional(),
  CHUNKWISE_USE_STRUCTURAL_CHUNKING: boolVar.optional(),
  CHUNKWISE_MAX_TOKENS_PER_BATCH: intVar.optional(),
  CHUNKWISE_EMBEDDING_BATCH_SIZE: intVar.optional(),
  CHUNKWISE_HARD_CHUNK_CEILING: intVar.optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment (loaded once at first access).
 * _clearEnvCache() resets it for tests.
 */
let _envCache: EnvVars | null = null;

/**
 * Parse CHUNKWISE_* variables from an environment object.
 *
 * @throws ConfigError when a variable is set to something unparseable
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvVars {
  const result = EnvSchema.safeParse({
    CHUNKWISE_CHUNK_SIZE: nonEmpty(source.CHUNKWISE_CHUNK_SIZE),
    CHUNKWISE_CHUNK_OVERLAP: nonEmpty(source.CHUNKWISE_CHUNK_OVERLAP),
    CHUNKWISE_USE_STRUCTURAL_CHUNKING: nonEmpty(source.CHUNKWISE_USE_STRUCTURAL_CHUNKING),
    CHUNKWISE_MAX_TOKENS_PER_BATCH: nonEmpty(source.CHUNKWISE_MAX_TOKENS_PER_BATCH),
    CHUNKWISE_EMBEDDING_BATCH_SIZE: nonEmpty(source.CHUNKWISE_EMBEDDING_BATCH_SIZE),
    CHUNKWISE_HARD_CHUNK_CEILING: nonEmpty(source.CHUNKWISE_HARD_CHUNK_CEILING),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment variables:\n${issues}`,
      'Fix or unset the listed CHUNKWISE_* variables'
    );
  }

  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load the process environment (cached after the first call).
 */
export function loadEnv(): EnvVars {
  if (_envCache === null) {
    _envCache = parseEnv(process.env);
  }
  return _envCache;
}

/**
 * Translate parsed environment variables into a sparse config overlay.
 */
export function envToConfig(env: EnvVars): PartialConfig {
  const overlay: PartialConfig = {};
  if (env.CHUNKWISE_CHUNK_SIZE !== undefined) overlay.chunk_size = env.CHUNKWISE_CHUNK_SIZE;
  if (env.CHUNKWISE_CHUNK_OVERLAP !== undefined) overlay.chunk_overlap = env.CHUNKWISE_CHUNK_OVERLAP;
  if (env.CHUNKWISE_USE_STRUCTURAL_CHUNKING !== undefined) {
    overlay.use_structural_chunking = env.CHUNKWISE_USE_STRUCTURAL_CHUNKING;
  }
  if (env.CHUNKWISE_MAX_TOKENS_PER_BATCH !== undefined) {
    overlay.max_tokens_per_batch = env.CHUNKWISE_MAX_TOKENS_PER_BATCH;
  }
  if (env.CHUNKWISE_EMBEDDING_BATCH_SIZE !== undefined) {
    overlay.embedding_batch_size = env.CHUNKWISE_EMBEDDING_BATCH_SIZE;
  }
  if (env.CHUNKWISE_HARD_CHUNK_CEILING !== undefined) {
    overlay.hard_chunk_ceiling = env.CHUNKWISE_HARD_CHUNK_CEILING;
  }
  return overlay;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
