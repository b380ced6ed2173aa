/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml and CHUNKWISE_* environment
 * variables ON TOP of these defaults.
 */

import type { Config } from './schema.js';

const STRUCTURAL_DEFAULTS = { max_chunk_size: 1500, chunk_overlap: 100 };

export const DEFAULT_CONFIG: Config = {
  chunk_size: 1000,
  chunk_overlap: 200,
  use_structural_chunking: true,
  hard_chunk_ceiling: 8000,
  max_tokens_per_batch: 250000,
  embedding_batch_size: 50,
  max_workers: 0,

  batching: {
    max_halving_retries: 3,
    dispatch_timeout_ms: 120000, // 2 minutes
    token_model: 'text-embedding-ada-002',
  },

  loader: {
    ignore_patterns: [],
    max_file_size_kb: 500,
  },

  extensions: {
    '.py': { ...STRUCTURAL_DEFAULTS },
    '.js': { ...STRUCTURAL_DEFAULTS },
    '.ts': { ...STRUCTURAL_DEFAULTS },
    '.cs': { ...STRUCTURAL_DEFAULTS },
    '.md': { ...STRUCTURAL_DEFAULTS },
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.chunkwise/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# chunkwise configuration
# Location: ~/.chunkwise/config.toml

# Fallback (windowed) chunking
chunk_size = ${DEFAULT_CONFIG.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunk_overlap}

# Language-aware chunking for Python, C#, JavaScript, TypeScript and Markdown
use_structural_chunking = ${DEFAULT_CONFIG.use_structural_chunking}

# No chunk is ever longer than this many characters
hard_chunk_ceiling = ${DEFAULT_CONFIG.hard_chunk_ceiling}

# Embedding request budget
max_tokens_per_batch = ${DEFAULT_CONFIG.max_tokens_per_batch}
embedding_batch_size = ${DEFAULT_CONFIG.embedding_batch_size}

# Documents chunked concurrently (0 = number of CPUs)
max_workers = ${DEFAULT_CONFIG.max_workers}

[batching]
max_halving_retries = ${DEFAULT_CONFIG.batching.max_halving_retries}
dispatch_timeout_ms = ${DEFAULT_CONFIG.batching.dispatch_timeout_ms}
token_model = "${DEFAULT_CONFIG.batching.token_model}"

[loader]
max_file_size_kb = ${DEFAULT_CONFIG.loader.max_file_size_kb}
# ignore_patterns = ["*.generated.ts", "vendor/"]

# Per-extension overrides. Anything left out falls back to the globals.
# [extensions.".py"]
# max_chunk_size = 1500
# chunk_overlap = 100
# preserve_type_boundaries = true
# preserve_function_boundaries = true
# include_docstrings = true
# max_type_members = 20   # unset: types split on size only
`;
