/**
 * Config Module Tests
 *
 * Loading, validation, merging and the cross-field rules.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import {
  loadConfig,
  validateConfig,
  getConfigValue,
  listConfig,
  normalizeExtension,
  writeConfigTemplate,
} from '../loader.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects a zero chunk_size', () => {
    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, chunk_size: 0 });
    expect(result.success).toBe(false);
  });

  it('rejects a dispatch timeout below one second', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      batching: { ...DEFAULT_CONFIG.batching, dispatch_timeout_ms: 10 },
    });
    expect(result.success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const result = PartialConfigSchema.safeParse({ batching: { max_halving_retries: 5 } });
    expect(result.success).toBe(true);
  });

  it('rejects unknown value types in extension overrides', () => {
    const result = PartialConfigSchema.safeParse({
      extensions: { '.py': { max_chunk_size: 'big' } },
    });
    expect(result.success).toBe(false);
  });
});

describe('Config Defaults', () => {
  it('carries the documented values', () => {
    expect(DEFAULT_CONFIG.chunk_size).toBe(1000);
    expect(DEFAULT_CONFIG.chunk_overlap).toBe(200);
    expect(DEFAULT_CONFIG.hard_chunk_ceiling).toBe(8000);
    expect(DEFAULT_CONFIG.max_tokens_per_batch).toBe(250000);
    expect(DEFAULT_CONFIG.embedding_batch_size).toBe(50);
    expect(DEFAULT_CONFIG.batching.max_halving_retries).toBe(3);
    expect(DEFAULT_CONFIG.extensions['.py']).toEqual({ max_chunk_size: 1500, chunk_overlap: 100 });
  });

  it('template parses into the defaults', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunkwise-template-'));
    const file = path.join(dir, 'config.toml');
    fs.writeFileSync(file, CONFIG_TEMPLATE, 'utf-8');
    try {
      const config = loadConfig({ configPath: file, env: {} });
      expect(config.chunk_size).toBe(DEFAULT_CONFIG.chunk_size);
      expect(config.batching).toEqual(DEFAULT_CONFIG.batching);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunkwise-config-'));
    configPath = path.join(dir, 'config.toml');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults for an empty file', () => {
    fs.writeFileSync(configPath, '', 'utf-8');

    const config = loadConfig({ configPath, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over the defaults', () => {
    fs.writeFileSync(
      configPath,
      ['chunk_size = 800', '[batching]', 'max_halving_retries = 5'].join('\n'),
      'utf-8'
    );

    const config = loadConfig({ configPath, env: {} });

    expect(config.chunk_size).toBe(800);
    expect(config.chunk_overlap).toBe(200);
    expect(config.batching.max_halving_retries).toBe(5);
    expect(config.batching.dispatch_timeout_ms).toBe(120000);
  });

  it('normalizes extension keys and merges with the built-in override', () => {
    fs.writeFileSync(configPath, ['[extensions.PY]', 'max_type_members = 4'].join('\n'), 'utf-8');

    const config = loadConfig({ configPath, env: {} });

    expect(config.extensions['.py']).toEqual({
      max_chunk_size: 1500,
      chunk_overlap: 100,
      max_type_members: 4,
    });
  });

  it('applies environment overrides above the file', () => {
    fs.writeFileSync(configPath, 'chunk_size = 800', 'utf-8');

    const config = loadConfig({
      configPath,
      env: { CHUNKWISE_CHUNK_SIZE: '900', CHUNKWISE_USE_STRUCTURAL_CHUNKING: 'false' },
    });

    expect(config.chunk_size).toBe(900);
    expect(config.use_structural_chunking).toBe(false);
  });

  it('applies caller overrides above everything', () => {
    fs.writeFileSync(configPath, '', 'utf-8');

    const config = loadConfig({
      configPath,
      env: { CHUNKWISE_CHUNK_SIZE: '900' },
      overrides: { chunk_size: 700 },
    });

    expect(config.chunk_size).toBe(700);
  });

  it('returns a deeply frozen object', () => {
    fs.writeFileSync(configPath, '', 'utf-8');

    const config = loadConfig({ configPath, env: {} });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.batching)).toBe(true);
    expect(Object.isFrozen(config.extensions['.cs'])).toBe(true);
  });

  it('does not freeze the shared defaults', () => {
    fs.writeFileSync(configPath, '', 'utf-8');

    loadConfig({ configPath, env: {} });

    expect(Object.isFrozen(DEFAULT_CONFIG.batching)).toBe(false);
  });

  it('throws ConfigError for invalid TOML', () => {
    fs.writeFileSync(configPath, 'chunk_size = = 3', 'utf-8');

    expect(() => loadConfig({ configPath, env: {} })).toThrow(ConfigError);
  });

  it('throws ConfigError for a wrongly typed value', () => {
    fs.writeFileSync(configPath, 'chunk_size = "large"', 'utf-8');

    expect(() => loadConfig({ configPath, env: {} })).toThrow(/chunk_size/);
  });

  it('throws ConfigError for a missing explicit file', () => {
    expect(() => loadConfig({ configPath: path.join(dir, 'nope.toml'), env: {} })).toThrow(
      'Config file not found'
    );
  });

  it('throws ConfigError for an unparseable environment variable', () => {
    fs.writeFileSync(configPath, '', 'utf-8');

    expect(() => loadConfig({ configPath, env: { CHUNKWISE_CHUNK_SIZE: 'lots' } })).toThrow(
      ConfigError
    );
  });

  it('rejects overlap equal to chunk size', () => {
    fs.writeFileSync(configPath, ['chunk_size = 300', 'chunk_overlap = 300'].join('\n'), 'utf-8');

    expect(() => loadConfig({ configPath, env: {} })).toThrow(
      'chunk_overlap (300) must be smaller than chunk_size (300)'
    );
  });
});

describe('validateConfig', () => {
  it('rejects an extension size above the hard ceiling', () => {
    const config = {
      ...DEFAULT_CONFIG,
      extensions: { '.py': { max_chunk_size: 9000 } },
    };

    expect(() => validateConfig(config)).toThrow(
      'extensions..py: max_chunk_size (9000) exceeds hard_chunk_ceiling (8000)'
    );
  });

  it('checks extension overlap against the inherited global size', () => {
    const config = {
      ...DEFAULT_CONFIG,
      extensions: { '.go': { chunk_overlap: 1000 } },
    };

    expect(() => validateConfig(config)).toThrow(
      'extensions..go: chunk_overlap (1000) must be smaller than max_chunk_size (1000)'
    );
  });

  it('accepts the defaults', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });
});

describe('config helpers', () => {
  it('normalizes extensions', () => {
    expect(normalizeExtension('PY')).toBe('.py');
    expect(normalizeExtension('.Ts')).toBe('.ts');
  });

  it('reads values by dotted key', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'batching.token_model')).toBe('text-embedding-ada-002');
    expect(getConfigValue(DEFAULT_CONFIG, 'batching.missing.deeper')).toBeUndefined();
  });

  it('flattens nested sections', () => {
    const entries = new Map(listConfig(DEFAULT_CONFIG));

    expect(entries.get('chunk_size')).toBe(1000);
    expect(entries.get('extensions..md.max_chunk_size')).toBe(1500);
    expect(entries.get('loader.ignore_patterns')).toEqual([]);
  });

  it('refuses to overwrite an existing file without force', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunkwise-init-'));
    const file = path.join(dir, 'nested', 'config.toml');
    try {
      writeConfigTemplate(file);
      expect(fs.readFileSync(file, 'utf-8')).toBe(CONFIG_TEMPLATE);
      expect(() => writeConfigTemplate(file)).toThrow(ConfigError);
      expect(() => writeConfigTemplate(file, true)).not.toThrow();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
