/**
 * Configuration Loader
 *
 * 1. Read config.toml (default ~/.chunkwise/config.toml, or an explicit path)
 * 2. Validate it against the partial schema
 * 3. Merge defaults <- file <- CHUNKWISE_* env <- caller overrides
 * 4. Validate the merged result, including cross-field rules
 * 5. Freeze it; the same object is shared by the factory and the planner
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { envToConfig, loadEnv, parseEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  configPath?: string;
  /** Write the template to the default location when no file exists */
  createIfMissing?: boolean;
  /** Environment to read CHUNKWISE_* from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, e.g. from CLI flags */
  overrides?: PartialConfig;
}

/**
 * ~/.chunkwise
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), '.chunkwise');
}

/**
 * ~/.chunkwise/config.toml
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.toml');
}

/**
 * Lowercase and dot-prefix an extension: "PY" -> ".py".
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge, with source values overriding target.
 * Arrays and primitives are replaced, objects are merged key by key.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Re-key `extensions` so that "py", ".PY" and ".py" all land on ".py".
 */
function normalizeOverlay(overlay: PartialConfig): PartialConfig {
  if (!overlay.extensions) {
    return overlay;
  }
  const extensions: NonNullable<PartialConfig['extensions']> = {};
  for (const [key, value] of Object.entries(overlay.extensions)) {
    const normalized = normalizeExtension(key);
    extensions[normalized] = { ...extensions[normalized], ...value };
  }
  return { ...overlay, extensions };
}

function readConfigFile(configPath: string): PartialConfig {
  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(`Invalid TOML in config file: ${message}`, `Fix the syntax in ${configPath}`);
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validationResult.error.issues)}`,
      'Run: chunkwise config init --force  to restore defaults'
    );
  }

  return validationResult.data;
}

/**
 * Cross-field rules the schema cannot express.
 *
 * @throws ConfigError listing every violated rule
 */
export function validateConfig(config: Config): void {
  const problems: string[] = [];
  const ceiling = config.hard_chunk_ceiling;

  if (config.chunk_overlap >= config.chunk_size) {
    problems.push(
      `chunk_overlap (${config.chunk_overlap}) must be smaller than chunk_size (${config.chunk_size})`
    );
  }
  if (config.chunk_size > ceiling) {
    problems.push(`chunk_size (${config.chunk_size}) exceeds hard_chunk_ceiling (${ceiling})`);
  }

  for (const [extension, settings] of Object.entries(config.extensions)) {
    const size = settings.max_chunk_size ?? config.chunk_size;
    const overlap = settings.chunk_overlap ?? config.chunk_overlap;
    if (overlap >= size) {
      problems.push(
        `extensions.${extension}: chunk_overlap (${overlap}) must be smaller than max_chunk_size (${size})`
      );
    }
    if (size > ceiling) {
      problems.push(`extensions.${extension}: max_chunk_size (${size}) exceeds hard_chunk_ceiling (${ceiling})`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
}

/**
 * Load, merge, validate and freeze the configuration.
 *
 * @throws ConfigError on unreadable or invalid configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<Config> {
  const { configPath, createIfMissing = false, overrides } = options;
  let fileOverlay: PartialConfig = {};

  if (configPath !== undefined) {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, 'Check the --config path');
    }
    fileOverlay = readConfigFile(configPath);
  } else {
    const defaultPath = getConfigPath();
    if (fs.existsSync(defaultPath)) {
      fileOverlay = readConfigFile(defaultPath);
    } else if (createIfMissing) {
      writeConfigTemplate(defaultPath);
    }
  }

  const envOverlay = envToConfig(options.env ? parseEnv(options.env) : loadEnv());

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const overlay of [fileOverlay, envOverlay, overrides ?? {}]) {
    merged = deepMerge(merged, normalizeOverlay(overlay));
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }

  validateConfig(result.data);
  return deepFreeze(result.data);
}

/**
 * Write the commented template. Refuses to overwrite unless `force`.
 */
export function writeConfigTemplate(configPath: string = getConfigPath(), force = false): void {
  if (fs.existsSync(configPath) && !force) {
    throw new ConfigError(`Config file already exists: ${configPath}`, 'Pass --force to overwrite it');
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue(config, 'batching.token_model') => 'text-embedding-ada-002'
 */
export function getConfigValue(config: Readonly<Config>, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Flatten the config into [key, value] pairs for display.
 */
export function listConfig(config: Readonly<Config>): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten({ ...config }, '');
  return entries;
}
