/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `chunkwise config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  ExtensionSettingsSchema,
  BatchingConfigSchema,
  LoaderConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, ExtensionSettingsOverride } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  validateConfig,
  writeConfigTemplate,
  getConfigValue,
  listConfig,
  getConfigDir,
  getConfigPath,
  normalizeExtension,
  type LoadConfigOptions,
} from './loader.js';

export { loadEnv, parseEnv, envToConfig, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
