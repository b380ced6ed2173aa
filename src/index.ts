/**
 * chunkwise - Library Entry Point
 *
 * The CLI (`chunkwise`) covers the common workflows:
 * ```bash
 * chunkwise chunk ./my-repo
 * chunkwise ingest ./my-repo --out batches.jsonl
 * ```
 *
 * Programmatic use goes through the same pieces:
 *
 * @example
 * ```typescript
 * import { loadConfig, loadDocuments, ingest, type EmbeddingSink } from 'chunkwise';
 *
 * const sink: EmbeddingSink = {
 *   async dispatch(batch) {
 *     await vectorStore.embedAndStore(batch.chunks);
 *   },
 * };
 *
 * const config = loadConfig();
 * const { documents } = await loadDocuments('./my-repo');
 * const report = await ingest(documents, { config, sink });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './indexer/index.js';

export {
  loadConfig,
  validateConfig,
  writeConfigTemplate,
  getConfigPath,
  normalizeExtension,
  DEFAULT_CONFIG,
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
  type ExtensionSettingsOverride,
  type LoadConfigOptions,
} from './config/index.js';

export {
  CLIError,
  ConfigError,
  FileNotFoundError,
  ValidationError,
  DocumentProcessingError,
  TokenLimitExceededError,
  DispatchTimeoutError,
  CollaboratorUnavailableError,
  CancelledError,
  formatError,
  describeError,
} from './errors/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
