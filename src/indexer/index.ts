/**
 * Indexer Module
 *
 * Loads documents from disk, chunks them along semantic boundaries and
 * dispatches the chunks in token-budgeted batches.
 *
 * @example
 * ```ts
 * import { loadDocuments, ingest, JsonlBatchWriter } from './indexer/index.js';
 *
 * const { documents } = await loadDocuments('/path/to/repo');
 * const report = await ingest(documents, {
 *   config,
 *   sink: new JsonlBatchWriter('batches.jsonl'),
 * });
 * console.log(`${report.chunksCreated} chunks in ${report.batchesSent} batches`);
 * ```
 */

// Document loading
export { scanDirectory } from './scanner.js';
export { loadDocuments, type LoadOptions, type LoadResult, type SkippedFile } from './loader.js';
export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  isBinaryFile,
  looksBinary,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

export {
  type Language,
  type LanguageHint,
  type Document,
  type DocumentSource,
  type FileInfo,
  type ScanOptions,
  type ScanStats,
  type ScanResult,
  LANGUAGES,
  EXTENSION_TO_LANGUAGE,
  DEFAULT_SUPPORTED_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
  getLanguageForExtension,
  extensionOf,
} from './types.js';

// Chunking
export * from './chunker/index.js';

// Batching
export * from './embedder/index.js';

// Pipeline orchestration
export {
  ingest,
  type IngestOptions,
  type IngestionReport,
  type IngestionStage,
  type StageStats,
} from './pipeline.js';
