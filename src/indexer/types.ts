/**
 * Document and File Discovery Types
 *
 * `Document` is the unit the chunking core consumes. The scanner types
 * describe the bundled directory loader that produces documents for the CLI.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const LANGUAGES = [
  'typescript',
  'javascript',
  'python',
  'csharp',
  'markdown',
  'go',
  'rust',
  'java',
  'c',
  'cpp',
  'ruby',
  'php',
  'swift',
  'kotlin',
  'scala',
  'html',
  'css',
  'json',
  'yaml',
  'toml',
  'sql',
  'shell',
  'text',
] as const;

export type Language = (typeof LANGUAGES)[number];

/** Language of a document; 'unknown' when the extension is not in the table */
export type LanguageHint = Language | 'unknown';

/**
 * Where a document came from. All fields are optional; the core copies
 * them onto every chunk untouched.
 */
export interface DocumentSource {
  readonly repository?: string;
  readonly branch?: string;
  readonly commit?: string;
}

/**
 * A source file handed to the chunking core. Never mutated.
 */
export interface Document {
  /** UTF-8 text of the file */
  readonly content: string;
  /** Repository-relative path, forward slashes */
  readonly path: string;
  readonly languageHint: LanguageHint;
  readonly source: DocumentSource;
}

/**
 * Metadata about a discovered file.
 */
export interface FileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root directory, forward slashes */
  relativePath: string;

  /** File extension without the dot (e.g., 'ts', 'py') */
  extension: string;

  language: LanguageHint;

  /** File size in bytes */
  size: number;

  /** Last modified timestamp (ISO 8601) */
  modifiedAt: string;
}

/**
 * Options for configuring the file scanner.
 */
export interface ScanOptions {
  /**
   * Maximum directory depth to traverse.
   * - 0: Only scan files in the root directory
   * - Infinity (default): No limit
   */
  maxDepth?: number;

  /**
   * Only include files with these extensions (without dot).
   * Defaults to every extension in the language table.
   * @example ['ts', 'py']
   */
  extensions?: string[];

  /**
   * Additional gitignore-style patterns, merged with .gitignore.
   * @example ['*.generated.cs', 'fixtures/']
   */
  additionalIgnorePatterns?: string[];

  /** Files larger than this (bytes) are skipped and reported */
  maxFileSize?: number;

  /** @default false */
  followSymlinks?: boolean;

  /** Invoked for each discovered file */
  onFile?: (file: FileInfo) => void;

  /** Invoked when a file is skipped because it could not be read or is too large */
  onSkip?: (path: string, reason: string) => void;
}

export interface ScanStats {
  totalFiles: number;

  /** Total size of all files in bytes */
  totalSize: number;

  byLanguage: Partial<Record<LanguageHint, number>>;

  /** Files skipped for size or read errors */
  skipped: number;

  scanDurationMs: number;
}

export interface ScanResult {
  /** Root directory that was scanned (absolute) */
  rootPath: string;
  files: FileInfo[];
  stats: ScanStats;
}

const FileTypesSchema = z.object({
  extensions: z.record(z.string(), z.enum(LANGUAGES)),
  ignorePatterns: z.array(z.string()),
  binaryExtensions: z.array(z.string()),
});

// data/ sits two levels above both src/indexer and dist/indexer
const fileTypes = FileTypesSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/file-types.json', import.meta.url), 'utf-8'))
);

/**
 * Extension (without dot, lowercase) to language.
 */
export const EXTENSION_TO_LANGUAGE: ReadonlyMap<string, Language> = new Map(
  Object.entries(fileTypes.extensions)
);

/**
 * Patterns always applied in addition to .gitignore.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = fileTypes.ignorePatterns;

export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set(fileTypes.binaryExtensions);

export const DEFAULT_SUPPORTED_EXTENSIONS: readonly string[] = [...EXTENSION_TO_LANGUAGE.keys()];

/**
 * Get the language for a file extension (with or without the dot).
 */
export function getLanguageForExtension(extension: string): LanguageHint {
  const normalized = extension.toLowerCase().replace(/^\./, '');
  return EXTENSION_TO_LANGUAGE.get(normalized) ?? 'unknown';
}

/**
 * Lowercased extension of a path including the dot, or '' when it has none.
 * Works on forward- and back-slash paths.
 */
export function extensionOf(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? '' : base.slice(dot).toLowerCase();
}
