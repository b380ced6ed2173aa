/**
 * Gitignore Pattern Handling
 *
 * Uses the 'ignore' package, which implements gitignore matching rules.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { BINARY_EXTENSIONS, DEFAULT_IGNORE_PATTERNS } from './types.js';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (merged with .gitignore) */
  additionalPatterns?: readonly string[];

  /** Whether to use default ignore patterns */
  useDefaults?: boolean;
}

/**
 * Returns true if the path should be IGNORED.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Load gitignore patterns from a file. Missing file gives no patterns.
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Split gitignore content into patterns, dropping blanks and comments.
 * Negations (`!pattern`) are kept.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Build an ignore filter for a root directory from, in increasing
 * priority: DEFAULT_IGNORE_PATTERNS, the root .gitignore, additional patterns.
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/repo', additionalPatterns: ['*.gen.cs'] });
 * shouldIgnore('node_modules/pkg/index.js'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add([...DEFAULT_IGNORE_PATTERNS]);
  }

  const gitignorePatterns = loadGitignoreFile(join(rootPath, '.gitignore'));
  if (gitignorePatterns.length > 0) {
    ig.add(gitignorePatterns);
  }

  if (additionalPatterns.length > 0) {
    ig.add([...additionalPatterns]);
  }

  // ignore expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = filePath.startsWith(rootPath) ? relative(rootPath, filePath) : filePath;

    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // The root itself is never ignored
    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}

/**
 * Extension-based binary check.
 */
export function isBinaryFile(filename: string): boolean {
  const ext = filename.split('.').pop()?.toLowerCase() ?? '';
  return BINARY_EXTENSIONS.has(ext);
}

/**
 * Content-based binary check: a NUL byte in the first 8KB.
 */
export function looksBinary(content: Buffer): boolean {
  const head = content.subarray(0, 8192);
  return head.includes(0);
}
