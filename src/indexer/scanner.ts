/**
 * File Scanner
 *
 * Directory traversal with fast-glob. Applies the ignore filter, the binary
 * check and the size limit, and gathers metadata for each file.
 */

import { statSync } from 'node:fs';
import { resolve, relative, extname, basename, sep } from 'node:path';
import fg from 'fast-glob';

import { createIgnoreFilter, isBinaryFile } from './ignore.js';
import {
  DEFAULT_SUPPORTED_EXTENSIONS,
  getLanguageForExtension,
  type FileInfo,
  type ScanOptions,
  type ScanResult,
  type ScanStats,
} from './types.js';

/**
 * Scan a directory for files to chunk.
 *
 * @param rootPath - Directory to scan (absolute or relative path)
 * @throws Error if the root directory cannot be traversed
 *
 * @example
 * ```ts
 * const result = await scanDirectory('./my-repo', { extensions: ['py', 'cs'] });
 * console.log(`Discovered ${result.stats.totalFiles} files`);
 * ```
 */
export async function scanDirectory(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const startTime = performance.now();
  const absoluteRoot = resolve(rootPath);
  const extensions = options.extensions ?? DEFAULT_SUPPORTED_EXTENSIONS;

  const ignoreFilter = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: options.additionalIgnorePatterns,
    useDefaults: true,
  });

  const stats: ScanStats = {
    totalFiles: 0,
    totalSize: 0,
    byLanguage: {},
    skipped: 0,
    scanDurationMs: 0,
  };
  const files: FileInfo[] = [];

  let entries: string[];
  try {
    entries = await fg(buildGlobPatterns(extensions), {
      cwd: absoluteRoot,
      absolute: true,
      dot: false,
      onlyFiles: true,
      followSymbolicLinks: options.followSymlinks ?? false,
      deep: options.maxDepth ?? Infinity,
      suppressErrors: true,
      caseSensitiveMatch: false,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to scan directory: ${absoluteRoot}. ${message}`);
  }

  // fast-glob order depends on the file system; sort for stable document order
  entries.sort();

  for (const absolutePath of entries) {
    const relativePath = relative(absoluteRoot, absolutePath);

    if (ignoreFilter(relativePath) || isBinaryFile(basename(absolutePath))) {
      continue;
    }

    let fileInfo: FileInfo;
    try {
      fileInfo = getFileInfo(absolutePath, absoluteRoot);
    } catch (error) {
      stats.skipped++;
      options.onSkip?.(absolutePath, error instanceof Error ? error.message : String(error));
      continue;
    }

    if (options.maxFileSize !== undefined && fileInfo.size > options.maxFileSize) {
      stats.skipped++;
      options.onSkip?.(
        fileInfo.relativePath,
        `File too large (${Math.round(fileInfo.size / 1024)}KB > ${Math.round(options.maxFileSize / 1024)}KB)`
      );
      continue;
    }

    files.push(fileInfo);
    stats.totalFiles++;
    stats.totalSize += fileInfo.size;
    stats.byLanguage[fileInfo.language] = (stats.byLanguage[fileInfo.language] ?? 0) + 1;

    options.onFile?.(fileInfo);
  }

  stats.scanDurationMs = Math.round(performance.now() - startTime);

  return { rootPath: absoluteRoot, files, stats };
}

/**
 * `**\/*.{ts,py,...}` for the given extensions.
 */
function buildGlobPatterns(extensions: readonly string[]): string[] {
  const cleaned = extensions.map((e) => e.replace(/^\./, '').toLowerCase()).filter((e) => e !== '');
  if (cleaned.length === 0) {
    return [];
  }
  if (cleaned.length === 1) {
    return [`**/*.${cleaned[0]}`];
  }
  return [`**/*.{${cleaned.join(',')}}`];
}

function getFileInfo(absolutePath: string, rootPath: string): FileInfo {
  const stat = statSync(absolutePath);
  const ext = extname(absolutePath).toLowerCase().replace(/^\./, '');

  return {
    path: absolutePath,
    relativePath: relative(rootPath, absolutePath).split(sep).join('/'),
    extension: ext,
    language: getLanguageForExtension(ext),
    size: stat.size,
    modifiedAt: stat.mtime.toISOString(),
  };
}
