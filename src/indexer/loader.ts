/**
 * Directory Loader
 *
 * Turns a scanned directory into `Document` values for the chunking core.
 */

import { readFile } from 'node:fs/promises';

import { looksBinary } from './ignore.js';
import { scanDirectory } from './scanner.js';
import type { Document, DocumentSource, ScanOptions, ScanStats } from './types.js';

export interface LoadOptions extends Omit<ScanOptions, 'onFile'> {
  /** Copied onto every document */
  source?: DocumentSource;
  /** Invoked after each file has been read */
  onDocument?: (document: Document) => void;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface LoadResult {
  rootPath: string;
  documents: Document[];
  skipped: SkippedFile[];
  stats: ScanStats;
}

/**
 * Scan `rootPath` and read every accepted file as UTF-8.
 *
 * Files that fail to read or contain NUL bytes are reported in `skipped`
 * rather than thrown.
 */
export async function loadDocuments(rootPath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const skipped: SkippedFile[] = [];
  const { source = {}, onDocument, onSkip, ...scanOptions } = options;

  const scan = await scanDirectory(rootPath, {
    ...scanOptions,
    onSkip: (path, reason) => {
      skipped.push({ path, reason });
      onSkip?.(path, reason);
    },
  });

  const documents: Document[] = [];
  for (const file of scan.files) {
    let raw: Buffer;
    try {
      raw = await readFile(file.path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      skipped.push({ path: file.relativePath, reason });
      onSkip?.(file.relativePath, reason);
      continue;
    }

    if (looksBinary(raw)) {
      skipped.push({ path: file.relativePath, reason: 'Binary content' });
      onSkip?.(file.relativePath, 'Binary content');
      continue;
    }

    const document: Document = {
      content: raw.toString('utf-8'),
      path: file.relativePath,
      languageHint: file.language,
      source,
    };
    documents.push(document);
    onDocument?.(document);
  }

  return { rootPath: scan.rootPath, documents, skipped, stats: scan.stats };
}
