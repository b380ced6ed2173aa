/**
 * Tests for the file scanner and the directory loader
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve, join } from 'node:path';
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';

import { scanDirectory } from '../scanner.js';
import { loadDocuments } from '../loader.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'chunkwise-scan-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function createFile(relativePath: string, content: string | Buffer = ''): string {
  const fullPath = join(tempDir, relativePath);
  mkdirSync(resolve(fullPath, '..'), { recursive: true });
  writeFileSync(fullPath, content);
  return fullPath;
}

describe('scanDirectory', () => {
  it('discovers nested files in sorted order with forward-slash paths', async () => {
    createFile('src/utils/helpers.py', 'x = 1\n');
    createFile('src/app.py', 'y = 2\n');
    createFile('README.md', '# Readme\n');

    const result = await scanDirectory(tempDir);

    expect(result.rootPath).toBe(tempDir);
    expect(result.files.map((file) => file.relativePath)).toEqual([
      'README.md',
      'src/app.py',
      'src/utils/helpers.py',
    ]);
    expect(result.stats.totalFiles).toBe(3);
  });

  it('filters by extension', async () => {
    createFile('a.py');
    createFile('b.cs');
    createFile('c.md');

    const result = await scanDirectory(tempDir, { extensions: ['.py', 'cs'] });

    expect(result.files.map((file) => file.relativePath)).toEqual(['a.py', 'b.cs']);
  });

  it('respects maxDepth', async () => {
    createFile('level1.py');
    createFile('a/level2.py');
    createFile('a/b/level3.py');

    const result = await scanDirectory(tempDir, { maxDepth: 2 });

    expect(result.files.map((file) => file.relativePath)).toEqual(['a/level2.py', 'level1.py']);
  });

  it('applies the default ignores, .gitignore and extra patterns', async () => {
    createFile('node_modules/pkg/index.js');
    createFile('generated/models.py');
    createFile('fixtures/sample.py');
    createFile('src/main.py');
    createFile('.gitignore', 'generated/\n');

    const result = await scanDirectory(tempDir, { additionalIgnorePatterns: ['fixtures/'] });

    expect(result.files.map((file) => file.relativePath)).toEqual(['src/main.py']);
  });

  it('skips files over the size limit and reports them', async () => {
    createFile('big.py', 'x'.repeat(2048));
    createFile('small.py', 'x = 1\n');
    const onSkip = vi.fn();

    const result = await scanDirectory(tempDir, { maxFileSize: 1024, onSkip });

    expect(result.files.map((file) => file.relativePath)).toEqual(['small.py']);
    expect(result.stats.skipped).toBe(1);
    expect(onSkip).toHaveBeenCalledWith('big.py', 'File too large (2KB > 1KB)');
  });

  it('records metadata and per-language statistics', async () => {
    createFile('a.py', 'abc');
    createFile('b.py', 'de');
    createFile('notes.md', '#');
    const onFile = vi.fn();

    const result = await scanDirectory(tempDir, { onFile });

    const first = result.files[0];
    expect(first?.extension).toBe('py');
    expect(first?.language).toBe('python');
    expect(first?.size).toBe(3);
    expect(first?.path).toBe(join(tempDir, 'a.py'));
    expect(result.stats.byLanguage).toEqual({ python: 2, markdown: 1 });
    expect(result.stats.totalSize).toBe(6);
    expect(onFile).toHaveBeenCalledTimes(3);
  });

  it('returns an empty result for a missing directory', async () => {
    const result = await scanDirectory(join(tempDir, 'missing'));

    expect(result.files).toEqual([]);
    expect(result.stats.totalFiles).toBe(0);
  });
});

describe('loadDocuments', () => {
  it('reads files into documents with the given source', async () => {
    createFile('src/app.py', 'print("hi")\n');
    createFile('docs/guide.md', '# Guide\n');

    const result = await loadDocuments(tempDir, { source: { repository: 'demo', branch: 'main' } });

    expect(result.documents).toEqual([
      {
        content: '# Guide\n',
        path: 'docs/guide.md',
        languageHint: 'markdown',
        source: { repository: 'demo', branch: 'main' },
      },
      {
        content: 'print("hi")\n',
        path: 'src/app.py',
        languageHint: 'python',
        source: { repository: 'demo', branch: 'main' },
      },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it('skips files with binary content', async () => {
    createFile('data.txt', Buffer.from([0x68, 0x00, 0x69]));
    createFile('notes.txt', 'fine');
    const onSkip = vi.fn();

    const result = await loadDocuments(tempDir, { onSkip });

    expect(result.documents.map((document) => document.path)).toEqual(['notes.txt']);
    expect(result.skipped).toEqual([{ path: 'data.txt', reason: 'Binary content' }]);
    expect(onSkip).toHaveBeenCalledWith('data.txt', 'Binary content');
  });

  it('collects size skips from the scan', async () => {
    createFile('big.py', 'x'.repeat(4096));

    const result = await loadDocuments(tempDir, { maxFileSize: 1024 });

    expect(result.documents).toEqual([]);
    expect(result.skipped).toEqual([{ path: 'big.py', reason: 'File too large (4KB > 1KB)' }]);
  });
});
