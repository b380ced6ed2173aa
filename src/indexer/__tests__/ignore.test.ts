/**
 * Tests for gitignore handling and the binary checks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  createIgnoreFilter,
  isBinaryFile,
  loadGitignoreFile,
  looksBinary,
  parseGitignoreContent,
} from '../ignore.js';

describe('parseGitignoreContent', () => {
  it('drops blank lines and comments, trims the rest', () => {
    const content = ['# build output', 'dist/', '', '  *.log  ', '!keep.log', '\t'].join('\n');

    expect(parseGitignoreContent(content)).toEqual(['dist/', '*.log', '!keep.log']);
  });

  it('handles CRLF line endings', () => {
    expect(parseGitignoreContent('a.txt\r\nb.txt\r\n')).toEqual(['a.txt', 'b.txt']);
  });
});

describe('with a repository on disk', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'chunkwise-ignore-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('loadGitignoreFile', () => {
    it('returns no patterns when the file is missing', () => {
      expect(loadGitignoreFile(join(root, '.gitignore'))).toEqual([]);
    });

    it('reads and parses the file', () => {
      writeFileSync(join(root, '.gitignore'), '# generated\n*.g.cs\nreports/\n');

      expect(loadGitignoreFile(join(root, '.gitignore'))).toEqual(['*.g.cs', 'reports/']);
    });
  });

  describe('createIgnoreFilter', () => {
    it('applies the default patterns', () => {
      const shouldIgnore = createIgnoreFilter({ rootPath: root });

      expect(shouldIgnore('node_modules/pkg/index.js')).toBe(true);
      expect(shouldIgnore('src/__pycache__/mod.pyc')).toBe(true);
      expect(shouldIgnore('bin/Debug/app.dll')).toBe(true);
      expect(shouldIgnore('src/app.py')).toBe(false);
    });

    it('can skip the defaults', () => {
      const shouldIgnore = createIgnoreFilter({ rootPath: root, useDefaults: false });

      expect(shouldIgnore('node_modules/pkg/index.js')).toBe(false);
    });

    it('layers .gitignore and additional patterns over the defaults', () => {
      writeFileSync(join(root, '.gitignore'), 'generated/\n*.snap\n');
      const shouldIgnore = createIgnoreFilter({ rootPath: root, additionalPatterns: ['fixtures/'] });

      expect(shouldIgnore('generated/models.py')).toBe(true);
      expect(shouldIgnore('tests/output.snap')).toBe(true);
      expect(shouldIgnore('fixtures/big.py')).toBe(true);
      expect(shouldIgnore('src/generated.py')).toBe(false);
    });

    it('honours negations from the defaults', () => {
      const shouldIgnore = createIgnoreFilter({ rootPath: root });

      expect(shouldIgnore('.env')).toBe(true);
      expect(shouldIgnore('.env.local')).toBe(true);
      expect(shouldIgnore('.env.example')).toBe(false);
    });

    it('accepts absolute paths under the root', () => {
      const shouldIgnore = createIgnoreFilter({ rootPath: root });

      expect(shouldIgnore(join(root, 'node_modules', 'x.js'))).toBe(true);
      expect(shouldIgnore(join(root, 'src', 'x.js'))).toBe(false);
    });

    it('never ignores the root itself', () => {
      expect(createIgnoreFilter({ rootPath: root })(root)).toBe(false);
    });
  });
});

describe('isBinaryFile', () => {
  it('recognizes binary extensions case-insensitively', () => {
    expect(isBinaryFile('logo.PNG')).toBe(true);
    expect(isBinaryFile('song.mp3')).toBe(true);
    expect(isBinaryFile('main.py')).toBe(false);
    expect(isBinaryFile('Makefile')).toBe(false);
  });
});

describe('looksBinary', () => {
  it('flags a NUL byte near the start', () => {
    expect(looksBinary(Buffer.from([0x50, 0x4b, 0x00, 0x01]))).toBe(true);
    expect(looksBinary(Buffer.from('plain text\n', 'utf-8'))).toBe(false);
  });

  it('only inspects the first 8KB', () => {
    const content = Buffer.concat([Buffer.alloc(8192, 0x61), Buffer.from([0x00])]);

    expect(looksBinary(content)).toBe(false);
  });
});
