/**
 * Tests for the ingest command
 *
 * Runs against a temporary repository with --json so the reporter writes
 * NDJSON events to console.log instead of driving a spinner.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ValidationError } from '../../../errors/index.js';
import type { CommandContext } from '../../types.js';
import { createIngestCommand } from '../ingest.js';

describe('createIngestCommand', () => {
  let repo: string;
  let home: string;
  let configPath: string;
  let events: Array<{ type: string; data: Record<string, unknown> }>;
  let mockContext: CommandContext;
  let exitCode: typeof process.exitCode;

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), 'chunkwise-repo-'));
    home = mkdtempSync(join(tmpdir(), 'chunkwise-home-'));
    configPath = join(home, 'config.toml');
    writeFileSync(configPath, 'embedding_batch_size = 1\n', 'utf-8');

    mkdirSync(join(repo, 'src'));
    writeFileSync(join(repo, 'src', 'add.py'), 'def add(a, b):\n    return a + b\n');
    writeFileSync(join(repo, 'notes.txt'), 'plain words');

    events = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      events.push(JSON.parse(String(line)));
    });
    mockContext = {
      options: { verbose: false, json: true, config: configPath },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    exitCode = process.exitCode;
  });

  afterEach(() => {
    process.exitCode = exitCode;
    vi.restoreAllMocks();
    rmSync(repo, { recursive: true, force: true });
    rmSync(home, { recursive: true, force: true });
  });

  it('writes one JSONL line per batch', async () => {
    const out = join(home, 'batches.jsonl');

    await createIngestCommand(() => mockContext).parseAsync([repo, '--out', out], { from: 'user' });

    const lines = readFileSync(out, 'utf-8').trim().split('\n').map((line) => JSON.parse(line));
    expect(lines.map((line) => line.batch)).toEqual([1, 2]);
    expect(lines.map((line) => line.chunks[0].metadata.source.path)).toEqual(['notes.txt', 'src/add.py']);

    const complete = events.find((event) => event.type === 'complete');
    expect(complete?.data.report).toMatchObject({
      documentsProcessed: 2,
      chunksCreated: 2,
      batchesSent: 2,
      dryRun: false,
    });
    expect(process.exitCode).toBe(exitCode);
  });

  it('plans without writing on --dry-run', async () => {
    const out = join(home, 'batches.jsonl');

    await createIngestCommand(() => mockContext).parseAsync([repo, '--dry-run', '--out', out], { from: 'user' });

    expect(existsSync(out)).toBe(false);
    const complete = events.find((event) => event.type === 'complete');
    expect(complete?.data.report).toMatchObject({ dryRun: true, batchesPlanned: 2, batchesSent: 0 });
  });

  it('marks the run failed when the token limit refuses a batch', async () => {
    const out = join(home, 'batches.jsonl');

    await createIngestCommand(() => mockContext).parseAsync([repo, '--out', out, '--token-limit', '1'], {
      from: 'user',
    });

    const complete = events.find((event) => event.type === 'complete');
    expect(complete?.data.report).toMatchObject({ batchesSent: 0, documentsFailed: 0 });
    expect(process.exitCode).toBe(1);
  });

  it('requires --out or --dry-run', async () => {
    await expect(createIngestCommand(() => mockContext).parseAsync([repo], { from: 'user' })).rejects.toThrow(
      ValidationError
    );
  });
});
