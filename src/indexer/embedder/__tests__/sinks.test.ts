import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { CollaboratorUnavailableError, TokenLimitExceededError } from '../../../errors/index.js';
import { JsonlBatchWriter, MemorySink } from '../sinks.js';
import type { Batch } from '../types.js';
import { makeChunk } from '../../__tests__/helpers.js';

function batch(id: number, estimatedTokens = 10): Batch {
  return { id, chunks: [makeChunk(`b:${id}`, `text ${id}`)], estimatedTokens, oversized: false };
}

function readLines(file: string): unknown[] {
  return readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('JsonlBatchWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunkwise-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one line per batch, creating directories', async () => {
    const file = join(dir, 'out', 'batches.jsonl');
    const writer = new JsonlBatchWriter(file);

    await writer.dispatch(batch(1));
    await writer.dispatch(batch(2));

    const lines = readLines(file);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ batch: 1, estimatedTokens: 10, oversized: false });
    expect(lines[1]).toMatchObject({ batch: 2, chunks: [{ id: 'b:2', text: 'text 2' }] });
  });

  it('truncates an existing file on the first dispatch', async () => {
    const file = join(dir, 'batches.jsonl');
    writeFileSync(file, '{"stale":true}\n', 'utf-8');

    await new JsonlBatchWriter(file).dispatch(batch(1));

    expect(readLines(file)).toHaveLength(1);
  });

  it('appends when truncation is off', async () => {
    const file = join(dir, 'batches.jsonl');
    writeFileSync(file, '{"stale":true}\n', 'utf-8');

    await new JsonlBatchWriter(file, { truncate: false }).dispatch(batch(1));

    expect(readLines(file)).toEqual([{ stale: true }, expect.objectContaining({ batch: 1 })]);
  });

  it('refuses batches over its token limit', async () => {
    const writer = new JsonlBatchWriter(join(dir, 'batches.jsonl'), { tokenLimit: 100 });

    const error = await writer.dispatch(batch(1, 500)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TokenLimitExceededError);
    expect(error).toMatchObject({ tokens: 500, limit: 100 });
  });

  it('reports an unwritable destination as unavailable', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, '', 'utf-8');
    const writer = new JsonlBatchWriter(join(blocker, 'batches.jsonl'));

    await expect(writer.dispatch(batch(1))).rejects.toThrow(CollaboratorUnavailableError);
  });
});

describe('MemorySink', () => {
  it('keeps batches in dispatch order', async () => {
    const sink = new MemorySink();

    await sink.dispatch(batch(1));
    await sink.dispatch(batch(2));

    expect(sink.batches.map((b) => b.id)).toEqual([1, 2]);
  });
});
