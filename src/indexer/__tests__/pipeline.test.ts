/**
 * Ingestion pipeline tests, end to end with an in-memory sink.
 */

import { describe, it, expect, vi } from 'vitest';

import { CancelledError } from '../../errors/index.js';
import { MemorySink } from '../embedder/sinks.js';
import type { Batch, EmbeddingSink } from '../embedder/types.js';
import { ingest } from '../pipeline.js';
import { makeDocument, testConfig } from './helpers.js';

const documents = [
  makeDocument('src/add.py', 'def add(a, b):\n    return a + b\n'),
  makeDocument('docs/blank.md', '   \n'),
  makeDocument('src/broken.py', 'def broken(:\n'),
  makeDocument('notes.txt', 'plain words'),
];

describe('ingest', () => {
  it('chunks and dispatches every document', async () => {
    const sink = new MemorySink();

    const report = await ingest(documents, { config: testConfig(), sink });

    expect(report).toMatchObject({
      documentsProcessed: 4,
      documentsSkipped: 1,
      documentsFailed: 0,
      fallbackDocuments: 2,
      chunksCreated: 3,
      batchesPlanned: 1,
      batchesSent: 1,
      oversizedBatches: 0,
      halvings: 0,
      chunksFailed: [],
      dryRun: false,
      errors: [],
    });
    expect(report.warnings).toEqual(['src/broken.py: source contains syntax errors; using fallback chunker']);
    expect(sink.batches[0]?.chunks.map((chunk) => chunk.metadata.source.path)).toEqual([
      'src/add.py',
      'src/broken.py',
      'notes.txt',
    ]);
    expect(Object.keys(report.stageDurations)).toEqual(['chunking', 'dispatching']);
  });

  it('plans without a sink on a dry run', async () => {
    const report = await ingest(documents, { config: testConfig({ embedding_batch_size: 2 }), dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.batchesPlanned).toBe(2);
    expect(report.batchesSent).toBe(0);
    expect(Object.keys(report.stageDurations)).toEqual(['chunking', 'planning']);
  });

  it('needs a sink unless dry-running', async () => {
    await expect(ingest(documents, { config: testConfig() })).rejects.toThrow(TypeError);
  });

  it('fires stage callbacks in order', async () => {
    const events: string[] = [];
    const onChunks = vi.fn();

    await ingest(documents, {
      config: testConfig(),
      sink: new MemorySink(),
      onStageStart: (stage, total) => events.push(`start ${stage} ${total}`),
      onStageComplete: (stage) => events.push(`complete ${stage}`),
      onWarning: (message) => events.push(`warn ${message}`),
      onChunks,
    });

    expect(events).toEqual([
      'start chunking 4',
      'warn src/broken.py: source contains syntax errors; using fallback chunker',
      'complete chunking',
      'start dispatching 3',
      'complete dispatching',
    ]);
    expect(onChunks).toHaveBeenCalledTimes(1);
    expect(onChunks.mock.calls[0]?.[0]).toHaveLength(3);
  });

  it('reports failed batches without failing the run', async () => {
    const sink: EmbeddingSink = {
      dispatch: async (batch: Batch) => {
        if (batch.id === 1) {
          throw new Error('write refused');
        }
      },
    };
    const onError = vi.fn();

    const report = await ingest(documents, { config: testConfig({ embedding_batch_size: 1 }), sink, onError });

    expect(report.batchesSent).toBe(2);
    expect(report.errors).toEqual(['Batch 1 failed: write refused']);
    expect(report.chunksFailed).toHaveLength(1);
    expect(report.chunksFailed[0]?.documentPath).toBe('src/add.py');
    expect(onError).toHaveBeenCalledWith(expect.any(Error), 'src/add.py');
  });

  it('sends a function over the token budget as one oversized batch', async () => {
    const body = Array.from({ length: 78_000 }, () => '    x = 1');
    const huge = makeDocument('src/huge.py', ['def huge():', ...body, ''].join('\n'));
    const sink = new MemorySink();

    const report = await ingest([huge, makeDocument('notes.txt', 'plain words')], {
      config: testConfig({ hard_chunk_ceiling: 1_000_000 }),
      sink,
    });

    expect(report).toMatchObject({
      chunksCreated: 2,
      batchesSent: 2,
      oversizedBatches: 1,
      documentsFailed: 0,
      chunksFailed: [],
      errors: [],
    });
    const oversized = sink.batches[0];
    expect(oversized?.oversized).toBe(true);
    expect(oversized?.chunks.map((chunk) => chunk.metadata.symbolName)).toEqual(['huge']);
    expect(oversized?.estimatedTokens).toBeGreaterThan(250_000);
    expect(sink.batches[1]?.oversized).toBe(false);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(/^Oversized batch: chunk [0-9a-f]{16}:0 estimates \d+ tokens \(limit 250000\)/);
  });

  it('closes the sink after dispatching', async () => {
    const close = vi.fn(async () => {});
    const sink: EmbeddingSink = { dispatch: async () => {}, close };

    await ingest(documents, { config: testConfig(), sink });

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      ingest(documents, { config: testConfig(), sink: new MemorySink(), signal: controller.signal })
    ).rejects.toThrow(CancelledError);
  });
});
