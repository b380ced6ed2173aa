import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors/index.js';
import { ChunkOptionsSchema, IngestOptionsSchema, validateOptions } from '../validation.js';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('validateOptions', () => {
  it('normalizes the extension list', () => {
    const options = validateOptions(ChunkOptionsSchema, { ext: ' .PY, cs' });

    expect(options.ext).toEqual(['py', 'cs']);
  });

  it('rejects an extension list with nothing in it', () => {
    expect(issuesOf(() => validateOptions(ChunkOptionsSchema, { ext: ' , ' }))).toEqual([
      '--ext: At least one extension is required',
    ]);
  });

  it('coerces --show to a positive integer', () => {
    expect(validateOptions(ChunkOptionsSchema, { show: '5' }).show).toBe(5);
    expect(issuesOf(() => validateOptions(ChunkOptionsSchema, { show: '0' }))).toEqual([
      '--show: Must be greater than 0',
    ]);
  });

  it('requires --out or --dry-run for ingest', () => {
    let caught: unknown;
    try {
      validateOptions(IngestOptionsSchema, { dryRun: false });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid command options',
      issues: ['--out: Either --out <file> or --dry-run is required'],
      hint: 'Issues:\n  --out: Either --out <file> or --dry-run is required',
    });
  });

  it('accepts a dry run without an output file', () => {
    expect(validateOptions(IngestOptionsSchema, { dryRun: true })).toEqual({ dryRun: true });
  });

  it('names camelCase options by their flag', () => {
    const issues = issuesOf(() => validateOptions(IngestOptionsSchema, { out: 'b.jsonl', tokenLimit: '1.5' }));

    expect(issues).toEqual(['--token-limit: Must be a whole number']);
  });
});
