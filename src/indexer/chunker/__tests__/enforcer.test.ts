import { describe, it, expect } from 'vitest';

import { ChunkSizeEnforcer } from '../enforcer.js';
import { makeChunk } from '../../__tests__/helpers.js';

describe('ChunkSizeEnforcer', () => {
  const enforcer = new ChunkSizeEnforcer(10);

  it('rejects a ceiling below one', () => {
    expect(() => new ChunkSizeEnforcer(0)).toThrow(RangeError);
    expect(() => new ChunkSizeEnforcer(1.5)).toThrow(RangeError);
  });

  it('passes chunks within the ceiling through untouched', () => {
    const chunk = makeChunk('abc:0', 'x'.repeat(10));

    const [result] = enforcer.enforce(chunk);

    expect(result).toBe(chunk);
  });

  it('cuts at the last line break within the ceiling', () => {
    const chunk = makeChunk('abc:0', 'aaaa\nbbbb\ncccc', { lineStart: 1, lineEnd: 3 });

    const fragments = enforcer.enforce(chunk);

    expect(fragments.map((fragment) => fragment.text)).toEqual(['aaaa\nbbbb\n', 'cccc']);
    expect(fragments.map((fragment) => fragment.id)).toEqual(['abc:0#0', 'abc:0#1']);
    expect(fragments.map((fragment) => [fragment.metadata.lineStart, fragment.metadata.lineEnd])).toEqual([
      [1, 2],
      [3, 3],
    ]);
  });

  it('cuts a single long line mid-line', () => {
    const chunk = makeChunk('abc:4', 'x'.repeat(25), { lineStart: 4, lineEnd: 4 });

    const fragments = enforcer.enforce(chunk);

    expect(fragments.map((fragment) => fragment.text.length)).toEqual([10, 10, 5]);
    expect(fragments.every((fragment) => fragment.metadata.lineStart === 4 && fragment.metadata.lineEnd === 4)).toBe(
      true
    );
  });

  it('numbers the fragments', () => {
    const fragments = enforcer.enforce(makeChunk('abc:5', 'w'.repeat(25)));

    expect(fragments.map((fragment) => fragment.metadata.split)).toEqual([
      { part: 1, of: 3 },
      { part: 2, of: 3 },
      { part: 3, of: 3 },
    ]);
  });

  it('never cuts inside a surrogate pair', () => {
    const fragments = new ChunkSizeEnforcer(5).enforce(makeChunk('abc:6', 'abcd\u{1F600}xyz'));

    expect(fragments.map((fragment) => fragment.text)).toEqual(['abcd', '\u{1F600}xyz']);
  });

  it('keeps the overlap on the first fragment only', () => {
    const chunk = makeChunk('abc:1', 'y'.repeat(21), { overlapWithPrevious: 3 });

    const fragments = enforcer.enforce(chunk);

    expect(fragments.map((fragment) => fragment.metadata.overlapWithPrevious)).toEqual([3, 0, 0]);
  });

  it('inherits the rest of the metadata', () => {
    const chunk = makeChunk('abc:2', 'z'.repeat(15), { chunkType: 'function', symbolName: 'render' });

    const fragments = enforcer.enforce(chunk);

    expect(fragments.every((fragment) => fragment.metadata.chunkType === 'function')).toBe(true);
    expect(fragments.every((fragment) => fragment.metadata.symbolName === 'render')).toBe(true);
  });

  it('is idempotent', () => {
    const chunks = [
      makeChunk('a:0', 'short'),
      makeChunk('a:1', 'aaaa\nbbbb\ncccc\ndddd eeee ffff', { lineStart: 2, lineEnd: 5 }),
      makeChunk('a:2', 'q'.repeat(33)),
    ];

    const once = enforcer.enforceAll(chunks);
    const twice = enforcer.enforceAll(once);

    expect(twice).toEqual(once);
    expect(once.every((chunk) => chunk.text.length <= 10)).toBe(true);
    expect(once.map((chunk) => chunk.text).join('')).toBe(chunks.map((chunk) => chunk.text).join(''));
  });
});
