/**
 * Chunk Size Enforcer
 *
 * Guarantees `text.length <= hardChunkCeiling` for every chunk leaving the
 * factory. An oversized chunk is cut at the last line break that keeps the
 * fragment within the ceiling; a single line longer than the ceiling is cut
 * mid-line, never inside a surrogate pair. Fragments inherit the chunk's
 * metadata with adjusted line ranges, `split` numbering and ids `<id>#<n>`.
 * Chunks within the ceiling pass through untouched, so enforcing twice
 * changes nothing.
 */

import { splitsSurrogatePair } from './chunkers/common.js';
import type { Chunk } from './types.js';

export class ChunkSizeEnforcer {
  constructor(readonly hardChunkCeiling: number) {
    if (!Number.isInteger(hardChunkCeiling) || hardChunkCeiling < 1) {
      throw new RangeError(`hardChunkCeiling must be a positive integer, got ${hardChunkCeiling}`);
    }
  }

  enforce(chunk: Chunk): Chunk[] {
    if (chunk.text.length <= this.hardChunkCeiling) {
      return [chunk];
    }

    const texts: string[] = [];
    for (let rest = chunk.text; rest.length > 0; ) {
      const cut = this.cutPoint(rest);
      texts.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }

    const fragments: Chunk[] = [];
    let lineStart = chunk.metadata.lineStart;

    for (const text of texts) {
      const lineEnd = lineStart + countLines(text.endsWith('\n') ? text.slice(0, -1) : text) - 1;
      fragments.push({
        id: `${chunk.id}#${fragments.length}`,
        text,
        metadata: {
          ...chunk.metadata,
          lineStart,
          lineEnd: Math.min(lineEnd, chunk.metadata.lineEnd),
          overlapWithPrevious: fragments.length === 0 ? chunk.metadata.overlapWithPrevious : 0,
          split: { part: fragments.length + 1, of: texts.length },
        },
      });
      // a mid-line cut continues on the same line
      lineStart = text.endsWith('\n') ? lineEnd + 1 : lineEnd;
    }

    return fragments;
  }

  enforceAll(chunks: readonly Chunk[]): Chunk[] {
    return chunks.flatMap((chunk) => this.enforce(chunk));
  }

  /** Length of the next fragment: through the last newline within the ceiling, else the ceiling */
  private cutPoint(text: string): number {
    if (text.length <= this.hardChunkCeiling) {
      return text.length;
    }
    const newline = text.lastIndexOf('\n', this.hardChunkCeiling - 1);
    if (newline !== -1) {
      return newline + 1;
    }
    const cut = this.hardChunkCeiling;
    return cut > 1 && splitsSurrogatePair(text, cut) ? cut - 1 : cut;
  }
}

function countLines(text: string): number {
  let lines = 1;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    lines++;
  }
  return lines;
}
