/**
 * Chunk construction shared by every chunker variant.
 */

import { createHash } from 'node:crypto';

import type { Document, LanguageHint } from '../../types.js';
import type { Chunk, ChunkMetadata, ChunkType } from '../types.js';

/**
 * Deterministic chunk id: a digest of the document path plus the ordinal
 * of the chunk within the document. Re-chunking the same document yields
 * the same ids.
 */
export function createChunkId(documentPath: string, ordinal: number): string {
  const digest = createHash('sha256').update(documentPath).digest('hex').slice(0, 16);
  return `${digest}:${ordinal}`;
}

/** True when `index` falls between the two halves of a surrogate pair */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * What a chunker knows about a chunk before ids and positions are assigned.
 */
export interface ChunkDraft {
  text: string;
  chunkType: ChunkType;
  lineStart: number;
  lineEnd: number;
  symbolName?: string;
  parentSymbol?: string;
  containsDocumentation: boolean;
  symbols?: readonly string[];
  overlapWithPrevious?: number;
  split?: { part: number; of: number };
}

/**
 * Turn drafts into chunks for one document. `chunkIndex`/`totalChunks`
 * are provisional; the factory restamps them after enforcement.
 */
export function finalizeChunks(
  document: Document,
  chunker: string,
  language: LanguageHint,
  drafts: readonly ChunkDraft[]
): Chunk[] {
  return drafts.map((draft, index) => {
    const metadata: ChunkMetadata = {
      chunkType: draft.chunkType,
      symbolName: draft.symbolName,
      parentSymbol: draft.parentSymbol,
      language,
      lineStart: draft.lineStart,
      lineEnd: draft.lineEnd,
      containsDocumentation: draft.containsDocumentation,
      symbols: draft.symbols ?? (draft.symbolName ? [draft.symbolName] : []),
      source: { ...document.source, path: document.path },
      chunker,
      chunkIndex: index,
      totalChunks: drafts.length,
      overlapWithPrevious: draft.overlapWithPrevious ?? 0,
      split: draft.split,
    };
    return { id: createChunkId(document.path, index), text: draft.text, metadata };
  });
}

/**
 * Source lines with 1-based inclusive slicing.
 */
export class SourceLines {
  private readonly lines: string[];

  constructor(content: string) {
    this.lines = content.split('\n');
  }

  get count(): number {
    return this.lines.length;
  }

  slice(start: number, end: number): string {
    return this.lines.slice(start - 1, end).join('\n');
  }

  /**
   * Cut lines [start, end] into pieces no longer than `maxSize` characters,
   * breaking only between lines. A single line longer than `maxSize` stays
   * whole (the enforcer cuts it).
   */
  splitRange(start: number, end: number, maxSize: number): Array<{ start: number; end: number; text: string }> {
    const pieces: Array<{ start: number; end: number; text: string }> = [];
    let pieceStart = start;
    let length = -1;

    for (let line = start; line <= end; line++) {
      const lineLength = (this.lines[line - 1] ?? '').length + 1;
      if (line > pieceStart && length + lineLength > maxSize) {
        pieces.push({ start: pieceStart, end: line - 1, text: this.slice(pieceStart, line - 1) });
        pieceStart = line;
        length = -1;
      }
      length += lineLength;
    }
    pieces.push({ start: pieceStart, end, text: this.slice(pieceStart, end) });
    return pieces;
  }
}
