/**
 * Fallback Chunker
 *
 * Length/overlap splitter used for unknown extensions, for documents a
 * structural parser rejects, and for everything when structural chunking
 * is disabled. Windows are `chunkSize` characters sharing `chunkOverlap`
 * characters with their predecessor; near the cut the window backs off to
 * a paragraph break, then a line break, then a space.
 *
 * Content is never cleaned, so the input is recoverable:
 *
 * ```ts
 * chunks[0].text + chunks.slice(1).map((c) => c.text.slice(c.metadata.overlapWithPrevious)).join('')
 * ```
 */

import type { Config } from '../../../config/schema.js';
import { extensionOf, type Document } from '../../types.js';
import { resolveFallbackWindow } from '../config.js';
import { hasDocumentationIndicators, type Chunk, type LanguageChunker } from '../types.js';
import { finalizeChunks, splitsSurrogatePair, type ChunkDraft } from './common.js';

const BREAKS = ['\n\n', '\n', ' '] as const;

export interface TextWindow {
  start: number;
  end: number;
}

/**
 * Character windows over `text`. Consecutive windows share exactly
 * `overlap` characters, one more where the overlap would start inside a
 * surrogate pair. No window ends inside one.
 */
export function slidingWindows(text: string, chunkSize: number, overlap: number): TextWindow[] {
  const windows: TextWindow[] = [];
  if (text.length === 0) {
    return windows;
  }

  const lookback = Math.floor(chunkSize / 2);
  let start = 0;

  for (;;) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      end = findBreak(text, Math.max(start + overlap + 1, end - lookback), end);
      if (end - 1 > start && splitsSurrogatePair(text, end)) {
        end--;
      }
    }
    windows.push({ start, end });
    if (end >= text.length) {
      return windows;
    }
    let next = Math.max(end - overlap, start + 1);
    if (next - 1 > start && splitsSurrogatePair(text, next)) {
      next--;
    }
    start = next;
  }
}

/** Cut position in (floor, end] right after the preferred break, or `end` */
function findBreak(text: string, floor: number, end: number): number {
  for (const separator of BREAKS) {
    const index = text.lastIndexOf(separator, end - separator.length);
    if (index >= floor) {
      return index + separator.length;
    }
  }
  return end;
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = text.indexOf('\n'); i !== -1 && i < offset; i = text.indexOf('\n', i + 1)) {
    line++;
  }
  return line;
}

export class FallbackChunker implements LanguageChunker {
  readonly name = 'FallbackChunker';

  constructor(private readonly config: Readonly<Config>) {}

  /** Handles any extension */
  supportedExtensions(): readonly string[] {
    return ['*'];
  }

  chunkDocument(document: Document): Chunk[] {
    const { chunkSize, chunkOverlap } = resolveFallbackWindow(this.config, extensionOf(document.path));
    const { content } = document;

    let previousEnd = 0;
    const drafts = slidingWindows(content, chunkSize, chunkOverlap).map(({ start, end }, index): ChunkDraft => {
      const text = content.slice(start, end);
      const draft: ChunkDraft = {
        text,
        chunkType: 'fallback',
        lineStart: lineAt(content, start),
        lineEnd: lineAt(content, end - 1),
        containsDocumentation: hasDocumentationIndicators(text),
        overlapWithPrevious: index === 0 ? 0 : previousEnd - start,
      };
      previousEnd = end;
      return draft;
    });

    return finalizeChunks(document, this.name, document.languageHint, drafts);
  }
}
