/**
 * Shared builders for indexer tests.
 */

import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import type { Chunk, ChunkMetadata } from '../chunker/types.js';
import { extensionOf, getLanguageForExtension, type Document, type DocumentSource } from '../types.js';

export function testConfig(overrides: Partial<Config> = {}): Readonly<Config> {
  return { ...DEFAULT_CONFIG, ...overrides };
}

export function makeDocument(path: string, content: string, source: DocumentSource = {}): Document {
  return { path, content, languageHint: getLanguageForExtension(extensionOf(path)), source };
}

/** A chunk with plain metadata, for tests that only care about text and ids */
export function makeChunk(id: string, text: string, metadata: Partial<ChunkMetadata> = {}): Chunk {
  return {
    id,
    text,
    metadata: {
      chunkType: 'fallback',
      language: 'text',
      lineStart: 1,
      lineEnd: 1,
      containsDocumentation: false,
      symbols: [],
      source: { path: 'notes.txt' },
      chunker: 'FallbackChunker',
      chunkIndex: 0,
      totalChunks: 1,
      overlapWithPrevious: 0,
      ...metadata,
    },
  };
}

/** Rebuild a document from consecutive chunks by dropping each overlap */
export function reassemble(chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => chunk.text.slice(chunk.metadata.overlapWithPrevious)).join('');
}
