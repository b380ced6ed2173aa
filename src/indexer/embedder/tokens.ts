/**
 * Token Estimator
 *
 * A character-count approximation of embedding-API token cost. Exactness
 * is not the goal; the ratio per model is chosen so the estimate does not
 * come in under the real count for source code, which tokenizes denser
 * than prose.
 */

import type { Chunk } from '../chunker/types.js';

/** Characters per token when the model is not in the table */
export const DEFAULT_CHARS_PER_TOKEN = 3.0;

/** Added to every non-empty text (request framing, end-of-text marker) */
export const TOKENS_PER_TEXT_OVERHEAD = 1;

export const MODEL_CHARS_PER_TOKEN: Readonly<Record<string, number>> = {
  'text-embedding-ada-002': 3.0,
  'text-embedding-3-small': 3.0,
  'text-embedding-3-large': 3.0,
  // WordPiece vocabularies split identifiers into more pieces
  'BAAI/bge-large-en-v1.5': 2.5,
  'BAAI/bge-small-en-v1.5': 2.5,
  'nomic-embed-text': 2.5,
  'all-MiniLM-L6-v2': 2.5,
};

export class TokenEstimator {
  readonly charsPerToken: number;

  constructor(readonly model: string = 'text-embedding-ada-002') {
    this.charsPerToken = MODEL_CHARS_PER_TOKEN[model] ?? DEFAULT_CHARS_PER_TOKEN;
  }

  /** 0 for empty text, otherwise at least 1 */
  estimate(text: string): number {
    if (text.length === 0) {
      return 0;
    }
    return Math.ceil(text.length / this.charsPerToken) + TOKENS_PER_TEXT_OVERHEAD;
  }

  estimateChunks(chunks: readonly Chunk[]): number {
    let total = 0;
    for (const chunk of chunks) {
      total += this.estimate(chunk.text);
    }
    return total;
  }
}
