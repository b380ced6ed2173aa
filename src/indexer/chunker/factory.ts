/**
 * Chunking Factory
 *
 * Picks a chunker per document by extension, runs it, passes the result
 * through the size enforcer and stamps per-document positions. Documents
 * are independent: a failure in one is recorded and the rest continue.
 *
 * @example
 * ```ts
 * const factory = new ChunkingFactory({ config: loadConfig() });
 * const { chunks, failures } = await factory.chunkDocumentsWithResult(documents);
 * ```
 */

import { availableParallelism } from 'node:os';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import pLimit from 'p-limit';

import type { Config } from '../../config/schema.js';
import { normalizeExtension } from '../../config/loader.js';
import { CancelledError, describeError, DocumentProcessingError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { extensionOf, type Document } from '../types.js';
import { CSharpChunker } from './chunkers/csharp.js';
import { FallbackChunker } from './chunkers/fallback.js';
import { JavaScriptChunker } from './chunkers/javascript.js';
import { MarkdownChunker } from './chunkers/markdown.js';
import { PythonChunker } from './chunkers/python.js';
import { TypeScriptChunker } from './chunkers/typescript.js';
import { ChunkSizeEnforcer } from './enforcer.js';
import { ParserPool } from './parsers/pool.js';
import type { Chunk, LanguageChunker } from './types.js';

export interface ChunkingFactoryOptions {
  config: Readonly<Config>;
  logger?: Logger;
  /** Shared parser pool; one is created when omitted */
  pool?: ParserPool;
  /** Register the bundled chunkers (default: true) */
  registerDefaults?: boolean;
}

export interface ChunkDocumentsOptions {
  signal?: AbortSignal;
  /** Called after each document, in completion order */
  onDocument?: (outcome: DocumentOutcome, completed: number, total: number) => void;
}

export interface DocumentOutcome {
  path: string;
  /** Chunker that produced the chunks (FallbackChunker after a parse failure) */
  chunker: string;
  usedFallback: boolean;
  chunks: Chunk[];
  /** Whitespace-only document; no chunks and not a failure */
  skipped: boolean;
  failure?: DocumentProcessingError;
}

export interface ChunkingResult {
  /** All chunks in document order */
  chunks: Chunk[];
  /** One outcome per input document, in input order */
  outcomes: DocumentOutcome[];
  failures: DocumentProcessingError[];
}

export class ChunkingFactory {
  private readonly config: Readonly<Config>;
  private readonly logger: Logger;
  private readonly pool: ParserPool;
  private readonly enforcer: ChunkSizeEnforcer;
  private readonly fallback: FallbackChunker;
  private readonly chunkers = new Map<string, LanguageChunker>();

  constructor(options: ChunkingFactoryOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.pool = options.pool ?? new ParserPool();
    this.enforcer = new ChunkSizeEnforcer(this.config.hard_chunk_ceiling);
    this.fallback = new FallbackChunker(this.config);

    if (options.registerDefaults !== false) {
      const deps = { config: this.config, pool: this.pool, fallback: this.fallback, logger: this.logger };
      this.register(new PythonChunker(deps));
      this.register(new CSharpChunker(deps));
      this.register(new JavaScriptChunker(deps));
      this.register(new TypeScriptChunker(deps));
      this.register(new MarkdownChunker(this.config));
    }
  }

  /**
   * Register a chunker for its extensions, replacing earlier registrations
   * of the same extension.
   */
  register(chunker: LanguageChunker): void {
    for (const extension of chunker.supportedExtensions()) {
      if (extension !== '*') {
        this.chunkers.set(normalizeExtension(extension), chunker);
      }
    }
  }

  /**
   * Chunker for an extension (case-insensitive, dot optional). Unknown
   * extensions, and every extension when structural chunking is disabled,
   * get the fallback chunker.
   */
  getChunker(extension: string): LanguageChunker {
    if (!this.config.use_structural_chunking || extension === '') {
      return this.fallback;
    }
    return this.chunkers.get(normalizeExtension(extension)) ?? this.fallback;
  }

  supportedExtensions(): string[] {
    return [...this.chunkers.keys()].sort();
  }

  /**
   * Chunker name → extensions it currently handles.
   */
  chunkerInfo(): Record<string, string[]> {
    const info: Record<string, string[]> = {};
    for (const [extension, chunker] of this.chunkers) {
      (info[chunker.name] ??= []).push(extension);
    }
    info[this.fallback.name] = ['*'];
    return info;
  }

  async chunkDocuments(documents: readonly Document[], options: ChunkDocumentsOptions = {}): Promise<Chunk[]> {
    const { chunks } = await this.chunkDocumentsWithResult(documents, options);
    return chunks;
  }

  /**
   * Chunk documents with bounded concurrency (`max_workers`, CPU count
   * when 0). Results come back in input order.
   *
   * @throws CancelledError when the signal aborts before all documents are done
   */
  async chunkDocumentsWithResult(
    documents: readonly Document[],
    options: ChunkDocumentsOptions = {}
  ): Promise<ChunkingResult> {
    const { signal, onDocument } = options;
    const workers = this.config.max_workers > 0 ? this.config.max_workers : availableParallelism();
    const limit = pLimit(workers);
    let completed = 0;

    const outcomes = await Promise.all(
      documents.map((document) =>
        limit(async () => {
          // cancellation is only observed between documents
          await yieldToEventLoop();
          if (signal?.aborted) {
            throw new CancelledError('chunking');
          }
          const outcome = this.chunkOne(document);
          completed++;
          onDocument?.(outcome, completed, documents.length);
          return outcome;
        })
      )
    );

    return {
      chunks: outcomes.flatMap((outcome) => outcome.chunks),
      outcomes,
      failures: outcomes.flatMap((outcome) => (outcome.failure ? [outcome.failure] : [])),
    };
  }

  private chunkOne(document: Document): DocumentOutcome {
    const chunker = this.getChunker(extensionOf(document.path));

    if (document.content.trim() === '') {
      return { path: document.path, chunker: chunker.name, usedFallback: false, chunks: [], skipped: true };
    }

    try {
      const enforced = this.enforcer.enforceAll(chunker.chunkDocument(document));
      const chunks = enforced.map(
        (chunk, index): Chunk => ({
          ...chunk,
          metadata: { ...chunk.metadata, chunkIndex: index, totalChunks: enforced.length },
        })
      );
      const producedBy = chunks[0]?.metadata.chunker ?? chunker.name;
      return {
        path: document.path,
        chunker: producedBy,
        usedFallback: producedBy === this.fallback.name,
        chunks,
        skipped: false,
      };
    } catch (error) {
      const failure = new DocumentProcessingError(document.path, describeError(error), error);
      this.logger.warn(failure.message);
      return { path: document.path, chunker: chunker.name, usedFallback: false, chunks: [], skipped: false, failure };
    }
  }
}
