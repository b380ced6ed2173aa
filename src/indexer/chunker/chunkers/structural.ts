/**
 * Structural Chunker
 *
 * Shared algorithm behind the code chunkers. A structural parser yields
 * top-level elements in source order; they become chunks as follows:
 *
 * - a file header / module docstring → `module_docstring` (when enabled)
 * - runs of imports → `import_block`, spilling into continuation blocks
 * - a type that fits → one `class` chunk, otherwise a `class_signature`
 *   chunk followed by one `method` chunk per method; runs of fields and
 *   body comments are grouped up to `maxChunkSize` into `method` chunks too
 * - free functions and statements → grouped up to `maxChunkSize` as
 *   `function` or `module_code`
 *
 * A parse failure hands the whole document to the fallback chunker.
 */

import type { Config } from '../../../config/schema.js';
import { silentLogger, type Logger } from '../../../utils/logger.js';
import { extensionOf, type Document } from '../../types.js';
import { resolveExtensionSettings } from '../config.js';
import type { ParserPool } from '../parsers/pool.js';
import type { StructuralParser } from '../parsers/common.js';
import type { Chunk, ChunkType, CodeElement, ExtensionSettings, LanguageChunker } from '../types.js';
import { finalizeChunks, SourceLines, type ChunkDraft } from './common.js';
import type { FallbackChunker } from './fallback.js';

export interface StructuralChunkerDeps {
  config: Readonly<Config>;
  pool: ParserPool;
  fallback: FallbackChunker;
  logger?: Logger;
}

type GroupKind = 'imports' | 'code' | 'members';

export abstract class StructuralChunker implements LanguageChunker {
  abstract readonly name: string;

  protected readonly config: Readonly<Config>;
  protected readonly pool: ParserPool;
  protected readonly fallback: FallbackChunker;
  protected readonly logger: Logger;

  constructor(deps: StructuralChunkerDeps) {
    this.config = deps.config;
    this.pool = deps.pool;
    this.fallback = deps.fallback;
    this.logger = deps.logger ?? silentLogger;
  }

  abstract supportedExtensions(): readonly string[];

  /** Parser for a given extension (TypeScript picks TSX for .tsx) */
  protected abstract parserFor(extension: string): StructuralParser;

  chunkDocument(document: Document): Chunk[] {
    const extension = extensionOf(document.path);
    const result = this.parserFor(extension).parse(document.content, this.pool);

    if (!result.ok) {
      this.logger.warn(`${document.path}: ${result.reason}; using fallback chunker`);
      return this.fallback.chunkDocument(document);
    }

    const settings = resolveExtensionSettings(this.config, extension);
    const builder = new DraftBuilder(new SourceLines(document.content), settings);
    builder.addElements(result.elements);

    return finalizeChunks(document, this.name, result.language, builder.drafts);
  }
}

/**
 * Accumulates drafts for one document.
 */
class DraftBuilder {
  readonly drafts: ChunkDraft[] = [];
  private group: CodeElement[] = [];
  private groupKind: GroupKind = 'code';

  constructor(
    private readonly lines: SourceLines,
    private readonly settings: ExtensionSettings
  ) {}

  addElements(elements: readonly CodeElement[]): void {
    for (const element of elements) {
      switch (element.kind) {
        case 'module_doc':
          if (this.settings.includeDocstrings) {
            this.flush();
            this.emit(element, 'module_docstring');
          } else {
            this.addToGroup('code', element);
          }
          break;
        case 'import':
          this.addToGroup('imports', element);
          break;
        case 'class':
          this.flush();
          this.addType(element);
          break;
        default:
          this.addToGroup('code', element);
      }
    }
    this.flush();
  }

  private addToGroup(kind: GroupKind, element: CodeElement): void {
    const first = this.group[0];
    if (first) {
      const sameGroup = this.groupKind === kind && first.parentName === element.parentName;
      const size = this.lines.slice(first.startLine, element.endLine).length;
      if (!sameGroup || size > this.settings.maxChunkSize) {
        this.flush();
      }
    }
    this.groupKind = kind;
    this.group.push(element);
  }

  private flush(): void {
    const group = this.group;
    const first = group[0];
    const last = group[group.length - 1];
    this.group = [];
    if (!first || !last) {
      return;
    }

    if (this.groupKind === 'imports') {
      // never cut: an oversized import block is left to the enforcer
      this.emitRange(first.startLine, last.endLine, 'import_block', group);
      return;
    }

    if (this.groupKind === 'members') {
      if (group.length === 1) {
        this.emitElement(first, 'method');
      } else {
        this.emitRange(first.startLine, last.endLine, 'method', group);
      }
      return;
    }

    const chunkType: ChunkType = group.every((element) => element.kind === 'function') ? 'function' : 'module_code';
    if (group.length === 1) {
      this.emitElement(first, chunkType);
    } else {
      this.emitRange(first.startLine, last.endLine, chunkType, group);
    }
  }

  private addType(type: CodeElement): void {
    const text = this.lines.slice(type.startLine, type.endLine);
    const methodCount = type.children.filter((child) => child.kind === 'method').length;

    if (
      this.settings.preserveTypeBoundaries &&
      text.length <= this.settings.maxChunkSize &&
      (this.settings.maxTypeMembers === undefined || methodCount <= this.settings.maxTypeMembers)
    ) {
      this.drafts.push({
        text,
        chunkType: 'class',
        lineStart: type.startLine,
        lineEnd: type.endLine,
        symbolName: type.name,
        parentSymbol: type.parentName,
        containsDocumentation: hasDocumentation(type),
        symbols: symbolsOf([type]),
      });
      return;
    }

    const headerEnd = Math.min(Math.max(type.headerEndLine ?? type.startLine, type.startLine), type.endLine);
    this.drafts.push({
      text: this.lines.slice(type.startLine, headerEnd),
      chunkType: 'class_signature',
      lineStart: type.startLine,
      lineEnd: headerEnd,
      symbolName: type.name,
      parentSymbol: type.parentName,
      containsDocumentation: type.hasDocumentation,
      symbols: type.name ? [type.name] : [],
    });

    for (const child of type.children) {
      if (child.kind === 'statement') {
        // a docstring or field sharing the header lines is already covered
        if (child.endLine > headerEnd) {
          this.addToGroup('members', child);
        }
        continue;
      }
      this.flush();
      if (child.kind === 'class') {
        this.addType(child);
      } else {
        this.emitElement(child, 'method');
      }
    }
    this.flush();
  }

  /** One element; split at line boundaries when oversized and allowed */
  private emitElement(element: CodeElement, chunkType: ChunkType): void {
    const text = this.lines.slice(element.startLine, element.endLine);
    if (text.length <= this.settings.maxChunkSize || this.settings.preserveFunctionBoundaries) {
      this.emit(element, chunkType, text);
      return;
    }

    const pieces = this.lines.splitRange(element.startLine, element.endLine, this.settings.maxChunkSize);
    pieces.forEach((piece, index) => {
      this.drafts.push({
        text: piece.text,
        chunkType,
        lineStart: piece.start,
        lineEnd: piece.end,
        symbolName: element.name,
        parentSymbol: element.parentName,
        containsDocumentation: element.hasDocumentation,
        symbols: element.name ? [element.name] : [],
        split: { part: index + 1, of: pieces.length },
      });
    });
  }

  private emit(element: CodeElement, chunkType: ChunkType, text?: string): void {
    this.drafts.push({
      text: text ?? this.lines.slice(element.startLine, element.endLine),
      chunkType,
      lineStart: element.startLine,
      lineEnd: element.endLine,
      symbolName: element.name,
      parentSymbol: element.parentName,
      containsDocumentation: element.hasDocumentation,
      symbols: element.name ? [element.name] : [],
    });
  }

  private emitRange(start: number, end: number, chunkType: ChunkType, elements: readonly CodeElement[]): void {
    const named = elements.filter((element) => element.name !== undefined);
    this.drafts.push({
      text: this.lines.slice(start, end),
      chunkType,
      lineStart: start,
      lineEnd: end,
      symbolName: named.length === 1 ? named[0]?.name : undefined,
      parentSymbol: elements[0]?.parentName,
      containsDocumentation: elements.some((element) => element.hasDocumentation),
      symbols: symbolsOf(elements),
    });
  }
}

function hasDocumentation(element: CodeElement): boolean {
  return element.hasDocumentation || element.children.some(hasDocumentation);
}

function symbolsOf(elements: readonly CodeElement[]): string[] {
  const symbols: string[] = [];
  for (const element of elements) {
    if (element.name) {
      symbols.push(element.name);
    }
    symbols.push(...symbolsOf(element.children));
  }
  return symbols;
}
