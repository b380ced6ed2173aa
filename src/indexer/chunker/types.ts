/**
 * Chunker Types
 *
 * Chunks are value objects. Once a chunker has produced them only the
 * enforcer (splitting) and the factory (stamping chunkIndex/totalChunks)
 * derive new ones; nothing mutates a chunk in place.
 */

import type { Document, DocumentSource, Language, LanguageHint } from '../types.js';

/**
 * What a chunk holds.
 *
 * - module_docstring: module docstring or file header comment
 * - import_block: consecutive import/using statements
 * - class: a whole type (class, interface, struct, enum, ...)
 * - class_signature: a type's declaration line(s) and documentation only
 * - method: one member of a split type, or a run of its fields
 * - function: one or more free functions
 * - module_code: module-level statements, possibly mixed with functions
 * - markdown_section: one or more Markdown heading sections
 * - fallback: a window from the length/overlap splitter
 */
export type ChunkType =
  | 'module_docstring'
  | 'import_block'
  | 'class'
  | 'class_signature'
  | 'method'
  | 'function'
  | 'module_code'
  | 'markdown_section'
  | 'fallback';

export interface ChunkSource extends DocumentSource {
  /** Repository-relative path of the document */
  readonly path: string;
}

export interface ChunkMetadata {
  readonly chunkType: ChunkType;
  readonly symbolName?: string;
  /** Enclosing type (for methods) or namespace (for C# types) */
  readonly parentSymbol?: string;
  readonly language: LanguageHint;
  /** 1-based, inclusive */
  readonly lineStart: number;
  /** 1-based, inclusive */
  readonly lineEnd: number;
  readonly containsDocumentation: boolean;
  /** Every named element in the chunk, in source order */
  readonly symbols: readonly string[];
  readonly source: ChunkSource;
  /** Name of the chunker that produced the chunk */
  readonly chunker: string;
  /** Position within the document after enforcement */
  readonly chunkIndex: number;
  readonly totalChunks: number;
  /** Leading characters shared with the previous chunk (fallback windows only) */
  readonly overlapWithPrevious: number;
  /** Present when one element was cut into pieces; part is 1-based */
  readonly split?: { readonly part: number; readonly of: number };
}

export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly metadata: ChunkMetadata;
}

// ============================================================================
// Parser output
// ============================================================================

export type ElementKind = 'import' | 'module_doc' | 'class' | 'function' | 'method' | 'statement';

/**
 * A top-level (or type-member) construct found by a structural parser.
 * Line numbers are 1-based and inclusive; `startLine` already covers
 * attached doc comments, decorators and attributes.
 */
export interface CodeElement {
  kind: ElementKind;
  name?: string;
  /** Enclosing type for members, enclosing namespace for C# types */
  parentName?: string;
  startLine: number;
  endLine: number;
  /** Types only: last line of the declaration header plus its documentation */
  headerEndLine?: number;
  hasDocumentation: boolean;
  /** Members of a type: methods, nested types, and fields or comments as statements */
  children: CodeElement[];
}

export type ParseResult =
  | { ok: true; elements: CodeElement[]; language: Language }
  | { ok: false; reason: string };

// ============================================================================
// Chunkers
// ============================================================================

/**
 * Capability every chunker variant implements. The factory picks one per
 * document by extension.
 */
export interface LanguageChunker {
  /** Shown in chunk metadata and `chunkerInfo()` */
  readonly name: string;
  /** Lowercase, dot-prefixed extensions */
  supportedExtensions(): readonly string[];
  chunkDocument(document: Document): Chunk[];
}

/**
 * Settings a chunker resolves for one extension.
 */
export interface ExtensionSettings {
  maxChunkSize: number;
  chunkOverlap: number;
  preserveTypeBoundaries: boolean;
  preserveFunctionBoundaries: boolean;
  includeDocstrings: boolean;
  /** Split types with more methods than this; no cap when unset */
  maxTypeMembers?: number;
}

/**
 * Substrings that mark a text as carrying documentation.
 */
export const DOCUMENTATION_INDICATORS: readonly string[] = [
  '"""',
  "'''",
  '/**',
  '///',
  '@param',
  '<summary>',
];

export function hasDocumentationIndicators(text: string): boolean {
  return DOCUMENTATION_INDICATORS.some((indicator) => text.includes(indicator));
}
