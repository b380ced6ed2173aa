/**
 * Chunker Module
 *
 * Structural (tree-sitter) chunkers for Python, C#, JavaScript and
 * TypeScript, a Markdown section chunker, a length/overlap fallback, and
 * the factory that routes documents between them.
 */

export { ChunkingFactory } from './factory.js';
export type {
  ChunkDocumentsOptions,
  ChunkingFactoryOptions,
  ChunkingResult,
  DocumentOutcome,
} from './factory.js';
export { ChunkSizeEnforcer } from './enforcer.js';
export { FallbackChunker, slidingWindows, type TextWindow } from './chunkers/fallback.js';
export { MarkdownChunker } from './chunkers/markdown.js';
export { StructuralChunker, type StructuralChunkerDeps } from './chunkers/structural.js';
export { PythonChunker } from './chunkers/python.js';
export { CSharpChunker } from './chunkers/csharp.js';
export { JavaScriptChunker } from './chunkers/javascript.js';
export { TypeScriptChunker } from './chunkers/typescript.js';
export { createChunkId } from './chunkers/common.js';
export * from './parsers/index.js';
export { resolveExtensionSettings, resolveFallbackWindow } from './config.js';
export type {
  Chunk,
  ChunkMetadata,
  ChunkSource,
  ChunkType,
  CodeElement,
  ElementKind,
  ExtensionSettings,
  LanguageChunker,
  ParseResult,
} from './types.js';
export { DOCUMENTATION_INDICATORS, hasDocumentationIndicators } from './types.js';
