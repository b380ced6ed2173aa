/**
 * Structural parsers (tree-sitter) for the code chunkers.
 */

export { ParserPool, type GrammarId, type ParserPoolStats } from './pool.js';
export type { StructuralParser, SyntaxNode } from './common.js';
export { PythonParser } from './python.js';
export { CSharpParser } from './csharp.js';
export { JavaScriptParser, TypeScriptParser } from './javascript.js';
