/**
 * Helpers shared by the structural parsers.
 */

import type Parser from 'tree-sitter';

import { describeError } from '../../../errors/index.js';
import type { Language } from '../../types.js';
import type { CodeElement, ElementKind, ParseResult } from '../types.js';
import type { GrammarId, ParserPool } from './pool.js';

export type SyntaxNode = Parser.SyntaxNode;

/**
 * A structural parser turns source text into top-level code elements.
 */
export interface StructuralParser {
  readonly language: Language;
  parse(source: string, pool: ParserPool): ParseResult;
}

/** 1-based first line of a node */
export function startLine(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/** 1-based last line of a node; a node ending at column 0 ends on the previous line */
export function endLine(node: SyntaxNode): number {
  const { row, column } = node.endPosition;
  return column === 0 && row > node.startPosition.row ? row : row + 1;
}

/**
 * Parse `source` with a leased parser and hand the root to `extract`.
 * Syntax errors and thrown parser errors come back as `ok: false`.
 */
export function parseWith(
  pool: ParserPool,
  grammar: GrammarId,
  language: Language,
  source: string,
  extract: (root: SyntaxNode) => CodeElement[]
): ParseResult {
  try {
    return pool.use(grammar, (parser) => {
      // The default 32KB buffer rejects larger inputs
      const tree = parser.parse(source, undefined, {
        bufferSize: Math.max(32 * 1024, Buffer.byteLength(source, 'utf8') + 1),
      });
      if (tree.rootNode.hasError) {
        return { ok: false, reason: 'source contains syntax errors' };
      }
      return { ok: true, elements: extract(tree.rootNode), language };
    });
  } catch (error) {
    return { ok: false, reason: `parser failed: ${describeError(error)}` };
  }
}

export type SiblingItem =
  | { kind: 'node'; node: SyntaxNode; leading: SyntaxNode[] }
  | { kind: 'comments'; nodes: SyntaxNode[] };

/**
 * Walk sibling nodes and attach each run of comments to the declaration
 * directly below it (no blank line between). Runs that are not attached
 * come back as their own item. A comment starting on the same line as the
 * previous declaration ends is a trailing comment and is dropped, since
 * that line already belongs to the declaration.
 */
export function attachComments(
  children: readonly SyntaxNode[],
  isComment: (node: SyntaxNode) => boolean = (node) => node.type === 'comment'
): SiblingItem[] {
  const items: SiblingItem[] = [];
  let run: SyntaxNode[] = [];
  let previousEndRow = -1;

  const adjacent = (upper: SyntaxNode, lower: SyntaxNode): boolean =>
    lower.startPosition.row <= upper.endPosition.row + 1;

  for (const child of children) {
    if (isComment(child)) {
      if (child.startPosition.row === previousEndRow && run.length === 0) {
        continue;
      }
      const last = run[run.length - 1];
      if (last && !adjacent(last, child)) {
        items.push({ kind: 'comments', nodes: run });
        run = [];
      }
      run.push(child);
      continue;
    }

    const last = run[run.length - 1];
    if (last && adjacent(last, child)) {
      items.push({ kind: 'node', node: child, leading: run });
    } else {
      if (run.length > 0) {
        items.push({ kind: 'comments', nodes: run });
      }
      items.push({ kind: 'node', node: child, leading: [] });
    }
    run = [];
    previousEndRow = child.endPosition.row;
  }

  if (run.length > 0) {
    items.push({ kind: 'comments', nodes: run });
  }
  return items;
}

export interface ElementInit {
  kind: ElementKind;
  name?: string;
  parentName?: string;
  headerEndLine?: number;
  hasDocumentation?: boolean;
  children?: CodeElement[];
}

/**
 * Build an element spanning the node and its leading comments.
 */
export function elementFor(node: SyntaxNode, leading: readonly SyntaxNode[], init: ElementInit): CodeElement {
  const first = leading[0];
  return {
    kind: init.kind,
    name: init.name,
    parentName: init.parentName,
    startLine: first ? startLine(first) : startLine(node),
    endLine: endLine(node),
    headerEndLine: init.headerEndLine,
    hasDocumentation: init.hasDocumentation ?? false,
    children: init.children ?? [],
  };
}

/**
 * An unattached comment run: the file header when it opens the file,
 * a plain statement otherwise.
 */
export function commentElement(
  nodes: readonly SyntaxNode[],
  opensFile: boolean,
  isDoc: (node: SyntaxNode) => boolean,
  parentName?: string
): CodeElement {
  const first = nodes[0];
  const last = nodes[nodes.length - 1];
  return {
    kind: opensFile ? 'module_doc' : 'statement',
    parentName,
    startLine: first ? startLine(first) : 1,
    endLine: last ? endLine(last) : 1,
    hasDocumentation: opensFile || nodes.some(isDoc),
    children: [],
  };
}

/** Text of a node's field, if present */
export function fieldText(node: SyntaxNode, field: string): string | undefined {
  return node.childForFieldName(field)?.text;
}
