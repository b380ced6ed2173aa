/**
 * Python structural parser (tree-sitter-python).
 *
 * Decorators belong to their definition (tree-sitter wraps both in
 * `decorated_definition`). A string literal opening a module, class or
 * function body is its docstring.
 */

import type { CodeElement } from '../types.js';
import {
  attachComments,
  commentElement,
  elementFor,
  endLine,
  fieldText,
  parseWith,
  startLine,
  type StructuralParser,
  type SyntaxNode,
} from './common.js';
import type { ParserPool } from './pool.js';

const IMPORT_TYPES = new Set(['import_statement', 'import_from_statement', 'future_import_statement']);

export class PythonParser implements StructuralParser {
  readonly language = 'python' as const;

  parse(source: string, pool: ParserPool) {
    return parseWith(pool, 'python', this.language, source, extractModule);
  }
}

function isDocstring(node: SyntaxNode | undefined): boolean {
  if (!node || node.type !== 'expression_statement' || node.namedChildCount !== 1) {
    return false;
  }
  const expression = node.namedChildren[0];
  return expression?.type === 'string' || expression?.type === 'concatenated_string';
}

function firstStatement(block: SyntaxNode | null): SyntaxNode | undefined {
  return block?.namedChildren.find((child) => child.type !== 'comment');
}

/** `decorated_definition` unwrapped to the class/function inside it */
function definitionOf(node: SyntaxNode): SyntaxNode {
  if (node.type === 'decorated_definition') {
    return node.childForFieldName('definition') ?? node;
  }
  return node;
}

function extractModule(root: SyntaxNode): CodeElement[] {
  const items = attachComments(root.namedChildren);
  const firstNode = items.findIndex((item) => item.kind === 'node');
  const elements: CodeElement[] = [];

  items.forEach((item, index) => {
    if (item.kind === 'comments') {
      elements.push(commentElement(item.nodes, index === 0, () => false));
      return;
    }

    const { node, leading } = item;
    if (index === firstNode && isDocstring(node)) {
      elements.push(elementFor(node, leading, { kind: 'module_doc', hasDocumentation: true }));
      return;
    }
    elements.push(topLevelElement(node, leading));
  });

  return elements;
}

function topLevelElement(node: SyntaxNode, leading: SyntaxNode[]): CodeElement {
  if (IMPORT_TYPES.has(node.type)) {
    return elementFor(node, leading, { kind: 'import' });
  }

  const definition = definitionOf(node);
  if (definition.type === 'class_definition') {
    return classElement(node, definition, leading);
  }
  if (definition.type === 'function_definition') {
    return elementFor(node, leading, {
      kind: 'function',
      name: fieldText(definition, 'name'),
      hasDocumentation: isDocstring(firstStatement(definition.childForFieldName('body'))),
    });
  }

  return elementFor(node, leading, { kind: 'statement', name: assignedName(node) });
}

/** `NAME = ...` at module level names the statement */
function assignedName(node: SyntaxNode): string | undefined {
  if (node.type !== 'expression_statement') {
    return undefined;
  }
  const assignment = node.namedChildren[0];
  if (assignment?.type !== 'assignment') {
    return undefined;
  }
  const left = assignment.childForFieldName('left');
  return left?.type === 'identifier' ? left.text : undefined;
}

function classElement(
  node: SyntaxNode,
  definition: SyntaxNode,
  leading: SyntaxNode[],
  parentName?: string
): CodeElement {
  const name = fieldText(definition, 'name');
  const body = definition.childForFieldName('body');
  const first = firstStatement(body);
  const docstring = isDocstring(first) ? first : undefined;

  const headerEndLine = docstring
    ? endLine(docstring)
    : Math.max(startLine(definition), body ? body.startPosition.row : startLine(definition));

  const children: CodeElement[] = [];
  for (const member of attachComments(body?.namedChildren ?? [])) {
    if (member.kind === 'comments') {
      children.push(commentElement(member.nodes, false, () => false, name));
      continue;
    }
    const inner = definitionOf(member.node);
    if (inner.type === 'function_definition') {
      children.push(
        elementFor(member.node, member.leading, {
          kind: 'method',
          name: fieldText(inner, 'name'),
          parentName: name,
          hasDocumentation: isDocstring(firstStatement(inner.childForFieldName('body'))),
        })
      );
    } else if (inner.type === 'class_definition') {
      children.push(classElement(member.node, inner, member.leading, name));
    } else {
      // class attributes and other body statements
      children.push(
        elementFor(member.node, member.leading, { kind: 'statement', name: assignedName(member.node), parentName: name })
      );
    }
  }

  return elementFor(node, leading, {
    kind: 'class',
    name,
    parentName,
    headerEndLine,
    hasDocumentation: docstring !== undefined,
    children,
  });
}
