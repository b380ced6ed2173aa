/**
 * JavaScript and TypeScript structural parsers.
 *
 * Both walk the same node shapes (the TypeScript grammar extends the
 * JavaScript one). `export` wrappers are unwrapped, arrow functions and
 * function expressions bound with const/let/var count as functions, and
 * interfaces, enums and type aliases count as types.
 */

import type { Language } from '../../types.js';
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
import type { GrammarId, ParserPool } from './pool.js';

const FUNCTION_TYPES = new Set([
  'function_declaration',
  'generator_function_declaration',
  'function_signature',
]);

const TYPE_TYPES = new Set([
  'class_declaration',
  'abstract_class_declaration',
  'interface_declaration',
  'enum_declaration',
  'type_alias_declaration',
]);

const FUNCTION_VALUES = new Set([
  'arrow_function',
  'function_expression',
  'function',
  'generator_function',
]);

const METHOD_TYPES = new Set(['method_definition', 'method_signature', 'abstract_method_signature']);

const FIELD_TYPES = new Set(['field_definition', 'public_field_definition']);

class EcmaScriptParser implements StructuralParser {
  constructor(
    readonly language: Language,
    private readonly grammar: GrammarId
  ) {}

  parse(source: string, pool: ParserPool) {
    return parseWith(pool, this.grammar, this.language, source, extractProgram);
  }
}

export class JavaScriptParser extends EcmaScriptParser {
  constructor() {
    super('javascript', 'javascript');
  }
}

export class TypeScriptParser extends EcmaScriptParser {
  /** @param jsx - parse with the TSX grammar (for .tsx files) */
  constructor(jsx = false) {
    super('typescript', jsx ? 'tsx' : 'typescript');
  }
}

function isComment(node: SyntaxNode): boolean {
  return node.type === 'comment' || node.type === 'hash_bang_line';
}

/** Decorators sit beside class members and attach to the next one, like comments */
function isLeadingTrivia(node: SyntaxNode): boolean {
  return isComment(node) || node.type === 'decorator';
}

function isJsDoc(node: SyntaxNode): boolean {
  return node.text.startsWith('/**');
}

function extractProgram(root: SyntaxNode): CodeElement[] {
  return attachComments(root.namedChildren, isComment).map((item, index) => {
    if (item.kind === 'comments') {
      return commentElement(item.nodes, index === 0, isJsDoc);
    }
    return topLevelElement(item.node, item.leading);
  });
}

function topLevelElement(node: SyntaxNode, leading: SyntaxNode[]): CodeElement {
  let declaration = node;

  if (node.type === 'export_statement') {
    const inner = node.childForFieldName('declaration');
    if (!inner) {
      // export { a } from './a'  vs  export default expr / export { a }
      const kind = node.childForFieldName('source') ? 'import' : 'statement';
      return elementFor(node, leading, { kind });
    }
    declaration = inner;
  }

  const hasDocumentation = leading.some(isJsDoc);

  if (declaration.type === 'import_statement') {
    return elementFor(node, leading, { kind: 'import' });
  }
  if (FUNCTION_TYPES.has(declaration.type)) {
    return elementFor(node, leading, {
      kind: 'function',
      name: fieldText(declaration, 'name'),
      hasDocumentation,
    });
  }
  if (TYPE_TYPES.has(declaration.type)) {
    return typeElement(node, declaration, leading);
  }
  if (declaration.type === 'lexical_declaration' || declaration.type === 'variable_declaration') {
    return variableElement(node, declaration, leading, hasDocumentation);
  }

  return elementFor(node, leading, {
    kind: 'statement',
    name: fieldText(declaration, 'name'),
    hasDocumentation,
  });
}

function isRequireCall(node: SyntaxNode | null): boolean {
  if (node?.type !== 'call_expression') {
    return false;
  }
  return node.childForFieldName('function')?.text === 'require';
}

function variableElement(
  node: SyntaxNode,
  declaration: SyntaxNode,
  leading: SyntaxNode[],
  hasDocumentation: boolean
): CodeElement {
  const declarators = declaration.namedChildren.filter((child) => child.type === 'variable_declarator');
  const values = declarators.map((d) => d.childForFieldName('value'));

  if (declarators.length > 0 && values.every(isRequireCall)) {
    return elementFor(node, leading, { kind: 'import' });
  }

  const first = declarators[0];
  const firstValue = values[0];
  if (declarators.length === 1 && first && firstValue && FUNCTION_VALUES.has(firstValue.type)) {
    return elementFor(node, leading, {
      kind: 'function',
      name: fieldText(first, 'name'),
      hasDocumentation,
    });
  }

  return elementFor(node, leading, {
    kind: 'statement',
    name: first ? fieldText(first, 'name') : undefined,
    hasDocumentation,
  });
}

function memberName(member: SyntaxNode): string | undefined {
  return fieldText(member, 'name') ?? fieldText(member, 'property');
}

function isMethodLike(member: SyntaxNode): boolean {
  if (METHOD_TYPES.has(member.type)) {
    return true;
  }
  // handle = () => { ... } class fields
  const value = member.childForFieldName('value');
  return FIELD_TYPES.has(member.type) && value !== null && FUNCTION_VALUES.has(value.type);
}

function typeElement(node: SyntaxNode, declaration: SyntaxNode, leading: SyntaxNode[]): CodeElement {
  const name = fieldText(declaration, 'name');
  // type aliases have no body; the whole declaration is the header
  const body = declaration.type === 'type_alias_declaration' ? null : declaration.childForFieldName('body');

  const children: CodeElement[] = [];
  for (const member of attachComments(body?.namedChildren ?? [], isLeadingTrivia)) {
    if (member.kind === 'comments') {
      children.push(commentElement(member.nodes, false, isJsDoc, name));
      continue;
    }
    children.push(
      elementFor(member.node, member.leading, {
        // fields, property signatures and enum members stay statements
        kind: isMethodLike(member.node) ? 'method' : 'statement',
        name: member.node.type === 'property_identifier' ? member.node.text : memberName(member.node),
        parentName: name,
        hasDocumentation: member.leading.some(isJsDoc),
      })
    );
  }

  return elementFor(node, leading, {
    kind: 'class',
    name,
    headerEndLine: body ? startLine(body) : endLine(node),
    hasDocumentation: leading.some(isJsDoc),
    children,
  });
}
