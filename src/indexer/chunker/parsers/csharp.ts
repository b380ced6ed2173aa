/**
 * C# structural parser (tree-sitter-c-sharp).
 *
 * Namespaces, block or file-scoped, are containers: they produce no element
 * of their own and the types inside carry the namespace as `parentName`.
 * Attributes are part of the declaration node; `///` comments above a
 * declaration are its documentation.
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

const TYPE_TYPES = new Set([
  'class_declaration',
  'struct_declaration',
  'interface_declaration',
  'record_declaration',
  'record_struct_declaration',
  'enum_declaration',
]);

const MEMBER_TYPES = new Set([
  'method_declaration',
  'constructor_declaration',
  'destructor_declaration',
  'operator_declaration',
  'conversion_operator_declaration',
  'property_declaration',
  'indexer_declaration',
]);

const IMPORT_TYPES = new Set(['using_directive', 'extern_alias_directive']);

const NAME_TYPES = new Set(['identifier', 'qualified_name']);

export class CSharpParser implements StructuralParser {
  readonly language = 'csharp' as const;

  parse(source: string, pool: ParserPool) {
    return parseWith(pool, 'csharp', this.language, source, (root) => {
      const elements: CodeElement[] = [];
      collect(root.namedChildren, undefined, elements, true);
      return elements;
    });
  }
}

function isDocComment(node: SyntaxNode): boolean {
  return node.text.startsWith('///') || node.text.startsWith('/**');
}

function qualify(namespace: string | undefined, name: string | undefined): string | undefined {
  if (!name) return namespace;
  return namespace ? `${namespace}.${name}` : name;
}

function collect(
  children: readonly SyntaxNode[],
  namespace: string | undefined,
  out: CodeElement[],
  atFileStart: boolean
): void {
  let current = namespace;

  attachComments(children).forEach((item, index) => {
    const opensFile = atFileStart && index === 0;

    if (item.kind === 'comments') {
      out.push(commentElement(item.nodes, opensFile, isDocComment, current));
      return;
    }

    const { node, leading } = item;

    if (IMPORT_TYPES.has(node.type)) {
      out.push(elementFor(node, leading, { kind: 'import' }));
      return;
    }

    if (node.type === 'namespace_declaration' || node.type === 'file_scoped_namespace_declaration') {
      if (leading.length > 0) {
        out.push(commentElement(leading, opensFile, isDocComment, current));
      }
      const qualified = qualify(current, fieldText(node, 'name'));
      if (node.type === 'namespace_declaration') {
        collect(node.childForFieldName('body')?.namedChildren ?? [], qualified, out, false);
      } else {
        // Older grammars leave the members as siblings, newer ones nest them
        current = qualified;
        const nested = node.namedChildren.filter((child) => !NAME_TYPES.has(child.type));
        collect(nested, qualified, out, false);
      }
      return;
    }

    if (TYPE_TYPES.has(node.type)) {
      out.push(typeElement(node, leading, current));
      return;
    }

    out.push(
      elementFor(node, leading, {
        kind: 'statement',
        name: node.type === 'delegate_declaration' ? fieldText(node, 'name') : undefined,
        parentName: current,
        hasDocumentation: leading.some(isDocComment),
      })
    );
  });
}

function memberName(node: SyntaxNode): string | undefined {
  if (node.type === 'operator_declaration') {
    const operator = fieldText(node, 'operator');
    return operator ? `operator ${operator}` : 'operator';
  }
  if (node.type === 'indexer_declaration') {
    return 'this[]';
  }
  return fieldText(node, 'name') ?? fieldText(node, 'type');
}

/** `int count;` and `event EventHandler Changed;` name their first declarator */
function fieldName(node: SyntaxNode): string | undefined {
  const own = fieldText(node, 'name');
  if (own) {
    return own;
  }
  const declaration = node.namedChildren.find((child) => child.type === 'variable_declaration');
  const declarator = declaration?.namedChildren.find((child) => child.type === 'variable_declarator');
  return declarator ? (fieldText(declarator, 'name') ?? declarator.namedChildren[0]?.text) : undefined;
}

function typeElement(node: SyntaxNode, leading: SyntaxNode[], parentName: string | undefined): CodeElement {
  const name = fieldText(node, 'name');
  const body = node.childForFieldName('body');

  const children: CodeElement[] = [];
  for (const member of attachComments(body?.namedChildren ?? [])) {
    if (member.kind === 'comments') {
      children.push(commentElement(member.nodes, false, isDocComment, name));
      continue;
    }
    if (MEMBER_TYPES.has(member.node.type)) {
      children.push(
        elementFor(member.node, member.leading, {
          kind: 'method',
          name: memberName(member.node),
          parentName: name,
          hasDocumentation: member.leading.some(isDocComment),
        })
      );
    } else if (TYPE_TYPES.has(member.node.type)) {
      children.push(typeElement(member.node, member.leading, name));
    } else {
      // fields, events, enum members
      children.push(
        elementFor(member.node, member.leading, {
          kind: 'statement',
          name: fieldName(member.node),
          parentName: name,
          hasDocumentation: member.leading.some(isDocComment),
        })
      );
    }
  }

  return elementFor(node, leading, {
    kind: 'class',
    name,
    parentName,
    headerEndLine: body ? startLine(body) : endLine(node),
    hasDocumentation: leading.some(isDocComment),
    children,
  });
}
