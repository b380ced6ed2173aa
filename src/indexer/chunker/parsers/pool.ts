/**
 * Parser Pool
 *
 * tree-sitter Parser instances are stateful and must not be shared by two
 * parses in flight. Each chunking task leases its own instance per grammar
 * and returns it when done; idle instances are reused.
 */

import Parser from 'tree-sitter';
import TypeScriptLang from 'tree-sitter-typescript';
import JavaScriptLang from 'tree-sitter-javascript';
import PythonLang from 'tree-sitter-python';
import CSharpLang from 'tree-sitter-c-sharp';

// tree-sitter's Language type (compiled parser) vs our Language type (string union)
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

export type GrammarId = 'python' | 'csharp' | 'javascript' | 'typescript' | 'tsx';

function getGrammar(grammar: GrammarId): TreeSitterLanguage {
  switch (grammar) {
    case 'python':
      return PythonLang as TreeSitterLanguage;
    case 'csharp':
      return CSharpLang as TreeSitterLanguage;
    case 'javascript':
      return JavaScriptLang as TreeSitterLanguage;
    case 'typescript':
      return TypeScriptLang.typescript as TreeSitterLanguage;
    case 'tsx':
      return TypeScriptLang.tsx as TreeSitterLanguage;
  }
}

export interface ParserPoolStats {
  /** Instances created since the pool was built */
  created: number;
  /** Instances currently leased */
  leased: number;
  /** Instances waiting for reuse */
  idle: number;
}

export class ParserPool {
  private readonly idle = new Map<GrammarId, Parser[]>();
  private created = 0;
  private leased = 0;

  /**
   * Take an idle parser for the grammar, or create one.
   *
   * @throws when the grammar's native binding cannot be loaded
   */
  acquire(grammar: GrammarId): Parser {
    const parser = this.idle.get(grammar)?.pop() ?? this.create(grammar);
    this.leased++;
    return parser;
  }

  release(grammar: GrammarId, parser: Parser): void {
    this.leased--;
    const list = this.idle.get(grammar);
    if (list) {
      list.push(parser);
    } else {
      this.idle.set(grammar, [parser]);
    }
  }

  /**
   * Run `fn` with a leased parser, returning it to the pool afterwards.
   */
  use<T>(grammar: GrammarId, fn: (parser: Parser) => T): T {
    const parser = this.acquire(grammar);
    try {
      return fn(parser);
    } finally {
      this.release(grammar, parser);
    }
  }

  stats(): ParserPoolStats {
    let idle = 0;
    for (const list of this.idle.values()) {
      idle += list.length;
    }
    return { created: this.created, leased: this.leased, idle };
  }

  private create(grammar: GrammarId): Parser {
    const parser = new Parser();
    parser.setLanguage(getGrammar(grammar));
    this.created++;
    return parser;
  }
}
