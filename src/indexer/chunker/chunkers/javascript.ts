import { JavaScriptParser } from '../parsers/javascript.js';
import { StructuralChunker } from './structural.js';

// The JavaScript grammar parses JSX as well
const parser = new JavaScriptParser();

export class JavaScriptChunker extends StructuralChunker {
  override readonly name = 'JavaScriptChunker';

  override supportedExtensions(): readonly string[] {
    return ['.js', '.jsx', '.mjs', '.cjs'];
  }

  protected override parserFor() {
    return parser;
  }
}
