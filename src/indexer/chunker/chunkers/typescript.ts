import { TypeScriptParser } from '../parsers/javascript.js';
import type { StructuralParser } from '../parsers/common.js';
import { StructuralChunker } from './structural.js';

const typescriptParser = new TypeScriptParser();
const tsxParser = new TypeScriptParser(true);

export class TypeScriptChunker extends StructuralChunker {
  override readonly name = 'TypeScriptChunker';

  override supportedExtensions(): readonly string[] {
    return ['.ts', '.tsx', '.mts', '.cts'];
  }

  protected override parserFor(extension: string): StructuralParser {
    return extension === '.tsx' ? tsxParser : typescriptParser;
  }
}
