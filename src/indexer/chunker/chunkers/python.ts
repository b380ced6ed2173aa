import { PythonParser } from '../parsers/python.js';
import { StructuralChunker } from './structural.js';

const parser = new PythonParser();

export class PythonChunker extends StructuralChunker {
  override readonly name = 'PythonChunker';

  override supportedExtensions(): readonly string[] {
    return ['.py', '.pyi', '.pyw'];
  }

  protected override parserFor() {
    return parser;
  }
}
