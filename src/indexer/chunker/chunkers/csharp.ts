/**
 * C# chunker. Namespaces (block and file-scoped) are containers only;
 * their types are chunked with the namespace as `parentSymbol`.
 */

import { CSharpParser } from '../parsers/csharp.js';
import { StructuralChunker } from './structural.js';

const parser = new CSharpParser();

export class CSharpChunker extends StructuralChunker {
  override readonly name = 'CSharpChunker';

  override supportedExtensions(): readonly string[] {
    return ['.cs'];
  }

  protected override parserFor() {
    return parser;
  }
}
