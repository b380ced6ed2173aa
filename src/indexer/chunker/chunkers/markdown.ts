/**
 * Markdown Chunker
 *
 * Uses the marked lexer to find headings. Each heading starts a section
 * running to the next heading; consecutive sections are packed up to
 * `maxChunkSize` with the first heading as the chunk's symbol. Text before
 * the first heading is a section of its own.
 */

import { marked } from 'marked';

import type { Config } from '../../../config/schema.js';
import { extensionOf, type Document } from '../../types.js';
import { resolveExtensionSettings } from '../config.js';
import type { Chunk, LanguageChunker } from '../types.js';
import { finalizeChunks, SourceLines, type ChunkDraft } from './common.js';

interface Section {
  heading?: string;
  startLine: number;
  endLine: number;
}

/**
 * Split content into heading sections with 1-based line ranges.
 */
export function findSections(source: string): Section[] {
  // the lexer hands back raw text with CRLF folded to LF
  const content = source.replace(/\r\n/g, '\n');
  const headings: Array<{ text: string; line: number }> = [];
  let cursor = 0;
  let line = 1;

  for (const token of marked.lexer(content)) {
    const offset = content.indexOf(token.raw, cursor);
    if (offset === -1) {
      continue;
    }
    line += countNewlines(content, cursor, offset);
    if (token.type === 'heading') {
      headings.push({ text: token.text, line });
    }
    line += countNewlines(content, offset, offset + token.raw.length);
    cursor = offset + token.raw.length;
  }

  const totalLines = content.split('\n').length;
  const sections: Section[] = [];
  const firstHeading = headings[0];

  if (!firstHeading || firstHeading.line > 1) {
    sections.push({ startLine: 1, endLine: firstHeading ? firstHeading.line - 1 : totalLines });
  }
  headings.forEach((heading, index) => {
    const next = headings[index + 1];
    sections.push({
      heading: heading.text,
      startLine: heading.line,
      endLine: next ? next.line - 1 : totalLines,
    });
  });
  return sections;
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = text.indexOf('\n', from); i !== -1 && i < to; i = text.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}

export class MarkdownChunker implements LanguageChunker {
  readonly name = 'MarkdownChunker';

  constructor(private readonly config: Readonly<Config>) {}

  supportedExtensions(): readonly string[] {
    return ['.md', '.mdx', '.markdown'];
  }

  chunkDocument(document: Document): Chunk[] {
    const { maxChunkSize } = resolveExtensionSettings(this.config, extensionOf(document.path));
    const lines = new SourceLines(document.content);
    const drafts: ChunkDraft[] = [];
    let pack: Section[] = [];

    const flush = (): void => {
      const sections = pack;
      const first = sections[0];
      const last = sections[sections.length - 1];
      pack = [];
      if (!first || !last) {
        return;
      }
      const text = lines.slice(first.startLine, last.endLine);
      if (text.trim() === '') {
        return;
      }
      const headings = sections.flatMap((section) => (section.heading ? [section.heading] : []));
      drafts.push({
        text,
        chunkType: 'markdown_section',
        lineStart: first.startLine,
        lineEnd: last.endLine,
        symbolName: first.heading,
        containsDocumentation: true,
        symbols: headings,
      });
    };

    for (const section of findSections(document.content)) {
      const first = pack[0];
      if (first && lines.slice(first.startLine, section.endLine).length > maxChunkSize) {
        flush();
      }

      const size = lines.slice(section.startLine, section.endLine).length;
      if (size > maxChunkSize) {
        this.splitSection(lines, section, maxChunkSize, drafts);
        continue;
      }
      pack.push(section);
    }
    flush();

    return finalizeChunks(document, this.name, 'markdown', drafts);
  }

  private splitSection(lines: SourceLines, section: Section, maxChunkSize: number, drafts: ChunkDraft[]): void {
    const pieces = lines.splitRange(section.startLine, section.endLine, maxChunkSize);
    pieces.forEach((piece, index) => {
      drafts.push({
        text: piece.text,
        chunkType: 'markdown_section',
        lineStart: piece.start,
        lineEnd: piece.end,
        symbolName: section.heading,
        containsDocumentation: true,
        symbols: section.heading ? [section.heading] : [],
        split: { part: index + 1, of: pieces.length },
      });
    });
  }
}
