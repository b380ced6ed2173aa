/**
 * Table Formatting
 *
 * Box-drawn tables for CLI summaries (`chunkwise chunkers`,
 * `chunkwise chunk`). Widths ignore ANSI colour codes.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column<K extends string = string> {
  header: string;
  key: K;
  /** @default 'left' */
  align?: Alignment;
}

export type Row<K extends string = string> = Partial<Record<K, string | number | null | undefined>>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = Math.max(0, width - visibleLength(text));
  return align === 'right' ? ' '.repeat(padding) + text : text + ' '.repeat(padding);
}

function cellText(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'number' ? value.toLocaleString('en-US') : value;
}

/**
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Chunker', key: 'name' }, { header: 'Chunks', key: 'count', align: 'right' }],
 *   [{ name: 'PythonChunker', count: 12 }]
 * );
 * // ┌───────────────┬────────┐
 * // │ Chunker       │ Chunks │
 * // ├───────────────┼────────┤
 * // │ PythonChunker │     12 │
 * // └───────────────┴────────┘
 * ```
 */
export function formatTable<K extends string>(columns: readonly Column<K>[], rows: readonly Row<K>[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((column) => cellText(row[column.key])));
  const widths = columns.map((column, index) =>
    Math.max(visibleLength(column.header), ...body.map((cells) => visibleLength(cells[index] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right;

  const line = (cells: readonly string[], header = false): string => {
    const padded = columns.map((column, index) => {
      const text = pad(cells[index] ?? '', widths[index] ?? 0, header ? 'left' : column.align ?? 'left');
      return ` ${header ? chalk.bold(text) : text} `;
    });
    return `│${padded.join('│')}│`;
  };

  return [
    rule('┌', '┬', '┐'),
    line(columns.map((column) => column.header), true),
    rule('├', '┼', '┤'),
    ...body.map((cells) => line(cells)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
