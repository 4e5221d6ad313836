/**
 * Plain column layout for `status` and `search` output.
 *
 * Columns are separated by two spaces; the header is bold and underlined
 * with dashes. ANSI colour codes are ignored when measuring widths.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column<K extends string = string> {
  header: string;
  key: K;
  /** Default: left */
  align?: Alignment;
  /** Longer cells are cut and end with an ellipsis */
  maxWidth?: number;
}

export type Row<K extends string = string> = Record<K, string | number | null | undefined>;

const ANSI = /\x1B\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

function cell(value: string | number | null | undefined, maxWidth?: number): string {
  const text = value === null || value === undefined ? '' : String(value);
  if (maxWidth !== undefined && visibleLength(text) > maxWidth) {
    return text.replace(ANSI, '').slice(0, Math.max(0, maxWidth - 1)) + '…';
  }
  return text;
}

function pad(text: string, width: number, align: Alignment): string {
  const gap = width - visibleLength(text);
  if (gap <= 0) return text;
  return align === 'right' ? ' '.repeat(gap) + text : text + ' '.repeat(gap);
}

/**
 * Render rows under their column headers.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Document', key: 'doc' }, { header: 'Chunks', key: 'chunks', align: 'right' }],
 *   [{ doc: 'bills/2024-03.pdf', chunks: 4 }]
 * );
 * ```
 */
export function formatTable<K extends string>(columns: Column<K>[], rows: Row<K>[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((col) => cell(row[col.key], col.maxWidth)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...body.map((cells) => visibleLength(cells[i] ?? '')))
  );

  const render = (cells: string[]): string =>
    cells
      .map((text, i) => pad(text, widths[i] ?? 0, columns[i]?.align ?? 'left'))
      .join('  ')
      .trimEnd();

  const lines = [
    chalk.bold(render(columns.map((col) => col.header))),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...body.map(render),
  ];
  return lines.join('\n');
}
