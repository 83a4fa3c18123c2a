/**
 * Table Formatting Utility
 *
 * Box-drawn tables for CLI output. Columns read their cell from each row
 * through an accessor, so rows can be ledger records as they are.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export type Cell = string | number | null | undefined;

/**
 * Column definition for table
 */
export interface Column<T> {
  header: string;
  value: (row: T) => Cell;
  /** Default: left, numbers usually right */
  align?: Alignment;
  /** Longer cells are cut with an ellipsis */
  maxWidth?: number;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  down: '┬',
  up: '┴',
  left: '├',
  right: '┤',
  cross: '┼',
} as const;

/**
 * Strip ANSI escape codes (for width calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function visibleLength(str: string): number {
  return [...stripAnsi(str)].length;
}

function renderCell(value: Cell, maxWidth?: number): string {
  const text = value === null || value === undefined ? '' : String(value);
  if (maxWidth === undefined || visibleLength(text) <= maxWidth) {
    return text;
  }
  return [...stripAnsi(text)].slice(0, Math.max(maxWidth - 1, 0)).join('') + '…';
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = width - visibleLength(str);
  if (padding <= 0) return str;
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

/**
 * Format rows as a box-drawn table.
 *
 * @example
 * ```ts
 * console.log(formatTable(runs, [
 *   { header: 'Run', value: (run) => run.id.slice(0, 8) },
 *   { header: 'Status', value: (run) => run.status },
 * ]));
 * ```
 *
 * Output:
 * ```
 * ┌──────────┬───────────┐
 * │ Run      │ Status    │
 * ├──────────┼───────────┤
 * │ 3f2a9c10 │ completed │
 * └──────────┴───────────┘
 * ```
 */
export function formatTable<T>(rows: readonly T[], columns: ReadonlyArray<Column<T>>): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((column) => renderCell(column.value(row), column.maxWidth)));
  const widths = columns.map((column, i) =>
    Math.max(visibleLength(column.header), ...cells.map((line) => visibleLength(line[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => BOX.horizontal.repeat(width + 2)).join(middle) + right;

  const line = (values: readonly string[], header: boolean): string => {
    const rendered = columns.map((column, i) => {
      const padded = pad(values[i] ?? '', widths[i] ?? 0, header ? 'left' : (column.align ?? 'left'));
      return header ? chalk.bold(padded) : padded;
    });
    return BOX.vertical + rendered.map((cell) => ` ${cell} `).join(BOX.vertical) + BOX.vertical;
  };

  return [
    rule(BOX.topLeft, BOX.down, BOX.topRight),
    line(
      columns.map((column) => column.header),
      true
    ),
    rule(BOX.left, BOX.cross, BOX.right),
    ...cells.map((values) => line(values, false)),
    rule(BOX.bottomLeft, BOX.up, BOX.bottomRight),
  ].join('\n');
}
