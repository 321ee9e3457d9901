/**
 * Box-drawing tables for terminal output. Column widths are terminal
 * columns, so wide characters are padded correctly.
 */

import stringWidth from 'string-width';

export interface TableStyle {
  header: (text: string) => string;
  border: (text: string) => string;
}

const plainStyle: TableStyle = {
  header: (text) => text,
  border: (text) => text,
};

/**
 * A row is one cell per column; each cell is its pre-wrapped lines.
 */
export type TableRow = string[][];

function padRight(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

/**
 * Renders headers and rows as a box table. Column widths fit the widest
 * header or cell line; multi-line cells grow the row.
 *
 * @example
 * ```typescript
 * renderTable(['Year', 'Event'], [[['1990'], ['A']]]);
 * // ┌──────┬───────┐
 * // │ Year │ Event │
 * // ├──────┼───────┤
 * // │ 1990 │ A     │
 * // └──────┴───────┘
 * ```
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly TableRow[],
  style: TableStyle = plainStyle
): string {
  const widths = headers.map((header, column) =>
    rows.reduce(
      (widest, row) =>
        Math.max(widest, ...(row[column] ?? []).map((line) => stringWidth(line))),
      stringWidth(header)
    )
  );

  const rule = (left: string, middle: string, right: string): string =>
    style.border(left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right);

  const bar = style.border('│');
  const line = (cells: string[]): string =>
    `${bar} ${cells.join(` ${bar} `)} ${bar}`;

  const lines: string[] = [];
  lines.push(rule('┌', '┬', '┐'));
  lines.push(line(headers.map((header, i) => style.header(padRight(header, widths[i] ?? 0)))));
  lines.push(rule('├', '┼', '┤'));

  for (const row of rows) {
    const height = Math.max(1, ...row.map((cell) => cell.length));
    for (let i = 0; i < height; i++) {
      lines.push(line(widths.map((width, column) => padRight(row[column]?.[i] ?? '', width))));
    }
  }

  lines.push(rule('└', '┴', '┘'));
  return lines.join('\n');
}
