import type { CellValue, TabularRow } from '../sinks/types.js';

function cellText(value: CellValue): string {
  return value === null || value === undefined ? '' : String(value);
}

/** Plain-text table with columns padded to their widest cell. */
export function formatTable<H extends string>(headers: readonly H[], rows: readonly TabularRow<H>[]): string[] {
  const cells = rows.map((row) => headers.map((header) => cellText(row[header])));
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...cells.map((line) => line[index]?.length ?? 0))
  );

  const render = (line: readonly string[]): string =>
    line
      .map((cell, index) => cell.padEnd(widths[index] ?? cell.length))
      .join('  ')
      .trimEnd();

  return [render(headers), ...cells.map(render)];
}
