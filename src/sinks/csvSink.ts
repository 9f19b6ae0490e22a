import { writeTextFile } from '../lib/fs.js';
import { getErrorMessage } from '../lib/errors.js';
import { log } from '../lib/log.js';
import type { CellValue, ExportResult, TableExporter, TabularRow } from './types.js';

const LINE_END = '\r\n';

export function escapeCsvField(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function formatCsv<H extends string>(rows: readonly TabularRow<H>[], headers: readonly H[]): string {
  const lines = [headers.map((header) => escapeCsvField(header)).join(',')];
  for (const row of rows) {
    lines.push(headers.map((header) => escapeCsvField(row[header])).join(','));
  }
  return lines.join(LINE_END) + LINE_END;
}

export class CsvExporter implements TableExporter {
  readonly extension = 'csv';

  async write<H extends string>(
    filePath: string,
    rows: readonly TabularRow<H>[],
    headers: readonly H[]
  ): Promise<ExportResult> {
    try {
      await writeTextFile(filePath, formatCsv(rows, headers));
      log.info(`data exported to ${filePath}`, { rows: rows.length });
      return { ok: true, path: filePath };
    } catch (error) {
      log.error(`error writing CSV ${filePath}: ${getErrorMessage(error)}`);
      return { ok: false, path: filePath, error };
    }
  }
}
