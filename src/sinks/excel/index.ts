import ExcelJS from 'exceljs';
import { ensureParentDir } from '../../lib/fs.js';
import { getErrorMessage } from '../../lib/errors.js';
import { log } from '../../lib/log.js';
import type { CellValue, ExportResult, TableExporter, TabularRow } from '../types.js';

export interface WorkbookSheet {
  name: string;
  headers: readonly string[];
  cells: readonly (readonly CellValue[])[];
}

export function toWorkbookSheet<H extends string>(
  name: string,
  headers: readonly H[],
  rows: readonly TabularRow<H>[]
): WorkbookSheet {
  return {
    name,
    headers,
    cells: rows.map((row) => headers.map((header) => row[header]))
  };
}

// Excel caps sheet names at 31 characters and rejects a few punctuation marks.
export function sheetName(name: string): string {
  const cleaned = name.replace(/[\\/?*[\]:]/g, ' ').trim();
  return (cleaned.length > 0 ? cleaned : 'Sheet').slice(0, 31);
}

export async function writeWorkbook(outputPath: string, sheets: readonly WorkbookSheet[]): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheetName(sheet.name));
    worksheet.addRow([...sheet.headers]);

    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    for (const cells of sheet.cells) {
      worksheet.addRow(cells.map((value) => (value === null || value === undefined ? '' : value)));
    }

    worksheet.columns.forEach((column) => {
      column.width = Math.max(column.width ?? 10, 15);
    });
  }

  await ensureParentDir(outputPath);
  await workbook.xlsx.writeFile(outputPath);
}

export class ExcelExporter implements TableExporter {
  readonly extension = 'xlsx';

  constructor(private readonly worksheetName = 'Report') {}

  async write<H extends string>(
    filePath: string,
    rows: readonly TabularRow<H>[],
    headers: readonly H[]
  ): Promise<ExportResult> {
    try {
      await writeWorkbook(filePath, [toWorkbookSheet(this.worksheetName, headers, rows)]);
      log.info(`data exported to ${filePath}`, { rows: rows.length });
      return { ok: true, path: filePath };
    } catch (error) {
      log.error(`error writing workbook ${filePath}: ${getErrorMessage(error)}`);
      return { ok: false, path: filePath, error };
    }
  }
}
