import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExcelExporter, sheetName, toWorkbookSheet, writeWorkbook } from '../sinks/excel/index.js';

describe('sheetName', () => {
  it('strips characters Excel rejects and caps the length', () => {
    expect(sheetName('Q3/Q4: hours')).toBe('Q3 Q4  hours');
    expect(sheetName('x'.repeat(40))).toHaveLength(31);
    expect(sheetName('???')).toBe('Sheet');
  });
});

describe('toWorkbookSheet', () => {
  it('orders cells by header', () => {
    const sheet = toWorkbookSheet('Team', ['member', 'hours'], [{ hours: 2.5, member: 'Avery Quinn' }]);
    expect(sheet.cells).toEqual([['Avery Quinn', 2.5]]);
  });
});

describe('writeWorkbook', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'excel-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one worksheet per table with a header row', async () => {
    const outputPath = path.join(dir, 'nested', 'tempo.xlsx');
    await writeWorkbook(outputPath, [
      toWorkbookSheet('Summary', ['member', 'hours'], [{ member: 'Avery Quinn', hours: 2.5 }]),
      toWorkbookSheet('Team Summary', ['member', 'count'], [{ member: 'Morgan Lee', count: 2 }])
    ]);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(outputPath);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Summary', 'Team Summary']);
    const summary = workbook.getWorksheet('Summary');
    expect(summary?.getCell('A1').value).toBe('member');
    expect(summary?.getCell('A1').font?.bold).toBe(true);
    expect(summary?.getCell('A2').value).toBe('Avery Quinn');
    expect(summary?.getCell('B2').value).toBe(2.5);
  });
});

describe('ExcelExporter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'excel-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('exports rows to a Report sheet', async () => {
    const filePath = path.join(dir, 'stale.xlsx');
    const result = await new ExcelExporter().write(filePath, [{ ID: 'DA-1', Status: 'Done' }], ['ID', 'Status']);

    expect(result).toEqual({ ok: true, path: filePath });
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    expect(workbook.getWorksheet('Report')?.getCell('B2').value).toBe('Done');
  });

  it('reports a failure when the target directory cannot be created', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');

    const result = await new ExcelExporter().write(path.join(blocker, 'out.xlsx'), [], ['ID']);

    expect(result.ok).toBe(false);
  });
});
