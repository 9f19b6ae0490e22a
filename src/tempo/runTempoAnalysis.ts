import path from 'node:path';
import { format, startOfMonth } from 'date-fns';
import type { ExportFormat } from '../config/env.js';
import { getErrorMessage } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { formatTable } from '../lib/table.js';
import { fileTimestamp, systemClock, type Clock } from '../lib/time.js';
import { CsvExporter } from '../sinks/csvSink.js';
import { toWorkbookSheet, writeWorkbook } from '../sinks/excel/index.js';
import { summarizeTeam, summarizeWorklogs, toWorklogRows, worklogStatistics } from './analyze.js';
import type { WorklogSource } from './tempoClient.js';
import { SUMMARY_HEADERS, TEAM_SUMMARY_HEADERS, WORKLOG_HEADERS } from './worklog.js';

export interface TempoAnalysisOptions {
  source: WorklogSource;
  dateFrom: string;
  dateTo: string;
  userIds?: readonly string[];
  format: ExportFormat;
  outputDir: string;
  outputPrefix: string;
  clock?: Clock;
  print?: (line: string) => void;
}

export interface DateRange {
  dateFrom: string;
  dateTo: string;
}

/** Falls back to the current month up to today when either end is missing. */
export function resolveDateRange(
  dateFrom: string | null | undefined,
  dateTo: string | null | undefined,
  clock: Clock = systemClock
): DateRange {
  const now = clock();
  return {
    dateFrom: dateFrom ?? format(startOfMonth(now), 'yyyy-MM-dd'),
    dateTo: dateTo ?? format(now, 'yyyy-MM-dd')
  };
}

/**
 * Fetches worklogs and accounts, prints statistics and writes the summary,
 * team summary and detail tables. Returns the primary output path, or null
 * when there was nothing to report or the export failed.
 */
export async function runTempoAnalysis(options: TempoAnalysisOptions): Promise<string | null> {
  const print = options.print ?? ((line: string) => console.log(line));
  const clock = options.clock ?? systemClock;
  const rule = '='.repeat(60);

  print(rule);
  print('Tempo Timesheet Analysis');
  print(rule);

  const worklogs = await options.source.fetchWorklogs(options.dateFrom, options.dateTo, options.userIds ?? []);
  const accounts = await options.source.fetchAccounts();

  const rows = toWorklogRows(worklogs, accounts);
  if (rows.length === 0) {
    log.warn('no worklogs to process; check the date range and filters');
    return null;
  }

  const summary = summarizeWorklogs(rows);
  const teamSummary = summarizeTeam(rows);
  const stats = worklogStatistics(rows);

  print('');
  print(rule);
  print('Summary Statistics');
  print(rule);
  print(`Total hours logged: ${stats.totalHours.toFixed(2)}`);
  print(`Number of team members: ${stats.teamMembers}`);
  print(`Number of unique issues: ${stats.issues}`);
  print(`Number of worklogs: ${stats.worklogs}`);
  print('');
  print('Top 5 Team Members by Hours:');
  for (const line of formatTable(TEAM_SUMMARY_HEADERS, teamSummary.slice(0, 5))) {
    print(line);
  }

  const timestamp = fileTimestamp(clock());
  const prefix = options.outputPrefix;

  if (options.format === 'csv') {
    const exporter = new CsvExporter();
    const summaryPath = path.join(options.outputDir, `${prefix}_summary_${timestamp}.csv`);
    const results = [
      await exporter.write(summaryPath, summary, SUMMARY_HEADERS),
      await exporter.write(path.join(options.outputDir, `${prefix}_detail_${timestamp}.csv`), rows, WORKLOG_HEADERS),
      await exporter.write(
        path.join(options.outputDir, `${prefix}_team_summary_${timestamp}.csv`),
        teamSummary,
        TEAM_SUMMARY_HEADERS
      )
    ];
    return results.every((result) => result.ok) ? summaryPath : null;
  }

  const workbookPath = path.join(options.outputDir, `${prefix}_${timestamp}.xlsx`);
  try {
    await writeWorkbook(workbookPath, [
      toWorkbookSheet('Summary', SUMMARY_HEADERS, summary),
      toWorkbookSheet('Team Summary', TEAM_SUMMARY_HEADERS, teamSummary),
      toWorkbookSheet('Detailed Worklogs', WORKLOG_HEADERS, rows)
    ]);
  } catch (error) {
    log.error(`error writing workbook ${workbookPath}: ${getErrorMessage(error)}`);
    return null;
  }
  log.info(`exported to Excel: ${workbookPath}`);
  return workbookPath;
}
