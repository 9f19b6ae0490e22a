#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { ConfigurationError } from '../lib/errors.js';
import { log } from '../lib/log.js';
import type { ExportFormat } from '../config/env.js';
import { listReports, runReportCommand, runTempoCommand } from './commands.js';
import { runMenu } from './menu.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseIsoDay(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}

function parseFormat(value: string): ExportFormat {
  if (value === 'csv') {
    return 'csv';
  }
  if (value === 'xlsx' || value === 'excel') {
    return 'xlsx';
  }
  throw new InvalidArgumentError('Expected csv or xlsx.');
}

const formatOption = () =>
  new Option('-f, --format <format>', 'export format (csv or xlsx)').argParser(parseFormat);

const program = new Command();
program.name('jira-reports').description('Jira and Tempo reports with CSV and Excel export').version('0.1.0');

program
  .command('list')
  .description('List the available reports')
  .action(() => {
    for (const line of listReports()) {
      console.log(line);
    }
  });

program
  .command('report')
  .description('Run one report and export its rows')
  .argument('<name>', 'report name, see `list`')
  .addOption(formatOption())
  .option('-o, --output-dir <dir>', 'directory for the export file')
  .option('--max-results <n>', 'maximum issues to fetch', parsePositiveInt)
  .option('--days <n>', 'look-back window in days', parsePositiveInt)
  .option('--months <n>', 'staleness threshold in months', parsePositiveInt)
  .option('--per-project', 'search stale-tickets one project at a time')
  .action(async (name: string, options: {
    format?: ExportFormat;
    outputDir?: string;
    maxResults?: number;
    days?: number;
    months?: number;
    perProject?: boolean;
  }) => {
    await runReportCommand(name, options);
  });

program
  .command('tempo')
  .description('Summarize Tempo worklogs by team member, account and issue')
  .option('--date-from <date>', 'start date (YYYY-MM-DD)', parseIsoDay)
  .option('--date-to <date>', 'end date (YYYY-MM-DD)', parseIsoDay)
  .addOption(formatOption())
  .option('-o, --output-dir <dir>', 'directory for the export files')
  .action(async (options: { dateFrom?: string; dateTo?: string; format?: ExportFormat; outputDir?: string }) => {
    await runTempoCommand(options);
  });

program
  .command('menu')
  .description('Pick a report from an interactive menu')
  .action(async () => {
    await runMenu((name) => runReportCommand(name));
  });

program.parseAsync(process.argv).catch((error) => {
  if (error instanceof ConfigurationError) {
    log.error(error.message);
    process.exit(1);
  }
  log.error('command failed', error);
  process.exitCode = 1;
});
