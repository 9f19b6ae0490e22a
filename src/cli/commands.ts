import { loadJiraConfig, loadTempoConfig, type ExportFormat } from '../config/env.js';
import { JiraSearchClient } from '../jira/searchClient.js';
import { setLogLevel } from '../lib/log.js';
import { ReportPipeline, type ReportRunOutcome } from '../pipeline/reportPipeline.js';
import { findReport, reportCatalogue, type ReportEntry } from '../reports/index.js';
import { CsvExporter } from '../sinks/csvSink.js';
import { ExcelExporter } from '../sinks/excel/index.js';
import type { TableExporter } from '../sinks/types.js';
import { resolveDateRange, runTempoAnalysis } from '../tempo/runTempoAnalysis.js';
import { TempoClient } from '../tempo/tempoClient.js';

export interface ReportCommandOptions {
  format?: ExportFormat;
  outputDir?: string;
  maxResults?: number;
  days?: number;
  months?: number;
  perProject?: boolean;
}

export interface TempoCommandOptions {
  dateFrom?: string;
  dateTo?: string;
  format?: ExportFormat;
  outputDir?: string;
}

export function exporterFor(format: ExportFormat, worksheetName: string): TableExporter {
  return format === 'xlsx' ? new ExcelExporter(worksheetName) : new CsvExporter();
}

export function requireReport(name: string): ReportEntry {
  const entry = findReport(name);
  if (!entry) {
    const known = reportCatalogue.map((report) => report.name).join(', ');
    throw new Error(`Unknown report "${name}". Known reports: ${known}.`);
  }
  return entry;
}

export function listReports(): string[] {
  const width = Math.max(...reportCatalogue.map((entry) => entry.name.length));
  return reportCatalogue.map((entry) => `${entry.name.padEnd(width)}  ${entry.description}`);
}

export async function runReportCommand(name: string, options: ReportCommandOptions = {}): Promise<ReportRunOutcome> {
  const entry = requireReport(name);
  const config = loadJiraConfig();
  setLogLevel(config.logLevel);

  const definition = entry.create(config, {
    days: options.days,
    months: options.months,
    perProject: options.perProject
  });
  const searcher = new JiraSearchClient({
    server: config.server,
    email: config.email,
    apiToken: config.apiToken,
    timeoutMs: config.timeoutMs
  });
  const pipeline = new ReportPipeline(definition, {
    searcher,
    exporter: exporterFor(options.format ?? 'csv', definition.title),
    outputDir: options.outputDir ?? config.outputDir,
    maxResults: options.maxResults
  });

  const outcome = await pipeline.run();
  if (outcome.status === 'export-failed') {
    process.exitCode = 1;
  }
  return outcome;
}

export async function runTempoCommand(options: TempoCommandOptions = {}): Promise<string | null> {
  const config = loadTempoConfig();
  setLogLevel(config.logLevel);

  const range = resolveDateRange(options.dateFrom ?? config.dateFrom, options.dateTo ?? config.dateTo);
  const source = new TempoClient({
    apiUrl: config.apiUrl,
    apiToken: config.apiToken,
    timeoutMs: config.timeoutMs
  });

  const outputPath = await runTempoAnalysis({
    source,
    dateFrom: range.dateFrom,
    dateTo: range.dateTo,
    userIds: config.userIds,
    format: options.format ?? config.outputFormat,
    outputDir: options.outputDir ?? config.outputDir,
    outputPrefix: config.outputPrefix
  });

  if (outputPath === null) {
    process.exitCode = 1;
    return null;
  }
  console.log(`Report generated: ${outputPath}`);
  return outputPath;
}
