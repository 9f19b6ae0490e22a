import path from 'node:path';
import { log } from '../lib/log.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import { DEFAULT_MAX_RESULTS, type IssueSearcher } from '../jira/searchClient.js';
import type { TableExporter } from '../sinks/types.js';
import { RULE } from './jiraReport.js';
import type { ProjectQuery, ReportDefinition, ReportRow } from './reportDefinition.js';

export type ReportRunOutcome =
  | { status: 'empty'; filters: readonly string[] }
  | { status: 'exported'; filters: readonly string[]; outputPath: string; rowCount: number }
  | { status: 'export-failed'; filters: readonly string[]; outputPath: string; rowCount: number; error: unknown };

export interface ReportPipelineOptions {
  searcher: IssueSearcher;
  exporter: TableExporter;
  outputDir: string;
  maxResults?: number;
  print?: (line: string) => void;
}

const NO_MATCHES = 'No issues found matching the criteria.';

/**
 * Single pass: build filter, search, transform, display, export. An empty
 * search result ends the run before display and export. Reports that expose
 * project queries are searched once per project and exported as one file.
 */
export class ReportPipeline<H extends string> {
  private readonly searcher: IssueSearcher;
  private readonly exporter: TableExporter;
  private readonly outputDir: string;
  private readonly maxResults: number;
  private readonly print: (line: string) => void;

  constructor(
    private readonly report: ReportDefinition<H>,
    options: ReportPipelineOptions
  ) {
    this.searcher = options.searcher;
    this.exporter = options.exporter;
    this.outputDir = options.outputDir;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.print = options.print ?? ((line) => console.log(line));
  }

  get outputPath(): string {
    return path.join(this.outputDir, `${this.report.outputName()}.${this.exporter.extension}`);
  }

  async run(): Promise<ReportRunOutcome> {
    const queries = this.report.projectQueries?.() ?? [];
    if (queries.length > 0) {
      return this.runByProject(queries);
    }

    this.printBanner(this.report.title);

    const filter = this.report.buildFilter();
    const issues = await this.fetch(filter);
    if (issues.length === 0) {
      this.print(NO_MATCHES);
      return { status: 'empty', filters: [filter] };
    }

    const rows: ReportRow<H>[] = issues.map((issue) => this.report.transform(issue));

    for (const line of this.report.display(rows)) {
      this.print(line);
    }

    return this.export(rows, [filter]);
  }

  private async runByProject(queries: readonly ProjectQuery[]): Promise<ReportRunOutcome> {
    this.printBanner(`${this.report.title} - Individual Project Analysis`);

    const rows: ReportRow<H>[] = [];
    for (const query of queries) {
      this.print('');
      this.print(`Analyzing ${query.label}`);
      this.print('-'.repeat(60));

      const issues = await this.fetch(query.filter);
      if (issues.length === 0) {
        this.print('No issues found.');
        continue;
      }
      this.print(`Found ${issues.length} issue(s)`);
      rows.push(...issues.map((issue) => this.report.transform(issue)));
    }

    const filters = queries.map((query) => query.filter);
    this.print('');
    this.print(`Total issues across all projects: ${rows.length}`);
    if (rows.length === 0) {
      this.print(NO_MATCHES);
      return { status: 'empty', filters };
    }
    return this.export(rows, filters);
  }

  private printBanner(title: string): void {
    this.print(RULE);
    this.print(title);
    this.print(RULE);
  }

  private fetch(filter: string): Promise<IssueRecord[]> {
    const fields = this.report.requiredFields();
    log.info(`required fields: ${fields.join(', ')}`);
    return this.searcher.search(filter, fields, this.maxResults);
  }

  private async export(rows: ReportRow<H>[], filters: readonly string[]): Promise<ReportRunOutcome> {
    const outputPath = this.outputPath;
    const result = await this.exporter.write(outputPath, rows, this.report.headers());
    if (!result.ok) {
      log.error(`report "${this.report.title}" finished without writing ${outputPath}`);
      return { status: 'export-failed', filters, outputPath, rowCount: rows.length, error: result.error };
    }

    return { status: 'exported', filters, outputPath, rowCount: rows.length };
  }
}
