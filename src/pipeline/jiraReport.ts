import { systemClock, daysBefore, jqlDate as toJqlDate, type Clock } from '../lib/time.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import type { ReportDefinition, ReportRow } from './reportDefinition.js';

export interface JiraReportContext {
  server: string;
  clock?: Clock;
}

export const RULE = '='.repeat(80);
export const THIN_RULE = '-'.repeat(80);

export abstract class JiraReport<H extends string> implements ReportDefinition<H> {
  abstract readonly title: string;

  protected readonly server: string;
  protected readonly clock: Clock;

  constructor(context: JiraReportContext) {
    this.server = context.server.replace(/\/+$/, '');
    this.clock = context.clock ?? systemClock;
  }

  abstract buildFilter(): string;
  abstract transform(issue: IssueRecord): ReportRow<H>;
  abstract headers(): readonly H[];
  abstract outputName(): string;

  requiredFields(): readonly string[] {
    return ['summary', 'status', 'created', 'updated'];
  }

  display(rows: readonly ReportRow<H>[]): string[] {
    const lines = ['', 'Results Summary:', '-'.repeat(40)];
    for (const row of rows) {
      for (const header of this.headers()) {
        lines.push(`  ${header}: ${row[header]}`);
      }
      lines.push('');
    }
    return lines;
  }

  protected issueUrl(issueKey: string): string {
    return `${this.server}/browse/${issueKey}`;
  }

  protected daysAgo(days: number): Date {
    return daysBefore(this.clock(), days);
  }

  /** `yyyy-MM-dd`, as JQL date comparisons take it. */
  protected jqlDate(date: Date): string {
    return toJqlDate(date);
  }
}
