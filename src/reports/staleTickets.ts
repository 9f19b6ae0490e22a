import { extractText, issueAssignee, issueKey, issueStatus } from '../jira/fields.js';
import { normalizeJiraDate } from '../jira/dates.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import { JiraReport, RULE, type JiraReportContext } from '../pipeline/jiraReport.js';
import type { ProjectQuery, ReportRow } from '../pipeline/reportDefinition.js';
import { groupByProject, projectClause, type BoardInfo } from './display.js';

const HEADERS = ['ID', 'Summary', 'Status', 'Assignee', 'Created', 'Last Updated', 'Status Changed', 'URL'] as const;
type Header = (typeof HEADERS)[number];

export interface StaleTicketsOptions extends JiraReportContext {
  boards: readonly BoardInfo[];
  months?: number;
  /** Query each board on its own instead of one query across all of them. */
  perProject?: boolean;
}

/**
 * Tickets whose status has not moved for `months` (30-day months) but which
 * were still touched or created inside that window.
 */
export class StaleTicketsReport extends JiraReport<Header> {
  readonly title = 'Stale Tickets';

  private readonly boards: readonly BoardInfo[];
  private readonly months: number;
  private readonly perProject: boolean;

  constructor(options: StaleTicketsOptions) {
    super(options);
    if (options.boards.length === 0) {
      throw new Error('StaleTicketsReport needs at least one project.');
    }
    this.boards = options.boards;
    this.months = options.months ?? 3;
    this.perProject = options.perProject ?? false;
  }

  get staleDays(): number {
    return this.months * 30;
  }

  private staleClause(): string {
    const cutoff = this.jqlDate(this.daysAgo(this.staleDays));
    return `status changed BEFORE "${cutoff}" AND (updated >= "${cutoff}" OR created >= "${cutoff}")`;
  }

  buildFilter(): string {
    const projects = this.boards.map((board) => board.project);
    return `(${projectClause(projects)}) AND ${this.staleClause()}`;
  }

  projectQueries(): readonly ProjectQuery[] {
    if (!this.perProject) {
      return [];
    }
    return this.boards.map((board) => ({
      label: `${board.name} (Project: ${board.project})`,
      filter: `project = ${board.project} AND ${this.staleClause()}`
    }));
  }

  override requiredFields(): readonly string[] {
    return ['summary', 'status', 'assignee', 'created', 'updated', 'statuscategorychangedate'];
  }

  transform(issue: IssueRecord): ReportRow<Header> {
    const key = issueKey(issue);
    return {
      ID: key,
      Summary: extractText(issue, 'fields.summary'),
      Status: issueStatus(issue),
      Assignee: issueAssignee(issue),
      Created: normalizeJiraDate(extractText(issue, 'fields.created')),
      'Last Updated': normalizeJiraDate(extractText(issue, 'fields.updated')),
      'Status Changed': normalizeJiraDate(extractText(issue, 'fields.statuscategorychangedate')),
      URL: this.issueUrl(key)
    };
  }

  headers(): readonly Header[] {
    return HEADERS;
  }

  outputName(): string {
    return 'stale_tickets_report';
  }

  override display(rows: readonly ReportRow<Header>[]): string[] {
    const lines = ['', `Stale Tickets Report (no status change in the last ${this.months} months):`, RULE];
    let total = 0;

    for (const group of groupByProject<Header>(rows, 'ID', this.boards)) {
      lines.push('', `${group.board.name} (Project: ${group.board.project})`, '-'.repeat(60));

      if (group.rows.length === 0) {
        lines.push('No stale tickets found.');
        continue;
      }

      lines.push(`Found ${group.rows.length} stale ticket(s):`);
      for (const row of group.rows) {
        lines.push(
          '',
          `  ${row.ID}: ${row.Summary}`,
          `     Status: ${row.Status}`,
          `     Assignee: ${row.Assignee}`,
          `     Last Updated: ${row['Last Updated']}`,
          `     Status Changed: ${row['Status Changed']}`,
          `     URL: ${row.URL}`
        );
      }
      total += group.rows.length;
    }

    lines.push('', RULE, `Total stale tickets across all boards: ${total}`, RULE);
    return lines;
  }
}
