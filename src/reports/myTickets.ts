import { displayNameOf, extractField, extractText, issueKey, issueStatus, nameOf } from '../jira/fields.js';
import { normalizeJiraDate } from '../jira/dates.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import { JiraReport, RULE, THIN_RULE, type JiraReportContext } from '../pipeline/jiraReport.js';
import type { ReportRow } from '../pipeline/reportDefinition.js';
import { groupByProject, projectClause, type BoardInfo } from './display.js';

const HEADERS = ['Key', 'Summary', 'Status', 'Priority', 'Reporter', 'Created', 'Last Updated', 'URL'] as const;
type Header = (typeof HEADERS)[number];

export interface MyTicketsOptions extends JiraReportContext {
  boards: readonly BoardInfo[];
}

export class MyTicketsReport extends JiraReport<Header> {
  readonly title = 'My Assigned Tickets';

  private readonly boards: readonly BoardInfo[];

  constructor(options: MyTicketsOptions) {
    super(options);
    if (options.boards.length === 0) {
      throw new Error('MyTicketsReport needs at least one project.');
    }
    this.boards = options.boards;
  }

  buildFilter(): string {
    const projects = this.boards.map((board) => board.project);
    return `(${projectClause(projects)}) AND assignee = currentUser() ORDER BY updated DESC`;
  }

  override requiredFields(): readonly string[] {
    return ['summary', 'status', 'priority', 'created', 'updated', 'reporter'];
  }

  transform(issue: IssueRecord): ReportRow<Header> {
    const key = issueKey(issue);
    return {
      Key: key,
      Summary: extractText(issue, 'fields.summary'),
      Status: issueStatus(issue),
      Priority: nameOf(extractField(issue, 'fields.priority', ''), 'None'),
      Reporter: displayNameOf(extractField(issue, 'fields.reporter', ''), 'Unknown'),
      Created: normalizeJiraDate(extractText(issue, 'fields.created')),
      'Last Updated': normalizeJiraDate(extractText(issue, 'fields.updated')),
      URL: this.issueUrl(key)
    };
  }

  headers(): readonly Header[] {
    return HEADERS;
  }

  outputName(): string {
    return 'my_assigned_tickets';
  }

  override display(rows: readonly ReportRow<Header>[]): string[] {
    const lines = ['', 'My Assigned Tickets Report', RULE];
    let total = 0;

    for (const group of groupByProject<Header>(rows, 'Key', this.boards)) {
      const boardRef = group.board.boardId !== undefined ? `Board ID: ${group.board.boardId}` : 'Project';
      lines.push('', `${group.board.name} (Project: ${group.board.project}, ${boardRef})`, THIN_RULE);

      if (group.rows.length === 0) {
        lines.push('No tickets assigned to you.');
        continue;
      }

      lines.push(`Found ${group.rows.length} ticket(s) assigned to you:`);
      for (const row of group.rows) {
        lines.push(
          '',
          `  ${row.Key}: ${row.Summary}`,
          `     Status: ${row.Status}`,
          `     Priority: ${row.Priority}`,
          `     Reporter: ${row.Reporter}`,
          `     Last Updated: ${row['Last Updated']}`,
          `     URL: ${row.URL}`
        );
      }
      total += group.rows.length;
    }

    lines.push('', RULE, `Total tickets assigned to you across all boards: ${total}`, RULE);
    return lines;
  }
}
