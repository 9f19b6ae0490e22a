import { displayNameOf, extractField, extractText, issueAssignee, issueKey, issueStatus } from '../jira/fields.js';
import { normalizeJiraDate } from '../jira/dates.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import { JiraReport, THIN_RULE, type JiraReportContext } from '../pipeline/jiraReport.js';
import type { ReportRow } from '../pipeline/reportDefinition.js';

const HEADERS = ['ID', 'Summary', 'Status', 'Assignee', 'Reporter', 'Created', 'URL'] as const;
type Header = (typeof HEADERS)[number];

export interface RecentlyCreatedOptions extends JiraReportContext {
  boardName: string;
  days?: number;
}

export class RecentlyCreatedReport extends JiraReport<Header> {
  readonly title = 'Recently Created Tickets';

  private readonly boardName: string;
  private readonly days: number;

  constructor(options: RecentlyCreatedOptions) {
    super(options);
    this.boardName = options.boardName;
    this.days = options.days ?? 7;
  }

  buildFilter(): string {
    return `project = "${this.boardName}" AND created >= "${this.jqlDate(this.daysAgo(this.days))}"`;
  }

  override requiredFields(): readonly string[] {
    return ['summary', 'status', 'assignee', 'created', 'reporter'];
  }

  transform(issue: IssueRecord): ReportRow<Header> {
    const key = issueKey(issue);
    return {
      ID: key,
      Summary: extractText(issue, 'fields.summary'),
      Status: issueStatus(issue),
      Assignee: issueAssignee(issue),
      Reporter: displayNameOf(extractField(issue, 'fields.reporter', ''), 'Unknown'),
      Created: normalizeJiraDate(extractText(issue, 'fields.created')),
      URL: this.issueUrl(key)
    };
  }

  headers(): readonly Header[] {
    return HEADERS;
  }

  outputName(): string {
    return `recently_created_tickets_${this.days}days`;
  }

  override display(rows: readonly ReportRow<Header>[]): string[] {
    const lines = ['', `Recently Created Tickets (last ${this.days} days):`, THIN_RULE];
    for (const row of rows) {
      lines.push(
        `${row.ID}: ${row.Summary}`,
        `   Status: ${row.Status} | Assignee: ${row.Assignee}`,
        `   Reporter: ${row.Reporter} | Created: ${row.Created}`,
        ''
      );
    }
    return lines;
  }
}
