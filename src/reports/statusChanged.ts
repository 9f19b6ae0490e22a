import { extractText, issueKey, issueStatus } from '../jira/fields.js';
import { normalizeJiraDate } from '../jira/dates.js';
import type { IssueRecord } from '../jira/issueRecord.js';
import { JiraReport, THIN_RULE, type JiraReportContext } from '../pipeline/jiraReport.js';
import type { ReportRow } from '../pipeline/reportDefinition.js';

const HEADERS = ['ID', 'Summary', 'Status', 'Last Updated'] as const;
type Header = (typeof HEADERS)[number];

export const ONE_SPRINT_DAYS = 27;

export interface StatusChangedOptions extends JiraReportContext {
  boardName: string;
  sprintDays?: number;
}

/** Issues on one board whose status moved during the last sprint. */
export class StatusChangedReport extends JiraReport<Header> {
  readonly title = 'Status Changed in Sprint';

  private readonly boardName: string;
  private readonly sprintDays: number;

  constructor(options: StatusChangedOptions) {
    super(options);
    this.boardName = options.boardName;
    this.sprintDays = options.sprintDays ?? ONE_SPRINT_DAYS;
  }

  buildFilter(): string {
    const since = this.jqlDate(this.daysAgo(this.sprintDays));
    return `project = "${this.boardName}" AND (status changed AFTER "${since}")`;
  }

  override requiredFields(): readonly string[] {
    return ['summary', 'status', 'updated'];
  }

  transform(issue: IssueRecord): ReportRow<Header> {
    return {
      ID: issueKey(issue),
      Summary: extractText(issue, 'fields.summary'),
      Status: issueStatus(issue),
      'Last Updated': normalizeJiraDate(extractText(issue, 'fields.updated'))
    };
  }

  headers(): readonly Header[] {
    return HEADERS;
  }

  outputName(): string {
    return 'status_changed_in_sprint';
  }

  override display(rows: readonly ReportRow<Header>[]): string[] {
    const lines = ['', `${this.boardName} tickets with status changes (last ${this.sprintDays} days):`, THIN_RULE];
    for (const row of rows) {
      lines.push(`ID: ${row.ID}, Summary: ${row.Summary}, Status: ${row.Status}`);
    }
    return lines;
  }
}
