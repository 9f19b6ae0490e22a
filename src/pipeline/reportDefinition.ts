import type { IssueRecord } from '../jira/issueRecord.js';

export type ReportRow<H extends string> = { readonly [P in H]: string };

/** One project's share of a report that is searched project by project. */
export interface ProjectQuery {
  label: string;
  filter: string;
}

export interface ReportDefinition<H extends string = string> {
  readonly title: string;
  buildFilter(): string;
  requiredFields(): readonly string[];
  transform(issue: IssueRecord): ReportRow<H>;
  headers(): readonly H[];
  /** File name without extension; the exporter picks the extension. */
  outputName(): string;
  /** Console lines for the summary. Must not change the rows. */
  display(rows: readonly ReportRow<H>[]): string[];
  /**
   * When non-empty, the pipeline runs one search per entry instead of
   * `buildFilter()` and exports the combined rows.
   */
  projectQueries?(): readonly ProjectQuery[];
}
