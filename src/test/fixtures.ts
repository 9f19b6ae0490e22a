import type { IssueRecord } from '../jira/issueRecord.js';

export function sampleIssue(overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    id: '10001',
    key: 'DA-101',
    fields: {
      summary: 'Fix login timeout',
      status: { name: 'In Progress', statusCategory: { key: 'indeterminate' } },
      assignee: { displayName: 'Avery Quinn', accountId: 'acc-1' },
      reporter: { displayName: 'Morgan Lee', accountId: 'acc-2' },
      priority: { name: 'High' },
      created: '2024-10-01T09:15:00.000+0200',
      updated: '2024-10-17T14:30:45.123-0700',
      statuscategorychangedate: '2024-06-03T08:00:00.000+0000'
    },
    ...overrides
  };
}

export function sparseIssue(key: string): IssueRecord {
  return { id: '10099', key, fields: { summary: 'Bare ticket', status: null, assignee: null } };
}

export function searchBody(issues: IssueRecord[]): string {
  return JSON.stringify({ issues, isLast: true });
}

export const FIXED_NOW = new Date(2024, 9, 28, 12, 0, 0);
