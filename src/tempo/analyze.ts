import type {
  AccountRecord,
  TeamSummaryRow,
  WorklogRecord,
  WorklogRow,
  WorklogSummaryRow
} from './worklog.js';

export function roundHours(hours: number): number {
  return Math.round(hours * 100) / 100;
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Account id attached to a worklog: either `attributes._account_.id` or the
 * `_Account_` entry of `attributes.values`.
 */
export function accountIdOf(worklog: WorklogRecord): string | null {
  const attributes = worklog.attributes;
  if (!isRecord(attributes)) {
    return null;
  }

  const direct = attributes._account_;
  if (isRecord(direct) && (typeof direct.id === 'string' || typeof direct.id === 'number')) {
    return String(direct.id);
  }

  const values = attributes.values;
  if (Array.isArray(values)) {
    for (const entry of values) {
      if (isRecord(entry) && entry.key === '_Account_' && typeof entry.value === 'string') {
        return entry.value;
      }
    }
  }
  return null;
}

export function toWorklogRows(
  worklogs: readonly WorklogRecord[],
  accounts: ReadonlyMap<string, AccountRecord>
): WorklogRow[] {
  return worklogs.map((worklog) => {
    const accountId = accountIdOf(worklog);
    const account = accountId === null ? undefined : accounts.get(accountId);

    let accountCode: string | null = null;
    let accountName: string | null = null;
    if (account) {
      accountCode = account.key ?? accountId;
      accountName = account.name ?? 'Unknown';
    } else if (accountId !== null) {
      accountCode = accountId;
      accountName = 'Unknown';
    }

    return {
      date: worklog.startDate ?? null,
      team_member: worklog.author?.displayName ?? 'Unknown',
      account_id: worklog.author?.accountId ?? null,
      issue_key: worklog.issue?.key ?? 'No Issue',
      issue_id: worklog.issue?.id ?? null,
      account_code: accountCode,
      account_name: accountName,
      hours: (worklog.timeSpentSeconds ?? 0) / 3600,
      description: worklog.description ?? '',
      worklog_id: worklog.tempoWorklogId === undefined ? null : String(worklog.tempoWorklogId)
    };
  });
}

/**
 * Hours per member, account and issue. Sorted by member, then by hours with the
 * largest first; up to three distinct descriptions are kept per group.
 */
export function summarizeWorklogs(rows: readonly WorklogRow[]): WorklogSummaryRow[] {
  const groups = new Map<
    string,
    { first: WorklogRow; hours: number; descriptions: string[] }
  >();

  for (const row of rows) {
    const key = JSON.stringify([row.team_member, row.account_code, row.account_name, row.issue_key]);
    const group = groups.get(key) ?? { first: row, hours: 0, descriptions: [] };
    group.hours += row.hours;
    if (row.description.length > 0 && !group.descriptions.includes(row.description)) {
      group.descriptions.push(row.description);
    }
    groups.set(key, group);
  }

  return [...groups.values()]
    .map((group) => ({
      team_member: group.first.team_member,
      account_code: group.first.account_code,
      account_name: group.first.account_name,
      issue_key: group.first.issue_key,
      hours: roundHours(group.hours),
      description: group.descriptions.slice(0, 3).join(' | ')
    }))
    .sort((a, b) => compareText(a.team_member, b.team_member) || b.hours - a.hours);
}

export function summarizeTeam(rows: readonly WorklogRow[]): TeamSummaryRow[] {
  const totals = new Map<string, { hours: number; count: number }>();
  for (const row of rows) {
    const total = totals.get(row.team_member) ?? { hours: 0, count: 0 };
    total.hours += row.hours;
    total.count += 1;
    totals.set(row.team_member, total);
  }

  return [...totals.entries()]
    .map(([member, total]) => ({
      team_member: member,
      total_hours: roundHours(total.hours),
      worklog_count: total.count
    }))
    .sort((a, b) => b.total_hours - a.total_hours);
}

export interface WorklogStatistics {
  totalHours: number;
  teamMembers: number;
  issues: number;
  worklogs: number;
}

export function worklogStatistics(rows: readonly WorklogRow[]): WorklogStatistics {
  return {
    totalHours: roundHours(rows.reduce((sum, row) => sum + row.hours, 0)),
    teamMembers: new Set(rows.map((row) => row.team_member)).size,
    issues: new Set(rows.map((row) => row.issue_key)).size,
    worklogs: rows.length
  };
}
