import { describe, expect, it } from 'vitest';
import type { JiraConfig } from '../config/env.js';
import { boardsForProjects, groupByProject, projectClause, projectOfKey } from '../reports/display.js';
import {
  findReport,
  MyTicketsReport,
  RecentlyCreatedReport,
  reportCatalogue,
  StaleTicketsReport,
  StatusChangedReport
} from '../reports/index.js';
import { FIXED_NOW, sampleIssue, sparseIssue } from './fixtures.js';

const server = 'https://example.atlassian.net/';
const clock = () => FIXED_NOW;

describe('display helpers', () => {
  it('takes the project from an issue key', () => {
    expect(projectOfKey('DA-101')).toBe('DA');
    expect(projectOfKey('N/A')).toBe('N/A');
  });

  it('joins project clauses with OR', () => {
    expect(projectClause(['DA', 'OPS'])).toBe('project = DA OR project = OPS');
  });

  it('attaches board ids to the projects that have one', () => {
    expect(boardsForProjects(['DA', 'OPS'], { DA: 705 })).toEqual([
      { project: 'DA', name: 'DA Board', boardId: 705 },
      { project: 'OPS', name: 'OPS Board' }
    ]);
  });

  it('keeps configured boards first and appends unknown prefixes', () => {
    const rows = [{ ID: 'XY-1' }, { ID: 'DA-1' }, { ID: 'DA-2' }];
    const groups = groupByProject(rows, 'ID', boardsForProjects(['DA', 'OPS']));

    expect(groups.map((group) => [group.board.name, group.rows.map((row) => row.ID)])).toEqual([
      ['DA Board', ['DA-1', 'DA-2']],
      ['OPS Board', []],
      ['XY Project', ['XY-1']]
    ]);
  });
});

describe('StatusChangedReport', () => {
  const report = new StatusChangedReport({ server, clock, boardName: 'DA' });

  it('looks back one sprint from now', () => {
    expect(report.buildFilter()).toBe('project = "DA" AND (status changed AFTER "2024-10-01")');
  });

  it('builds rows with the normalized update time', () => {
    expect(report.transform(sampleIssue())).toEqual({
      ID: 'DA-101',
      Summary: 'Fix login timeout',
      Status: 'In Progress',
      'Last Updated': '2024-10-17 21:30'
    });
  });

  it('fills placeholders for missing fields', () => {
    expect(report.transform(sparseIssue('DA-7'))).toEqual({
      ID: 'DA-7',
      Summary: 'Bare ticket',
      Status: 'Unknown',
      'Last Updated': 'N/A'
    });
  });

  it('lists one line per row', () => {
    const lines = report.display([report.transform(sampleIssue())]);
    expect(lines[1]).toBe('DA tickets with status changes (last 27 days):');
    expect(lines[3]).toBe('ID: DA-101, Summary: Fix login timeout, Status: In Progress');
    expect(report.outputName()).toBe('status_changed_in_sprint');
  });
});

describe('MyTicketsReport', () => {
  const report = new MyTicketsReport({ server, clock, boards: boardsForProjects(['DA', 'OPS']) });

  it('filters on the current user across projects', () => {
    expect(report.buildFilter()).toBe(
      '(project = DA OR project = OPS) AND assignee = currentUser() ORDER BY updated DESC'
    );
  });

  it('builds rows with a browse link', () => {
    expect(report.transform(sampleIssue())).toEqual({
      Key: 'DA-101',
      Summary: 'Fix login timeout',
      Status: 'In Progress',
      Priority: 'High',
      Reporter: 'Morgan Lee',
      Created: '2024-10-01 07:15',
      'Last Updated': '2024-10-17 21:30',
      URL: 'https://example.atlassian.net/browse/DA-101'
    });
  });

  it('uses None and Unknown when priority and reporter are absent', () => {
    const row = report.transform(sparseIssue('OPS-3'));
    expect(row.Priority).toBe('None');
    expect(row.Reporter).toBe('Unknown');
  });

  it('groups rows by board and prints the total', () => {
    const lines = report.display([report.transform(sampleIssue())]);
    expect(lines).toContain('DA Board (Project: DA, Project)');
    expect(lines).toContain('Found 1 ticket(s) assigned to you:');
    expect(lines).toContain('No tickets assigned to you.');
    expect(lines[lines.length - 2]).toBe('Total tickets assigned to you across all boards: 1');
  });

  it('refuses an empty project list', () => {
    expect(() => new MyTicketsReport({ server, boards: [] })).toThrow('MyTicketsReport needs at least one project.');
  });
});

describe('StaleTicketsReport', () => {
  it('uses a cutoff of three 30-day months by default', () => {
    const report = new StaleTicketsReport({ server, clock, boards: boardsForProjects(['DA']) });
    expect(report.buildFilter()).toBe(
      '(project = DA) AND status changed BEFORE "2024-07-30" AND (updated >= "2024-07-30" OR created >= "2024-07-30")'
    );
    expect(report.outputName()).toBe('stale_tickets_report');
  });

  it('builds rows including the status change time', () => {
    const report = new StaleTicketsReport({ server, clock, boards: boardsForProjects(['DA']) });
    const row = report.transform(sampleIssue());
    expect(row.Assignee).toBe('Avery Quinn');
    expect(row['Status Changed']).toBe('2024-06-03 08:00');
    expect(report.transform(sparseIssue('DA-9')).Assignee).toBe('Unassigned');
  });

  it('has no per-project queries unless asked', () => {
    const report = new StaleTicketsReport({ server, clock, boards: boardsForProjects(['DA']) });
    expect(report.projectQueries()).toEqual([]);
  });

  it('builds one labelled query per board in per-project mode', () => {
    const report = new StaleTicketsReport({
      server,
      clock,
      boards: boardsForProjects(['DA', 'OPS'], { OPS: 812 }),
      perProject: true
    });
    expect(report.projectQueries().map((query) => query.label)).toEqual([
      'DA Board (Project: DA)',
      'OPS Board (Project: OPS)'
    ]);
    expect(report.projectQueries()[1]?.filter).toBe(
      'project = OPS AND status changed BEFORE "2024-07-30" AND (updated >= "2024-07-30" OR created >= "2024-07-30")'
    );
  });

  it('prints the stale total', () => {
    const report = new StaleTicketsReport({ server, clock, boards: boardsForProjects(['DA']), months: 2 });
    const lines = report.display([report.transform(sampleIssue())]);
    expect(lines[1]).toBe('Stale Tickets Report (no status change in the last 2 months):');
    expect(lines[lines.length - 2]).toBe('Total stale tickets across all boards: 1');
  });
});

describe('RecentlyCreatedReport', () => {
  it('looks back a week by default', () => {
    const report = new RecentlyCreatedReport({ server, clock, boardName: 'DA' });
    expect(report.buildFilter()).toBe('project = "DA" AND created >= "2024-10-21"');
    expect(report.outputName()).toBe('recently_created_tickets_7days');
  });

  it('names the output after the window', () => {
    const report = new RecentlyCreatedReport({ server, clock, boardName: 'DA', days: 14 });
    expect(report.outputName()).toBe('recently_created_tickets_14days');
  });

  it('builds rows with reporter and creation time', () => {
    const report = new RecentlyCreatedReport({ server, clock, boardName: 'DA' });
    expect(report.transform(sampleIssue())).toEqual({
      ID: 'DA-101',
      Summary: 'Fix login timeout',
      Status: 'In Progress',
      Assignee: 'Avery Quinn',
      Reporter: 'Morgan Lee',
      Created: '2024-10-01 07:15',
      URL: 'https://example.atlassian.net/browse/DA-101'
    });
  });
});

describe('reportCatalogue', () => {
  const config: JiraConfig = {
    server: 'https://example.atlassian.net',
    email: 'someone@example.com',
    apiToken: 'test-token',
    boardName: 'DA',
    projects: ['DA', 'OPS'],
    boardIds: { DA: 705 },
    outputDir: '/tmp/reports',
    timeoutMs: 30_000,
    logLevel: 'info'
  };

  it('lists the four reports', () => {
    expect(reportCatalogue.map((entry) => entry.name)).toEqual([
      'status-changed',
      'my-tickets',
      'stale-tickets',
      'recently-created'
    ]);
  });

  it('creates reports from configuration and options', () => {
    const entry = findReport('recently-created');
    expect(entry).toBeDefined();
    const report = entry?.create(config, { clock, days: 3 });
    expect(report?.buildFilter()).toBe('project = "DA" AND created >= "2024-10-25"');
  });

  it('shows configured board ids in grouped output', () => {
    const report = findReport('my-tickets')?.create(config, { clock });
    const lines = report?.display([{ Key: 'DA-101' }, { Key: 'OPS-2' }]) ?? [];
    expect(lines).toContain('DA Board (Project: DA, Board ID: 705)');
    expect(lines).toContain('OPS Board (Project: OPS, Project)');
  });

  it('returns undefined for unknown names', () => {
    expect(findReport('velocity')).toBeUndefined();
  });
});
