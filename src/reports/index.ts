import type { JiraConfig } from '../config/env.js';
import type { Clock } from '../lib/time.js';
import type { ReportDefinition } from '../pipeline/reportDefinition.js';
import { boardsForProjects } from './display.js';
import { MyTicketsReport } from './myTickets.js';
import { RecentlyCreatedReport } from './recentlyCreated.js';
import { StaleTicketsReport } from './staleTickets.js';
import { StatusChangedReport } from './statusChanged.js';

export interface ReportOptions {
  clock?: Clock;
  /** Look-back window for status-changed and recently-created. */
  days?: number;
  /** Staleness threshold for stale-tickets. */
  months?: number;
  /** Search stale-tickets one project at a time. */
  perProject?: boolean;
}

export interface ReportEntry {
  name: string;
  description: string;
  create(config: JiraConfig, options?: ReportOptions): ReportDefinition<string>;
}

export const reportCatalogue: readonly ReportEntry[] = [
  {
    name: 'status-changed',
    description: 'Tickets on the board with a status change in the last sprint',
    create: (config, options = {}) =>
      new StatusChangedReport({
        server: config.server,
        clock: options.clock,
        boardName: config.boardName,
        sprintDays: options.days
      })
  },
  {
    name: 'my-tickets',
    description: 'Tickets assigned to the current user across the configured projects',
    create: (config, options = {}) =>
      new MyTicketsReport({
        server: config.server,
        clock: options.clock,
        boards: boardsForProjects(config.projects, config.boardIds)
      })
  },
  {
    name: 'stale-tickets',
    description: 'Tickets with no status change in the last 3 months across the configured projects',
    create: (config, options = {}) =>
      new StaleTicketsReport({
        server: config.server,
        clock: options.clock,
        boards: boardsForProjects(config.projects, config.boardIds),
        months: options.months,
        perProject: options.perProject
      })
  },
  {
    name: 'recently-created',
    description: 'Tickets created on the board in the last 7 days',
    create: (config, options = {}) =>
      new RecentlyCreatedReport({
        server: config.server,
        clock: options.clock,
        boardName: config.boardName,
        days: options.days
      })
  }
];

export function findReport(name: string): ReportEntry | undefined {
  return reportCatalogue.find((entry) => entry.name === name);
}

export { MyTicketsReport, RecentlyCreatedReport, StaleTicketsReport, StatusChangedReport };
