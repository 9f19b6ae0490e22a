import type { ReportRow } from '../pipeline/reportDefinition.js';

export interface BoardInfo {
  project: string;
  name: string;
  boardId?: number;
}

export function boardsForProjects(
  projects: readonly string[],
  boardIds: Readonly<Record<string, number>> = {}
): BoardInfo[] {
  return projects.map((project) => {
    const name = `${project} Board`;
    const boardId = boardIds[project];
    return boardId === undefined ? { project, name } : { project, name, boardId };
  });
}

export function projectOfKey(issueKey: string): string {
  return issueKey.split('-')[0] ?? issueKey;
}

export interface ProjectGroup<H extends string> {
  board: BoardInfo;
  rows: ReportRow<H>[];
}

/**
 * Buckets rows by the project prefix of `keyColumn`. Configured boards come
 * first, in order; prefixes nobody configured follow in arrival order.
 */
export function groupByProject<H extends string>(
  rows: readonly ReportRow<H>[],
  keyColumn: H,
  boards: readonly BoardInfo[]
): ProjectGroup<H>[] {
  const buckets = new Map<string, ReportRow<H>[]>();
  for (const row of rows) {
    const project = projectOfKey(row[keyColumn]);
    const bucket = buckets.get(project) ?? [];
    bucket.push(row);
    buckets.set(project, bucket);
  }

  const groups: ProjectGroup<H>[] = boards.map((board) => ({
    board,
    rows: buckets.get(board.project) ?? []
  }));

  const configured = new Set(boards.map((board) => board.project));
  for (const [project, bucket] of buckets) {
    if (!configured.has(project)) {
      groups.push({ board: { project, name: `${project} Project` }, rows: bucket });
    }
  }
  return groups;
}

export function projectClause(projects: readonly string[]): string {
  return projects.map((project) => `project = ${project}`).join(' OR ');
}
