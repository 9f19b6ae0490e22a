import { MISSING, type IssueRecord } from './issueRecord.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function step(current: unknown, segment: string): { found: boolean; value: unknown } {
  if (Array.isArray(current)) {
    if (!/^\d+$/.test(segment)) {
      return { found: false, value: undefined };
    }
    const index = Number(segment);
    return index < current.length ? { found: true, value: current[index] } : { found: false, value: undefined };
  }
  if (isPlainObject(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
    return { found: true, value: current[segment] };
  }
  return { found: false, value: undefined };
}

/**
 * Reads `fields.assignee.displayName`-style paths out of an issue. Object keys
 * and array indexes are both accepted as segments.
 */
export function extractField(record: IssueRecord, dottedPath: string, fallback: string = MISSING): unknown {
  let current: unknown = record;
  for (const segment of dottedPath.split('.')) {
    const next = step(current, segment);
    if (!next.found) {
      return fallback;
    }
    current = next.value;
  }
  return current === null || current === undefined ? fallback : current;
}

export function extractText(record: IssueRecord, dottedPath: string, fallback: string = MISSING): string {
  const value = extractField(record, dottedPath, fallback);
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

function namedProperty(value: unknown, property: string, fallback: string): string {
  if (value === null || value === undefined) {
    return fallback;
  }
  if (typeof value === 'string') {
    return value.length > 0 ? value : fallback;
  }
  if (isPlainObject(value)) {
    const named = value[property];
    return typeof named === 'string' && named.length > 0 ? named : fallback;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

export function displayNameOf(value: unknown, fallback: string): string {
  return namedProperty(value, 'displayName', fallback);
}

export function nameOf(value: unknown, fallback: string): string {
  return namedProperty(value, 'name', fallback);
}

export function issueStatus(record: IssueRecord): string {
  const status = extractField(record, 'fields.status');
  return status === MISSING ? 'Unknown' : nameOf(status, 'Unknown');
}

export function issueAssignee(record: IssueRecord): string {
  const assignee = extractField(record, 'fields.assignee');
  return assignee === MISSING ? 'Unassigned' : displayNameOf(assignee, 'Unassigned');
}

export function issueKey(record: IssueRecord): string {
  return record.key ?? MISSING;
}
