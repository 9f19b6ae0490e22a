import { format, subDays } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Calendar date in the form JQL date literals take. */
export function jqlDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function daysBefore(date: Date, days: number): Date {
  return subDays(date, days);
}

export function fileTimestamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
