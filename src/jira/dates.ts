import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';
import { MISSING } from './issueRecord.js';

export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd HH:mm';

const NAIVE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;
const OFFSET_DIGITS = /^\d{4}$/;

interface SplitTimestamp {
  naive: string;
  sign: 1 | -1;
  offset: string;
}

function splitOffset(raw: string): SplitTimestamp {
  const value = raw.endsWith('Z') ? raw.slice(0, -1) : raw;

  const plusIndex = value.lastIndexOf('+');
  if (plusIndex >= 0) {
    return { naive: value.slice(0, plusIndex), sign: 1, offset: value.slice(plusIndex + 1) };
  }

  const dashCount = value.split('-').length - 1;
  if (dashCount > 2) {
    const minusIndex = value.lastIndexOf('-');
    const tail = value.slice(minusIndex + 1);
    if (OFFSET_DIGITS.test(tail)) {
      return { naive: value.slice(0, minusIndex), sign: -1, offset: tail };
    }
  }

  return { naive: value, sign: 1, offset: '0000' };
}

function offsetMinutes(split: SplitTimestamp): number | null {
  if (!OFFSET_DIGITS.test(split.offset)) {
    return null;
  }
  const hours = Number(split.offset.slice(0, 2));
  const minutes = Number(split.offset.slice(2, 4));
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return split.sign * (hours * 60 + minutes);
}

function parseNaiveUtcMs(naive: string): number | null {
  const match = NAIVE_TIMESTAMP.exec(naive);
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  const millis = fraction ? Math.floor(Number(fraction.padEnd(6, '0')) / 1000) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.getTime();
}

/**
 * Converts a Jira timestamp such as `2024-10-17T14:30:45.123-0700` to UTC and
 * renders it with a date-fns pattern. Returns `raw` untouched when it cannot be
 * parsed, so a result equal to the input means "unparsed".
 */
export function normalizeJiraDate(raw: string, outputFormat: string = DEFAULT_DATE_FORMAT): string {
  if (raw.length === 0 || raw === MISSING) {
    return raw;
  }

  const split = splitOffset(raw);
  const offset = offsetMinutes(split);
  const naiveMs = parseNaiveUtcMs(split.naive);
  if (offset === null || naiveMs === null) {
    return raw;
  }

  try {
    return format(new UTCDate(naiveMs - offset * 60_000), outputFormat);
  } catch {
    return raw;
  }
}
