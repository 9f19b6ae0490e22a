import { describe, expect, it } from 'vitest';
import { normalizeJiraDate } from '../jira/dates.js';

describe('normalizeJiraDate', () => {
  it('keeps the clock time for a zero offset', () => {
    const samples = [
      ['2024-10-17T14:30:45.123+0000', '2024-10-17 14:30'],
      ['2023-01-01T00:00:00+0000', '2023-01-01 00:00'],
      ['2024-02-29T23:59:59.9+0000', '2024-02-29 23:59']
    ] as const;

    for (const [raw, expected] of samples) {
      expect(normalizeJiraDate(raw)).toBe(expected);
    }
  });

  it('subtracts a positive offset', () => {
    expect(normalizeJiraDate('2024-10-17T14:30:45.123+0100', 'yyyy-MM-dd HH:mm:ss')).toBe('2024-10-17 13:30:45');
  });

  it('adds back a negative offset', () => {
    expect(normalizeJiraDate('2024-10-17T14:30:45.123-0700')).toBe('2024-10-17 21:30');
  });

  it('applies offset minutes with the offset sign and rolls the date', () => {
    expect(normalizeJiraDate('2024-10-17T23:45:00-0130')).toBe('2024-10-18 01:15');
    expect(normalizeJiraDate('2024-03-01T00:15:00.000+0530')).toBe('2024-02-29 18:45');
  });

  it('treats a missing offset or a trailing Z as UTC', () => {
    expect(normalizeJiraDate('2024-10-17T14:30:45')).toBe('2024-10-17 14:30');
    expect(normalizeJiraDate('2024-10-17T14:30:45Z')).toBe('2024-10-17 14:30');
  });

  it('keeps up to microsecond precision in the fraction', () => {
    expect(normalizeJiraDate('2024-10-17T14:30:45.123456+0000', 'HH:mm:ss.SSS')).toBe('14:30:45.123');
  });

  it('returns empty and placeholder input unchanged', () => {
    expect(normalizeJiraDate('')).toBe('');
    expect(normalizeJiraDate('N/A')).toBe('N/A');
  });

  it('returns malformed input unchanged', () => {
    const malformed = [
      'not-a-date',
      '2024-13-01T00:00:00+0000',
      '2024-02-30T00:00:00+0000',
      '2024-10-17T24:00:00+0000',
      '2024-10-17T14:30:45+2500',
      '2024-10-17T14:30:45+0160',
      '2024-10-17T14:30:45+01:00',
      '2024-10-17T14:30:45-07:00',
      '2024-10-17 14:30:45+0000',
      '2024-10-17T14:30:45.1234567+0000'
    ];

    for (const raw of malformed) {
      expect(normalizeJiraDate(raw)).toBe(raw);
    }
  });

  it('returns the input when the output pattern is rejected', () => {
    expect(normalizeJiraDate('2024-10-17T14:30:45+0000', 'YYYY')).toBe('2024-10-17T14:30:45+0000');
  });
});
