import { describe, expect, it } from 'vitest';
import { menuLines, parseMenuChoice } from '../cli/menu.js';
import { reportCatalogue } from '../reports/index.js';

describe('parseMenuChoice', () => {
  it('selects a report by its number', () => {
    const choice = parseMenuChoice(' 2 ');
    expect(choice.kind === 'report' ? choice.entry.name : choice.kind).toBe('my-tickets');
  });

  it('treats the last number and q as exit', () => {
    expect(parseMenuChoice(String(reportCatalogue.length + 1))).toEqual({ kind: 'exit' });
    expect(parseMenuChoice('Q')).toEqual({ kind: 'exit' });
  });

  it('explains invalid answers', () => {
    expect(parseMenuChoice('two')).toEqual({ kind: 'invalid', reason: 'Please enter a number.' });
    expect(parseMenuChoice('9')).toEqual({ kind: 'invalid', reason: 'Please enter a number between 1 and 5.' });
    expect(parseMenuChoice('0')).toEqual({ kind: 'invalid', reason: 'Please enter a number between 1 and 5.' });
  });
});

describe('menuLines', () => {
  it('numbers each report and ends with exit', () => {
    const lines = menuLines();
    expect(lines).toContain(' 1. status-changed');
    expect(lines).toContain(' 4. recently-created');
    expect(lines[lines.length - 2]).toBe(' 5. Exit');
  });
});
