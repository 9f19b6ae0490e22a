import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { ConfigurationError, getErrorMessage } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { reportCatalogue, type ReportEntry } from '../reports/index.js';

export type MenuChoice = { kind: 'report'; entry: ReportEntry } | { kind: 'exit' } | { kind: 'invalid'; reason: string };

export function menuLines(entries: readonly ReportEntry[] = reportCatalogue): string[] {
  const lines = ['', '='.repeat(80), 'JIRA REPORTS', '='.repeat(80), 'Available reports:', ''];
  entries.forEach((entry, index) => {
    lines.push(`${String(index + 1).padStart(2)}. ${entry.name}`, `     ${entry.description}`, '');
  });
  lines.push(`${String(entries.length + 1).padStart(2)}. Exit`, '='.repeat(80));
  return lines;
}

export function parseMenuChoice(answer: string, entries: readonly ReportEntry[] = reportCatalogue): MenuChoice {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === 'q' || trimmed === 'quit' || trimmed === 'exit') {
    return { kind: 'exit' };
  }
  if (!/^\d+$/.test(trimmed)) {
    return { kind: 'invalid', reason: 'Please enter a number.' };
  }

  const choice = Number(trimmed);
  const entry = entries[choice - 1];
  if (entry) {
    return { kind: 'report', entry };
  }
  if (choice === entries.length + 1) {
    return { kind: 'exit' };
  }
  return { kind: 'invalid', reason: `Please enter a number between 1 and ${entries.length + 1}.` };
}

export async function runMenu(runReport: (name: string) => Promise<unknown>): Promise<void> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    while (true) {
      for (const line of menuLines()) {
        console.log(line);
      }

      const choice = parseMenuChoice(await rl.question(`\nEnter your choice (1-${reportCatalogue.length + 1}): `));
      if (choice.kind === 'exit') {
        break;
      }
      if (choice.kind === 'invalid') {
        console.log(choice.reason);
        continue;
      }

      console.log(`\nSelected: ${choice.entry.description}`);
      const confirm = (await rl.question('Run this report? (y/N): ')).trim().toLowerCase();
      if (confirm !== 'y' && confirm !== 'yes') {
        console.log('Cancelled.');
        continue;
      }

      try {
        await runReport(choice.entry.name);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        log.error(`report ${choice.entry.name} failed: ${getErrorMessage(error)}`);
      }

      const again = (await rl.question('\nRun another report? (Y/n): ')).trim().toLowerCase();
      if (again === 'n' || again === 'no') {
        break;
      }
    }
  } finally {
    rl.close();
  }
  console.log('Goodbye!');
}
