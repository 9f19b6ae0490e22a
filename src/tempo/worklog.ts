import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const worklogSchema = z
  .object({
    tempoWorklogId: z.union([z.string(), z.number()]).optional(),
    issue: z
      .object({
        id: idSchema.optional(),
        key: z.string().optional()
      })
      .passthrough()
      .optional(),
    timeSpentSeconds: z.number().optional(),
    startDate: z.string().optional(),
    description: z.string().nullable().optional(),
    author: z
      .object({
        accountId: z.string().optional(),
        displayName: z.string().optional()
      })
      .passthrough()
      .optional(),
    attributes: z.unknown().optional()
  })
  .passthrough();

export const accountSchema = z
  .object({
    id: idSchema,
    key: z.string().optional(),
    name: z.string().optional()
  })
  .passthrough();

export const worklogPageSchema = z.object({ results: z.array(worklogSchema).optional() }).passthrough();
export const accountPageSchema = z.object({ results: z.array(accountSchema).optional() }).passthrough();

export type WorklogRecord = z.infer<typeof worklogSchema>;
export type AccountRecord = z.infer<typeof accountSchema>;

export const WORKLOG_HEADERS = [
  'date',
  'team_member',
  'account_id',
  'issue_key',
  'issue_id',
  'account_code',
  'account_name',
  'hours',
  'description',
  'worklog_id'
] as const;

export const SUMMARY_HEADERS = ['team_member', 'account_code', 'account_name', 'issue_key', 'hours', 'description'] as const;

export const TEAM_SUMMARY_HEADERS = ['team_member', 'total_hours', 'worklog_count'] as const;

export type WorklogRow = Readonly<{
  date: string | null;
  team_member: string;
  account_id: string | null;
  issue_key: string;
  issue_id: string | null;
  account_code: string | null;
  account_name: string | null;
  hours: number;
  description: string;
  worklog_id: string | null;
}>;

export type WorklogSummaryRow = Readonly<{
  team_member: string;
  account_code: string | null;
  account_name: string | null;
  issue_key: string;
  hours: number;
  description: string;
}>;

export type TeamSummaryRow = Readonly<{
  team_member: string;
  total_hours: number;
  worklog_count: number;
}>;
