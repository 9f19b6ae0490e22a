import { z } from 'zod';

export const issueRecordSchema = z
  .object({
    id: z.string().optional(),
    key: z.string().optional(),
    self: z.string().optional(),
    fields: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

export const searchResponseSchema = z
  .object({
    issues: z.array(issueRecordSchema).optional(),
    isLast: z.boolean().optional(),
    nextPageToken: z.string().optional(),
    total: z.number().optional()
  })
  .passthrough();

export type IssueRecord = z.infer<typeof issueRecordSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;

export const MISSING = 'N/A';
