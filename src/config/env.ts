import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import type { LogLevel } from '../lib/log.js';

dotenv.config();

export type ExportFormat = 'csv' | 'xlsx';

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : undefined;
  });

const isoDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

// `DA:705,CCS`: project keys with an optional board id each.
const boardIdsSchema = z.string().transform((value, ctx) => {
  const ids: Record<string, number> = {};
  for (const entry of splitList(value)) {
    const match = /^([A-Za-z][A-Za-z0-9_]*)(?::(\d+))?$/.exec(entry);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected KEY or KEY:id, got "${entry}"` });
      return z.NEVER;
    }
    const [, project, boardId] = match;
    if (project !== undefined && boardId !== undefined) {
      ids[project] = Number(boardId);
    }
  }
  return ids;
});

const exportFormatSchema = z
  .enum(['csv', 'xlsx', 'excel'])
  .transform((value): ExportFormat => (value === 'csv' ? 'csv' : 'xlsx'));

const sharedEnvSchema = z.object({
  OUTPUT_DIR: optionalText,
  HTTP_TIMEOUT_MS: optionalText.pipe(z.coerce.number().int().positive().optional()),
  LOG_LEVEL: optionalText.pipe(z.enum(['debug', 'info', 'warn', 'error']).optional())
});

const jiraEnvSchema = sharedEnvSchema.extend({
  JIRA_SERVER: optionalText.pipe(z.string().url().optional()),
  JIRA_EMAIL: optionalText,
  JIRA_API_TOKEN: optionalText,
  JIRA_BOARD_NAME: optionalText,
  JIRA_PROJECTS: optionalText,
  JIRA_BOARD_IDS: optionalText.pipe(boardIdsSchema.optional())
});

const tempoEnvSchema = sharedEnvSchema.extend({
  TEMPO_API_TOKEN: optionalText,
  TEMPO_API_URL: optionalText.pipe(z.string().url().optional()),
  TEMPO_DATE_FROM: optionalText.pipe(isoDay.optional()),
  TEMPO_DATE_TO: optionalText.pipe(isoDay.optional()),
  TEMPO_USER_IDS: optionalText,
  TEMPO_OUTPUT_FORMAT: optionalText.pipe(exportFormatSchema.optional()),
  TEMPO_OUTPUT_PREFIX: optionalText
});

export const DEFAULT_OUTPUT_DIR = './output';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_BOARD_NAME = 'DA';
export const DEFAULT_TEMPO_API_URL = 'https://api.tempo.io/core/3';

export type JiraConfig = Readonly<{
  server: string;
  email: string;
  apiToken: string;
  boardName: string;
  projects: readonly string[];
  boardIds: Readonly<Record<string, number>>;
  outputDir: string;
  timeoutMs: number;
  logLevel: LogLevel;
}>;

export type TempoConfig = Readonly<{
  apiToken: string;
  apiUrl: string;
  dateFrom: string | null;
  dateTo: string | null;
  userIds: readonly string[];
  outputFormat: ExportFormat;
  outputPrefix: string;
  outputDir: string;
  timeoutMs: number;
  logLevel: LogLevel;
}>;

type Env = Record<string, string | undefined>;

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration (${details}).`);
  }
  return parsed.data;
}

export function jiraConfigMissingMessage(missing: readonly string[]): string {
  return `Missing Jira configuration (${missing.join(
    ', '
  )}). Copy .env.example to .env and fill in the [jira] values.`;
}

export function loadJiraConfig(env: Env = process.env): JiraConfig {
  const parsed = parseEnv(jiraEnvSchema, env);
  const missing: string[] = [];

  if (!parsed.JIRA_SERVER) {
    missing.push('JIRA_SERVER');
  }
  if (!parsed.JIRA_EMAIL) {
    missing.push('JIRA_EMAIL');
  }
  if (!parsed.JIRA_API_TOKEN) {
    missing.push('JIRA_API_TOKEN');
  }
  if (!parsed.JIRA_SERVER || !parsed.JIRA_EMAIL || !parsed.JIRA_API_TOKEN) {
    throw new ConfigurationError(jiraConfigMissingMessage(missing), missing);
  }

  const boardName = parsed.JIRA_BOARD_NAME ?? DEFAULT_BOARD_NAME;
  const projects = splitList(parsed.JIRA_PROJECTS);

  return Object.freeze({
    server: parsed.JIRA_SERVER.replace(/\/+$/, ''),
    email: parsed.JIRA_EMAIL,
    apiToken: parsed.JIRA_API_TOKEN,
    boardName,
    projects: Object.freeze(projects.length > 0 ? projects : [boardName]),
    boardIds: Object.freeze(parsed.JIRA_BOARD_IDS ?? {}),
    outputDir: path.resolve(parsed.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    timeoutMs: parsed.HTTP_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL ?? 'info'
  });
}

export function loadTempoConfig(env: Env = process.env): TempoConfig {
  const parsed = parseEnv(tempoEnvSchema, env);

  if (!parsed.TEMPO_API_TOKEN) {
    throw new ConfigurationError(
      'Tempo API token is required. Set TEMPO_API_TOKEN in the environment or .env file.',
      ['TEMPO_API_TOKEN']
    );
  }

  return Object.freeze({
    apiToken: parsed.TEMPO_API_TOKEN,
    apiUrl: (parsed.TEMPO_API_URL ?? DEFAULT_TEMPO_API_URL).replace(/\/+$/, ''),
    dateFrom: parsed.TEMPO_DATE_FROM ?? null,
    dateTo: parsed.TEMPO_DATE_TO ?? null,
    userIds: Object.freeze(splitList(parsed.TEMPO_USER_IDS)),
    outputFormat: parsed.TEMPO_OUTPUT_FORMAT ?? 'xlsx',
    outputPrefix: parsed.TEMPO_OUTPUT_PREFIX ?? 'tempo_report',
    outputDir: path.resolve(parsed.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    timeoutMs: parsed.HTTP_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL ?? 'info'
  });
}
