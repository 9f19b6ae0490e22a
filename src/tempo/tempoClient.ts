import { getErrorMessage } from '../lib/errors.js';
import { log } from '../lib/log.js';
import type { FetchLike } from '../jira/searchClient.js';
import {
  accountPageSchema,
  worklogPageSchema,
  type AccountRecord,
  type WorklogRecord
} from './worklog.js';

export interface TempoClientConfig {
  apiUrl: string;
  apiToken: string;
  timeoutMs?: number;
  pageLimit?: number;
  fetchImpl?: FetchLike;
}

export interface WorklogSource {
  fetchWorklogs(dateFrom: string, dateTo: string, userIds?: readonly string[]): Promise<WorklogRecord[]>;
  fetchAccounts(): Promise<Map<string, AccountRecord>>;
}

export const TEMPO_PAGE_LIMIT = 1000;

export class TempoClient implements WorklogSource {
  private readonly apiUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly pageLimit: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: TempoClientConfig) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
    this.apiToken = config.apiToken;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.pageLimit = config.pageLimit ?? TEMPO_PAGE_LIMIT;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  /** One bounded page of worklogs; failures are logged and yield `[]`. */
  async fetchWorklogs(dateFrom: string, dateTo: string, userIds: readonly string[] = []): Promise<WorklogRecord[]> {
    log.info(`fetching worklogs from ${dateFrom} to ${dateTo}`);
    const params = new URLSearchParams({
      from: dateFrom,
      to: dateTo,
      offset: '0',
      limit: String(this.pageLimit)
    });

    const body = await this.getJson(`/worklogs?${params.toString()}`, 'worklogs');
    if (body === null) {
      return [];
    }
    const parsed = worklogPageSchema.safeParse(body);
    if (!parsed.success) {
      log.error('Tempo worklog response did not match the expected shape', parsed.error.issues);
      return [];
    }

    const fetched = parsed.data.results ?? [];
    if (fetched.length >= this.pageLimit) {
      log.warn(`worklog page is full (${this.pageLimit}); narrow the date range to see every entry`);
    }

    const worklogs =
      userIds.length > 0
        ? fetched.filter((worklog) => {
            const accountId = worklog.author?.accountId;
            return accountId !== undefined && userIds.includes(accountId);
          })
        : fetched;

    log.info(`total worklogs fetched: ${worklogs.length}`);
    return worklogs;
  }

  async fetchAccounts(): Promise<Map<string, AccountRecord>> {
    log.info('fetching account information');
    const body = await this.getJson('/accounts', 'accounts');
    if (body === null) {
      return new Map();
    }
    const parsed = accountPageSchema.safeParse(body);
    if (!parsed.success) {
      log.warn('Tempo account response did not match the expected shape', parsed.error.issues);
      return new Map();
    }

    const accounts = new Map(
      (parsed.data.results ?? []).map((account): [string, AccountRecord] => [account.id, account])
    );
    log.info(`fetched ${accounts.size} accounts`);
    return accounts;
  }

  private async getJson(route: string, label: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiUrl}${route}`, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json'
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      log.error(`error fetching ${label}: ${getErrorMessage(error)}`);
      return null;
    }

    if (!response.ok) {
      log.error(`error fetching ${label} (${response.status})`, await safeResponseText(response));
      return null;
    }

    try {
      return JSON.parse(await response.text());
    } catch (error) {
      log.error(`Tempo returned a malformed ${label} body: ${getErrorMessage(error)}`);
      return null;
    }
  }
}

async function safeResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}
