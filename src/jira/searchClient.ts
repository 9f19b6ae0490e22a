import { getErrorMessage } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { searchResponseSchema, type IssueRecord } from './issueRecord.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JiraSearchClientConfig {
  server: string;
  email: string;
  apiToken: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface IssueSearcher {
  search(jql: string, fields?: readonly string[], maxResults?: number): Promise<IssueRecord[]>;
}

export const DEFAULT_SEARCH_FIELDS: readonly string[] = ['summary', 'status'];
export const DEFAULT_MAX_RESULTS = 1000;

export class JiraSearchClient implements IssueSearcher {
  private readonly server: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: JiraSearchClientConfig) {
    this.server = config.server.replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString('base64')}`;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  get searchUrl(): string {
    return `${this.server}/rest/api/3/search/jql`;
  }

  /**
   * Runs one bounded JQL search. Transport and response failures are logged and
   * reported as an empty result; this method does not reject.
   */
  async search(
    jql: string,
    fields: readonly string[] = DEFAULT_SEARCH_FIELDS,
    maxResults: number = DEFAULT_MAX_RESULTS
  ): Promise<IssueRecord[]> {
    const params = new URLSearchParams({
      jql,
      fields: fields.join(','),
      maxResults: String(maxResults)
    });
    const url = `${this.searchUrl}?${params.toString()}`;

    log.info(`executing JQL: ${jql}`);
    log.debug('requesting fields', { fields });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: this.authorization,
          Accept: 'application/json',
          'Content-Type': 'application/json'
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      log.error(`Jira search failed: ${getErrorMessage(error)}`);
      return [];
    }

    if (response.status !== 200) {
      log.error(`Jira search error (${response.status})`, await safeResponseText(response));
      return [];
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      log.error(`Jira search returned a malformed body: ${getErrorMessage(error)}`);
      return [];
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.error('Jira search response did not match the expected shape', parsed.error.issues);
      return [];
    }

    const issues = parsed.data.issues ?? [];
    log.info(`found ${issues.length} issue(s)`);
    if (issues.length >= maxResults) {
      log.warn(`result hit the maxResults cap of ${maxResults}; later issues were not fetched`);
    }
    return issues;
  }
}

async function safeResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}
