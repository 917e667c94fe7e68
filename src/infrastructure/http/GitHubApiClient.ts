import fetch from 'node-fetch';
import { z } from 'zod';
import { CommitFilters, IGitHubClient } from '../../core/interfaces/IGitHubClient.js';
import {
  CommitDetail,
  CommitDetailSchema,
  CommitSummary,
  CommitSummarySchema,
  PullRequestSchema,
  PullRequestSummary,
  SearchResultSchema,
  fromPullRequest,
  fromSearchIssue,
} from '../../core/entities/GitHub.js';
import { PullRequestState } from '../../core/entities/ExtractionRequest.js';
import { ApiResponseError, AuthError, RateLimitError, TransportError, describeError } from '../../core/errors.js';
import { BackoffConfig, readRateLimitState, withRateLimitBackoff } from '../../utils/retry.js';
import { Paginator, PaginatorOptions, countItems } from './Paginator.js';

export interface FetchResponseLike {
  status: number;
  ok: boolean;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; timeout?: number }
) => Promise<FetchResponseLike>;

export interface GitHubApiClientOptions {
  apiUrl?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  verbose?: boolean;
  log?: (line: string) => void;
  backoff?: Partial<BackoffConfig>;
}

type QueryParams = Record<string, string | number | undefined>;

const RATE_LIMITED_STATUSES = new Set([403, 429]);

/**
 * GitHub REST client
 *
 * - every GET goes through the rate-limit backoff
 * - list endpoints are walked with the Paginator (100 per page)
 * - response bodies are validated with zod before they reach a task
 */
export class GitHubApiClient implements IGitHubClient {
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;
  private readonly log: (line: string) => void;
  private readonly backoff: Partial<BackoffConfig>;

  constructor(token: string, options: GitHubApiClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.verbose = options.verbose ?? false;
    this.log = options.log ?? ((line) => console.error(`[GitHubApiClient] ${line}`));
    this.backoff = options.backoff ?? {};
    this.headers = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/vnd.github.v3+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'repo-extract',
    };
  }

  async *listPullRequests(org: string, repo: string, state: PullRequestState): AsyncGenerator<PullRequestSummary> {
    const pulls = this.paginate(
      `${this.repoPath(org, repo)}/pulls`,
      { state, sort: 'updated', direction: 'desc' },
      (body) => z.array(PullRequestSchema).parse(body)
    );
    for await (const pr of pulls) {
      yield fromPullRequest(pr);
    }
  }

  async *searchMergedPullRequests(
    org: string,
    repo: string,
    sinceDate: string,
    untilDate: string,
    ceiling: number
  ): AsyncGenerator<PullRequestSummary> {
    const q = `repo:${org}/${repo} is:pr is:merged merged:${sinceDate}..${untilDate}`;
    const hits = this.paginate('/search/issues', { q }, (body) => SearchResultSchema.parse(body).items, {
      maxItems: ceiling,
    });
    for await (const item of hits) {
      yield fromSearchIssue(item);
    }
  }

  countPullRequestCommits(org: string, repo: string, number: number): Promise<number> {
    return countItems(
      this.paginate(`${this.repoPath(org, repo)}/pulls/${number}/commits`, {}, (body) => z.array(z.unknown()).parse(body))
    );
  }

  countPullRequestReviews(org: string, repo: string, number: number): Promise<number> {
    return countItems(
      this.paginate(`${this.repoPath(org, repo)}/pulls/${number}/reviews`, {}, (body) => z.array(z.unknown()).parse(body))
    );
  }

  listCommitsForPath(
    org: string,
    repo: string,
    path: string,
    filters: CommitFilters = {}
  ): AsyncGenerator<CommitSummary> {
    return this.paginate(
      `${this.repoPath(org, repo)}/commits`,
      { path, since: filters.since, until: filters.until, sha: filters.sha },
      (body) => z.array(CommitSummarySchema).parse(body)
    );
  }

  async getCommit(org: string, repo: string, sha: string): Promise<CommitDetail> {
    const body = await this.get(`${this.repoPath(org, repo)}/commits/${encodeURIComponent(sha)}`);
    return CommitDetailSchema.parse(body);
  }

  private repoPath(org: string, repo: string): string {
    return `/repos/${encodeURIComponent(org)}/${encodeURIComponent(repo)}`;
  }

  private paginate<T>(
    endpoint: string,
    params: QueryParams,
    parsePage: (body: unknown) => T[],
    options: PaginatorOptions = {}
  ): AsyncGenerator<T, void, undefined> {
    const paginator = new Paginator<T>(async (page, perPage) => {
      const body = await this.get(endpoint, { ...params, per_page: perPage, page });
      return parsePage(body);
    }, options);
    return paginator.fetchAll();
  }

  private get(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    return withRateLimitBackoff(() => this.request(url), {
      ...this.backoff,
      onRetry: (entry) => {
        this.log(`[rate limit] sleeping ${entry.sleepSeconds}s until reset...`);
        this.backoff.onRetry?.(entry);
      },
    });
  }

  private buildUrl(endpoint: string, params: QueryParams): string {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') {
        query.set(key, String(value));
      }
    }
    const search = query.toString();
    return `${this.apiUrl}${endpoint}${search ? `?${search}` : ''}`;
  }

  private async request(url: string): Promise<unknown> {
    if (this.verbose) {
      this.log(`GET ${url}`);
    }

    let response: FetchResponseLike;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.headers, timeout: this.timeoutMs });
    } catch (error) {
      throw new TransportError(`GET ${url} failed: ${describeError(error)}`, { cause: error });
    }

    if (RATE_LIMITED_STATUSES.has(response.status)) {
      const rateLimit = readRateLimitState(response.headers);
      if (rateLimit.remaining === 0 && rateLimit.resetEpoch !== null) {
        throw new RateLimitError(rateLimit.resetEpoch);
      }
      const retryAfter = parseInt(response.headers.get('retry-after') ?? '', 10);
      if (Number.isFinite(retryAfter)) {
        const now = this.backoff.now ? this.backoff.now() : Date.now();
        throw new RateLimitError(Math.floor(now / 1000) + retryAfter);
      }
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`GitHub rejected the credential (HTTP ${response.status})`, response.status);
    }

    if (!response.ok) {
      throw new ApiResponseError(response.status, url, await this.readErrorDetail(response));
    }

    return response.json();
  }

  private async readErrorDetail(response: FetchResponseLike): Promise<string | undefined> {
    const text = await response.text().catch(() => '');
    if (!text) return undefined;

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return text.slice(0, 200);
    }
    const parsed = z.object({ message: z.string() }).safeParse(body);
    return parsed.success ? parsed.data.message : text.slice(0, 200);
  }
}
