import { CommitDetail, CommitSummary, PullRequestSummary } from '../entities/GitHub.js';
import { PullRequestState } from '../entities/ExtractionRequest.js';

export interface CommitFilters {
  since?: string;
  until?: string;
  sha?: string;
}

/**
 * Interface for the GitHub REST client used by the extraction tasks
 */
export interface IGitHubClient {
  /**
   * Every pull request of a repository in the given state, newest update first
   */
  listPullRequests(org: string, repo: string, state: PullRequestState): AsyncIterable<PullRequestSummary>;

  /**
   * Pull requests merged between two dates, pre-filtered by the search API.
   * Stops after `ceiling` results.
   */
  searchMergedPullRequests(
    org: string,
    repo: string,
    sinceDate: string,
    untilDate: string,
    ceiling: number
  ): AsyncIterable<PullRequestSummary>;

  countPullRequestCommits(org: string, repo: string, number: number): Promise<number>;

  countPullRequestReviews(org: string, repo: string, number: number): Promise<number>;

  /**
   * Commits touching `path`, filtered server-side
   */
  listCommitsForPath(org: string, repo: string, path: string, filters?: CommitFilters): AsyncIterable<CommitSummary>;

  getCommit(org: string, repo: string, sha: string): Promise<CommitDetail>;
}

export type GitHubClientFactory = (log: (line: string) => void) => IGitHubClient;
