import { IGitHubClient } from '../../core/interfaces/IGitHubClient.js';
import { PullRequestSummary } from '../../core/entities/GitHub.js';
import { ExtractionWindow, PullRequestState, isUnbounded, isWithinWindow } from '../../core/entities/ExtractionRequest.js';
import { toDateOnly } from '../../utils/dates.js';

/**
 * Maximum number of results the search API returns for one query
 */
export const SEARCH_RESULT_CEILING = 1000;

export interface PullRequestFilters {
  state: PullRequestState;
  mergedOnly: boolean;
  window: ExtractionWindow;
}

/**
 * List path: the whole collection, filtered here. Complete at any volume.
 * Search path: pre-filtered by the API, capped at the result ceiling.
 */
export type RetrievalPlan =
  | {
      path: 'list';
      state: PullRequestState;
      mergedOnly: boolean;
      window: ExtractionWindow;
      windowField: 'mergedAt' | 'createdAt';
    }
  | {
      path: 'search';
      since: Date;
      until: Date;
      ceiling: number;
    };

/**
 * Pick the retrieval path for a set of pull request filters.
 *
 * The search path is taken only for merged-only requests bounded on both
 * sides. Windows wider than the ceiling are silently truncated there; callers
 * are expected to split large windows.
 */
export function planPullRequestScope(filters: PullRequestFilters): RetrievalPlan {
  const { since, until } = filters.window;
  if (filters.mergedOnly && since && until) {
    return { path: 'search', since, until, ceiling: SEARCH_RESULT_CEILING };
  }

  return {
    path: 'list',
    state: filters.state,
    mergedOnly: filters.mergedOnly,
    window: filters.window,
    windowField: filters.mergedOnly ? 'mergedAt' : 'createdAt',
  };
}

/**
 * Client-side filter of the list path
 */
export function matchesListFilters(
  pr: PullRequestSummary,
  plan: Extract<RetrievalPlan, { path: 'list' }>
): boolean {
  if (plan.mergedOnly && !pr.mergedAt) {
    return false;
  }
  if (isUnbounded(plan.window)) {
    return true;
  }
  const timestamp = plan.windowField === 'mergedAt' ? pr.mergedAt : pr.createdAt;
  return timestamp !== null && isWithinWindow(timestamp, plan.window);
}

/**
 * Enumerate the pull requests of one repository under a plan
 */
export async function* retrievePullRequests(
  client: IGitHubClient,
  org: string,
  repo: string,
  plan: RetrievalPlan
): AsyncGenerator<PullRequestSummary> {
  if (plan.path === 'search') {
    const hits = client.searchMergedPullRequests(
      org,
      repo,
      toDateOnly(plan.since),
      toDateOnly(plan.until),
      plan.ceiling
    );
    // The qualifier takes UTC days; trim hits back to the exact bounds
    const window = { since: plan.since, until: plan.until };
    for await (const pr of hits) {
      if (pr.mergedAt && isWithinWindow(pr.mergedAt, window)) yield pr;
    }
    return;
  }

  for await (const pr of client.listPullRequests(org, repo, plan.state)) {
    if (matchesListFilters(pr, plan)) yield pr;
  }
}
