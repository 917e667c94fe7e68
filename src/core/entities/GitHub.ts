import { z } from 'zod';

/**
 * Response shapes of the GitHub REST endpoints the extractors use. Only the
 * fields that end up in a CSV row are declared; everything else is dropped.
 */

const AccountSchema = z.object({ login: z.string() }).nullish();

export const PullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  state: z.string(),
  created_at: z.string(),
  merged_at: z.string().nullish(),
  user: AccountSchema,
  merge_commit_sha: z.string().nullish(),
  body: z.string().nullish(),
  html_url: z.string(),
});

export const SearchIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  created_at: z.string(),
  closed_at: z.string().nullish(),
  user: AccountSchema,
  body: z.string().nullish(),
  html_url: z.string(),
  pull_request: z.object({ merged_at: z.string().nullish() }).nullish(),
});

export const SearchResultSchema = z.object({
  total_count: z.number().int(),
  incomplete_results: z.boolean().optional(),
  items: z.array(SearchIssueSchema),
});

export const CommitSummarySchema = z.object({
  sha: z.string(),
  html_url: z.string().nullish(),
  commit: z.object({
    message: z.string().nullish(),
    author: z
      .object({
        name: z.string().nullish(),
        email: z.string().nullish(),
        date: z.string().nullish(),
      })
      .nullish(),
  }),
  author: AccountSchema,
  committer: AccountSchema,
});

export const CommitFileSchema = z.object({
  filename: z.string(),
  status: z.string(),
  previous_filename: z.string().nullish(),
  additions: z.number().int(),
  deletions: z.number().int(),
  changes: z.number().int(),
});

export const CommitDetailSchema = z.object({
  sha: z.string(),
  files: z.array(CommitFileSchema).nullish(),
});

export type CommitSummary = z.infer<typeof CommitSummarySchema>;
export type CommitFile = z.infer<typeof CommitFileSchema>;
export type CommitDetail = z.infer<typeof CommitDetailSchema>;

/**
 * Pull request as both retrieval paths hand it to the extractor
 */
export interface PullRequestSummary {
  number: number;
  title: string;
  state: string;
  createdAt: string;
  mergedAt: string | null;
  author: string;
  mergeCommitSha: string;
  body: string;
  url: string;
}

export function fromPullRequest(pr: z.infer<typeof PullRequestSchema>): PullRequestSummary {
  return {
    number: pr.number,
    title: pr.title,
    state: pr.state,
    createdAt: pr.created_at,
    mergedAt: pr.merged_at ?? null,
    author: pr.user?.login ?? '',
    mergeCommitSha: pr.merge_commit_sha ?? '',
    body: pr.body ?? '',
    url: pr.html_url,
  };
}

/**
 * Search hits carry no merge commit; merged implies closed.
 */
export function fromSearchIssue(item: z.infer<typeof SearchIssueSchema>): PullRequestSummary {
  return {
    number: item.number,
    title: item.title,
    state: 'closed',
    createdAt: item.created_at,
    mergedAt: item.pull_request?.merged_at ?? item.closed_at ?? null,
    author: item.user?.login ?? '',
    mergeCommitSha: '',
    body: item.body ?? '',
    url: item.html_url,
  };
}
