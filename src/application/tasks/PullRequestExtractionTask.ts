import path from 'path';
import { PullRequestArgs, toWindow } from '../../core/entities/ExtractionRequest.js';
import { TaskEmitter } from '../../core/interfaces/IExtractionTask.js';
import { GitHubClientFactory, IGitHubClient } from '../../core/interfaces/IGitHubClient.js';
import { PULL_REQUEST_COLUMNS, PullRequestRow, writeCsvFile } from '../../infrastructure/csv/CsvWriter.js';
import { collect } from '../../infrastructure/http/Paginator.js';
import { RetrievalPlan, planPullRequestScope, retrievePullRequests } from '../services/ScopePlanner.js';
import { ProgressSpan, RepositoryExtractionTask } from './RepositoryExtractionTask.js';

/**
 * One CSV of pull requests per repository, each row enriched with the
 * number of commits and reviews
 */
export class PullRequestExtractionTask extends RepositoryExtractionTask<PullRequestArgs> {
  readonly tool = 'pr-extractor';
  protected readonly span: ProgressSpan = { start: 5, width: 90 };
  private readonly plan: RetrievalPlan;

  constructor(args: PullRequestArgs, connect: GitHubClientFactory, outDir: string) {
    super(args, connect, outDir);
    this.plan = planPullRequestScope({
      state: args.state,
      mergedOnly: args.mergedOnly,
      window: toWindow(args),
    });
  }

  protected describeFilters(): string {
    const { state, mergedOnly, since, until } = this.args;
    return (
      `Filters: state=${state} mergedOnly=${mergedOnly} ` +
      `window=${since ?? 'beginning'}..${until ?? 'now'} via ${this.plan.path}`
    );
  }

  protected async extractRepository(
    client: IGitHubClient,
    org: string,
    repo: string,
    repoIndex: number,
    emitter: TaskEmitter
  ): Promise<number> {
    const pulls = await collect(retrievePullRequests(client, org, repo, this.plan));
    emitter.progress(this.progressAt(repoIndex, 0, pulls.length), `${repo}: ${pulls.length} PRs to process`);

    const rows: PullRequestRow[] = [];
    for (const [i, pr] of pulls.entries()) {
      const commitsCount = await client.countPullRequestCommits(org, repo, pr.number);
      const reviewsCount = await client.countPullRequestReviews(org, repo, pr.number);

      rows.push({
        number: pr.number,
        title: pr.title,
        state: pr.state,
        created_at: pr.createdAt,
        merged_at: pr.mergedAt ?? '',
        author: pr.author,
        merge_commit_sha: pr.mergeCommitSha,
        commits_count: commitsCount,
        reviews_count: reviewsCount,
        description: pr.body.replace(/\r\n/g, '\n'),
        url: pr.url,
      });

      if (this.args.verbose) {
        emitter.log(`[${repo}] #${pr.number}: ${commitsCount} commits, ${reviewsCount} reviews`);
      }
      emitter.progress(this.progressAt(repoIndex, i + 1, pulls.length), `${repo}: PR ${i + 1}/${pulls.length}`);
    }

    const file = await writeCsvFile(path.join(this.outDir, `${repo}-pull-requests.csv`), PULL_REQUEST_COLUMNS, rows);
    emitter.output(file, rows.length);
    return rows.length;
  }
}
