import { ScopeArgs, ToolName } from '../../core/entities/ExtractionRequest.js';
import { ExtractionTask, TaskEmitter } from '../../core/interfaces/IExtractionTask.js';
import { GitHubClientFactory, IGitHubClient } from '../../core/interfaces/IGitHubClient.js';
import { AuthError, WorkerFault, describeError } from '../../core/errors.js';

/**
 * Share of the progress bar a task spends on its repositories
 */
export interface ProgressSpan {
  start: number;
  width: number;
}

/**
 * Repository loop shared by the extraction tasks.
 *
 * Repositories are processed one after another. A failing repository is
 * logged and skipped, except on an AuthError, which ends the task at once.
 * If any repository failed the task ends with a WorkerFault after the last
 * one, so files already written stay announced.
 */
export abstract class RepositoryExtractionTask<Args extends ScopeArgs> implements ExtractionTask {
  abstract readonly tool: ToolName;
  protected abstract readonly span: ProgressSpan;

  constructor(
    protected readonly args: Args,
    private readonly connect: GitHubClientFactory,
    protected readonly outDir: string
  ) {}

  async run(emitter: TaskEmitter): Promise<void> {
    const client = this.connect((line) => emitter.log(line));
    const { org, repos } = this.args;

    emitter.log(this.describeFilters());

    const failed: string[] = [];
    let rowsWritten = 0;
    for (const [index, repo] of repos.entries()) {
      try {
        rowsWritten += await this.extractRepository(client, org, repo, index, emitter);
      } catch (error) {
        if (error instanceof AuthError) {
          throw error;
        }
        failed.push(repo);
        emitter.log(`[${repo}] failed: ${describeError(error)}`);
      }
    }

    if (failed.length > 0) {
      throw new WorkerFault(`${failed.length} of ${repos.length} repositories failed: ${failed.join(', ')}`);
    }

    emitter.progress(100, 'Completed');
    emitter.log(`Done. Rows written: ${rowsWritten}`);
  }

  /**
   * Overall progress after `done` of `total` items of the repository at
   * `repoIndex`
   */
  protected progressAt(repoIndex: number, done: number, total: number): number {
    const fraction = total > 0 ? done / total : 1;
    return this.span.start + Math.floor((this.span.width * (repoIndex + fraction)) / this.args.repos.length);
  }

  protected abstract describeFilters(): string;

  /**
   * Write the repository's CSV, announce it and return the number of rows
   */
  protected abstract extractRepository(
    client: IGitHubClient,
    org: string,
    repo: string,
    repoIndex: number,
    emitter: TaskEmitter
  ): Promise<number>;
}
