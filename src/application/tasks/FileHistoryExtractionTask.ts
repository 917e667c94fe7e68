import path from 'path';
import { FileHistoryArgs } from '../../core/entities/ExtractionRequest.js';
import { CommitFile, CommitSummary } from '../../core/entities/GitHub.js';
import { TaskEmitter } from '../../core/interfaces/IExtractionTask.js';
import { IGitHubClient } from '../../core/interfaces/IGitHubClient.js';
import { FILE_HISTORY_COLUMNS, FileHistoryRow, writeCsvFile } from '../../infrastructure/csv/CsvWriter.js';
import { collect } from '../../infrastructure/http/Paginator.js';
import { ProgressSpan, RepositoryExtractionTask } from './RepositoryExtractionTask.js';

export function fileHistoryFileName(repo: string, filePath: string): string {
  return `${repo}-${filePath.replace(/\//g, '-')}-file-history.csv`;
}

/**
 * The change entry of a commit that concerns `target`, under its current or
 * its previous name
 */
export function findFileChange(files: readonly CommitFile[], target: string): CommitFile | undefined {
  return files.find((file) => file.filename === target || file.previous_filename === target);
}

/**
 * Commit history of one file in each repository, newest commit first
 */
export class FileHistoryExtractionTask extends RepositoryExtractionTask<FileHistoryArgs> {
  readonly tool = 'file-history-extractor';
  protected readonly span: ProgressSpan = { start: 10, width: 80 };

  protected describeFilters(): string {
    const { filePath, sha, since, until } = this.args;
    return `Filters: path=${filePath} ref=${sha ?? 'default branch'} window=${since ?? 'beginning'}..${until ?? 'now'}`;
  }

  protected async extractRepository(
    client: IGitHubClient,
    org: string,
    repo: string,
    repoIndex: number,
    emitter: TaskEmitter
  ): Promise<number> {
    const { filePath, since, until, sha } = this.args;
    const commits = await collect(client.listCommitsForPath(org, repo, filePath, { since, until, sha }));
    emitter.progress(this.progressAt(repoIndex, 0, commits.length), `${repo}: ${commits.length} commits to inspect`);

    const entries: Array<{ date: string; row: FileHistoryRow }> = [];
    for (const [i, commit] of commits.entries()) {
      const detail = await client.getCommit(org, repo, commit.sha);
      const change = findFileChange(detail.files ?? [], filePath);
      if (change) {
        entries.push(this.toRow(org, repo, commit, change));
      } else if (this.args.verbose) {
        emitter.log(`[${repo}] ${commit.sha.slice(0, 7)} does not touch ${filePath}, skipped`);
      }
      emitter.progress(this.progressAt(repoIndex, i + 1, commits.length), `${repo}: commit ${i + 1}/${commits.length}`);
    }

    // Array.prototype.sort is stable: equal dates keep listing order
    entries.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
    const rows = entries.map((entry) => entry.row);

    const file = await writeCsvFile(
      path.join(this.outDir, fileHistoryFileName(repo, filePath)),
      FILE_HISTORY_COLUMNS,
      rows
    );
    emitter.output(file, rows.length);
    return rows.length;
  }

  private toRow(
    org: string,
    repo: string,
    commit: CommitSummary,
    change: CommitFile
  ): { date: string; row: FileHistoryRow } {
    const author = commit.commit.author;
    const date = author?.date ?? '';
    return {
      date,
      row: {
        repo,
        file_path: this.args.filePath,
        commit_sha: commit.sha,
        html_url: commit.html_url ?? '',
        commit_url: `https://github.com/${org}/${repo}/commit/${commit.sha}`,
        commit_date: date,
        author_login: commit.author?.login ?? '',
        author_name: author?.name ?? '',
        author_email: author?.email ?? '',
        committer_login: commit.committer?.login ?? '',
        message: (commit.commit.message ?? '').replace(/\r?\n/g, ' '),
        status: change.status,
        previous_filename: change.previous_filename ?? '',
        additions: change.additions,
        deletions: change.deletions,
        changes: change.changes,
      },
    };
  }
}
