import { ExtractionRequest } from '../../core/entities/ExtractionRequest.js';
import { ExtractionTask } from '../../core/interfaces/IExtractionTask.js';
import { GitHubClientFactory } from '../../core/interfaces/IGitHubClient.js';
import { FileHistoryExtractionTask } from './FileHistoryExtractionTask.js';
import { PullRequestExtractionTask } from './PullRequestExtractionTask.js';

export function createExtractionTask(
  request: ExtractionRequest,
  connect: GitHubClientFactory,
  outDir: string
): ExtractionTask {
  switch (request.tool) {
    case 'pr-extractor':
      return new PullRequestExtractionTask(request.args, connect, outDir);
    case 'file-history-extractor':
      return new FileHistoryExtractionTask(request.args, connect, outDir);
  }
}
