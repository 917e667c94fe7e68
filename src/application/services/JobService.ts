import { JobQueue, JobStatistics } from '../../infrastructure/queue/JobQueue.js';
import { GitHubApiClient } from '../../infrastructure/http/GitHubApiClient.js';
import { JobSnapshot, JobStatus } from '../../core/entities/Job.js';
import { GitHubClientFactory } from '../../core/interfaces/IGitHubClient.js';
import { JobNotFoundError } from '../../core/errors.js';
import { maskCredential } from '../../utils/credentials.js';
import { createExtractionTask } from '../tasks/TaskFactory.js';
import { buildCommandPreview, parseCredential, parseExtractionRequest } from './ExtractionRequest.js';

/**
 * Builds the GitHub client a job talks through, given the job's credential
 * and verbosity
 */
export type ClientProvider = (credential: string, verbose: boolean) => GitHubClientFactory;

export interface GitHubSettings {
  apiUrl: string;
  rateLimitBufferSeconds: number;
  requestTimeoutMs: number;
}

export function gitHubClientProvider(settings: GitHubSettings): ClientProvider {
  return (credential, verbose) => (log) =>
    new GitHubApiClient(credential, {
      apiUrl: settings.apiUrl,
      timeoutMs: settings.requestTimeoutMs,
      verbose,
      log,
      backoff: { bufferSeconds: settings.rateLimitBufferSeconds },
    });
}

/**
 * Service for managing extraction jobs
 */
export class JobService {
  constructor(
    private jobQueue: JobQueue,
    private clientProvider: ClientProvider
  ) {}

  /**
   * Validate a request and start it as a new job. Nothing is registered when
   * validation fails.
   */
  submit(tool: unknown, args: unknown, credential: unknown): string {
    const request = parseExtractionRequest(tool, args);
    const token = parseCredential(credential);
    const connect = this.clientProvider(token, request.args.verbose);

    return this.jobQueue.submitJob({
      tool: request.tool,
      args: request.args,
      credentialMasked: maskCredential(token),
      commandPreview: buildCommandPreview(request),
      createTask: (job) => createExtractionTask(request, connect, job.outDir),
    });
  }

  /**
   * Get job status
   */
  status(jobId: string): JobSnapshot {
    const snapshot = this.jobQueue.getJobStatus(jobId);
    if (!snapshot) {
      throw new JobNotFoundError(jobId);
    }
    return snapshot;
  }

  outputs(jobId: string): string[] {
    const outputs = this.jobQueue.getOutputs(jobId);
    if (!outputs) {
      throw new JobNotFoundError(jobId);
    }
    return outputs;
  }

  /**
   * Absolute path of one of the job's listed outputs, null when the job does
   * not list that file
   */
  resolveOutput(jobId: string, filename: string): string | null {
    this.status(jobId);
    return this.jobQueue.resolveOutput(jobId, filename);
  }

  /**
   * Get jobs, optionally by status
   */
  list(status?: JobStatus): JobSnapshot[] {
    return this.jobQueue.getJobsByStatus(status);
  }

  /**
   * Get queue statistics
   */
  statistics(): JobStatistics {
    return this.jobQueue.getStatistics();
  }

  async waitFor(jobId: string): Promise<JobSnapshot> {
    const snapshot = await this.jobQueue.waitForJob(jobId);
    if (!snapshot) {
      throw new JobNotFoundError(jobId);
    }
    return snapshot;
  }
}
