import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { Job, JobSnapshot, JobStatus, isTerminal } from '../../core/entities/Job.js';
import { ExtractionArgs, ToolName } from '../../core/entities/ExtractionRequest.js';
import { WorkerEvent } from '../../core/entities/WorkerEvent.js';
import { AuditEntry } from '../../core/entities/AuditEntry.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { ExtractionTask } from '../../core/interfaces/IExtractionTask.js';
import { describeError } from '../../core/errors.js';
import { Worker, WorkerFactory, createInProcessWorker } from './Worker.js';

export const DEFAULT_LOG_TAIL_LIMIT = 400;

/**
 * Generate a 12 hex character job id
 */
function generateId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  queued: ['running', 'failed'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

/**
 * Everything the queue needs to register and start one job. `args` are
 * already validated and the credential is already masked.
 */
export interface JobSubmission {
  tool: ToolName;
  args: ExtractionArgs;
  credentialMasked: string;
  commandPreview: string[];
  createTask: (job: Readonly<Job>) => ExtractionTask;
}

export interface JobQueueOptions {
  outputRoot: string;
  auditLog?: IAuditLog;
  logTailLimit?: number;
  createWorker?: WorkerFactory;
  debug?: boolean;
}

export interface JobStatistics {
  total: number;
  queued: number;
  running: number;
  succeeded: number;
  failed: number;
}

/**
 * Job registry and supervisor
 *
 * Every job gets its own worker. The supervisor drains the worker's events
 * into the job as they arrive; status reads only ever copy the job.
 */
export class JobQueue {
  private jobs: Map<string, Job> = new Map();
  private completions: Map<string, Promise<void>> = new Map();
  private readonly outputRoot: string;
  private readonly auditLog?: IAuditLog;
  private readonly logTailLimit: number;
  private readonly createWorker: WorkerFactory;
  private readonly debug: boolean;

  constructor(options: JobQueueOptions) {
    this.outputRoot = path.resolve(options.outputRoot);
    this.auditLog = options.auditLog;
    this.logTailLimit = options.logTailLimit ?? DEFAULT_LOG_TAIL_LIMIT;
    this.createWorker = options.createWorker ?? createInProcessWorker;
    this.debug = options.debug ?? false;
  }

  /**
   * Register a job, record its start in the audit log and start its worker
   */
  submitJob(submission: JobSubmission): string {
    const id = generateId();
    const outDir = path.join(this.outputRoot, id);
    fs.mkdirSync(outDir, { recursive: true });

    const job: Job = {
      id,
      tool: submission.tool,
      args: submission.args,
      credentialMasked: submission.credentialMasked,
      status: 'queued',
      progress: 0,
      message: 'Queued',
      log: [],
      outputFiles: [],
      rowsWritten: 0,
      outDir,
      createdAt: new Date(),
    };
    this.jobs.set(id, job);

    this.appendAudit({
      ts: epochSeconds(job.createdAt),
      jobId: id,
      tool: job.tool,
      args: job.args,
      credentialMasked: job.credentialMasked,
      status: 'started',
      commandPreview: submission.commandPreview,
    });

    const completion = this.start(job, submission.createTask).catch((error: unknown) => {
      console.error(`[JobQueue] ✗ Supervisor for job ${id} stopped:`, describeError(error));
    });
    this.completions.set(id, completion);
    console.error(`[JobQueue] ✓ Job ${id} submitted (${job.tool})`);
    return id;
  }

  private async start(job: Job, createTask: JobSubmission['createTask']): Promise<void> {
    let worker: Worker;
    try {
      worker = this.createWorker(createTask(job));
    } catch (error) {
      this.appendLog(job, `WorkerFault: ${describeError(error)}`);
      this.finish(job, 1);
      return;
    }

    this.transition(job, 'running');
    job.startedAt = new Date();
    job.progress = 1;
    job.message = 'Starting...';

    await this.supervise(job, worker);
  }

  private async supervise(job: Job, worker: Worker): Promise<void> {
    let code: number;
    try {
      for await (const event of worker.events()) {
        this.applyEvent(job, event);
      }
      ({ code } = await worker.exited);
    } catch (error) {
      this.appendLog(job, `WorkerFault: ${describeError(error)}`);
      code = 1;
    }
    this.finish(job, code);
  }

  private applyEvent(job: Job, event: WorkerEvent): void {
    switch (event.kind) {
      case 'progress': {
        const pct = Math.min(100, Math.max(0, Math.floor(event.pct)));
        job.progress = Math.max(job.progress, pct);
        if (event.message) {
          job.message = event.message;
        }
        this.appendLog(job, `PROGRESS ${JSON.stringify({ pct, msg: event.message })}`);
        break;
      }
      case 'output': {
        const name = this.toOutputName(job, event.path);
        if (!job.outputFiles.includes(name)) {
          job.outputFiles.push(name);
          job.rowsWritten += event.rows;
        }
        this.appendLog(job, `OUTPUT_CSV ${event.path}`);
        break;
      }
      case 'log':
        this.appendLog(job, event.line);
        break;
    }

    if (this.debug) {
      console.error(`[JobQueue] ${job.id} ${event.kind}`);
    }
  }

  /**
   * Relative to the job directory, or the absolute path when the file lies
   * outside it
   */
  private toOutputName(job: Job, filePath: string): string {
    const absolute = path.resolve(job.outDir, filePath);
    const relative = path.relative(job.outDir, absolute);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return absolute;
    }
    return relative;
  }

  private appendLog(job: Job, line: string): void {
    job.log.push(line);
    if (job.log.length > this.logTailLimit) {
      job.log.splice(0, job.log.length - this.logTailLimit);
    }
  }

  private finish(job: Job, code: number): void {
    if (code === 0) {
      this.transition(job, 'succeeded');
      job.progress = 100;
      job.message = 'Done.';
    } else {
      this.transition(job, 'failed');
      job.message = job.log[job.log.length - 1] ?? `Exited with code ${code}`;
    }
    job.endedAt = new Date();

    const started = job.startedAt ?? job.createdAt;
    this.appendAudit({
      ts: epochSeconds(job.endedAt),
      jobId: job.id,
      tool: job.tool,
      args: job.args,
      credentialMasked: job.credentialMasked,
      status: job.status,
      durationSeconds: (job.endedAt.getTime() - started.getTime()) / 1000,
      progress: job.progress,
      outputs: [...job.outputFiles],
      rowsWritten: job.rowsWritten,
      lastMessage: job.message,
    });

    const mark = job.status === 'succeeded' ? '✓' : '✗';
    console.error(`[JobQueue] ${mark} Job ${job.id} ${job.status}: ${job.message}`);
  }

  private transition(job: Job, to: JobStatus): void {
    if (!TRANSITIONS[job.status].includes(to)) {
      throw new Error(`Job ${job.id} cannot move from ${job.status} to ${to}`);
    }
    job.status = to;
  }

  private appendAudit(entry: AuditEntry): void {
    if (!this.auditLog) return;
    this.auditLog.append(entry).catch((error: unknown) => {
      console.error(`[JobQueue] ✗ Failed to write audit record for job ${entry.jobId}:`, describeError(error));
    });
  }

  private snapshot(job: Job): JobSnapshot {
    return {
      jobId: job.id,
      tool: job.tool,
      status: job.status,
      progress: job.progress,
      message: job.message,
      log: [...job.log],
      outputs: [...job.outputFiles],
    };
  }

  /**
   * Get job status
   */
  getJobStatus(jobId: string): JobSnapshot | null {
    const job = this.jobs.get(jobId);
    return job ? this.snapshot(job) : null;
  }

  getOutputs(jobId: string): string[] | null {
    const job = this.jobs.get(jobId);
    return job ? [...job.outputFiles] : null;
  }

  /**
   * Absolute path of a listed output file, or null when the job does not
   * list it
   */
  resolveOutput(jobId: string, filename: string): string | null {
    const job = this.jobs.get(jobId);
    if (!job || !job.outputFiles.includes(filename)) {
      return null;
    }
    return path.isAbsolute(filename) ? filename : path.join(job.outDir, filename);
  }

  /**
   * Get all jobs, optionally matching a status, oldest first
   */
  getJobsByStatus(status?: JobStatus): JobSnapshot[] {
    return Array.from(this.jobs.values())
      .filter((job) => !status || job.status === status)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((job) => this.snapshot(job));
  }

  /**
   * Get queue statistics
   */
  getStatistics(): JobStatistics {
    const stats: JobStatistics = { total: 0, queued: 0, running: 0, succeeded: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      stats.total++;
      stats[job.status]++;
    }
    return stats;
  }

  /**
   * Resolve once the job is terminal
   */
  async waitForJob(jobId: string): Promise<JobSnapshot | null> {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    if (!isTerminal(job.status)) {
      await this.completions.get(jobId);
    }
    return this.snapshot(job);
  }
}
