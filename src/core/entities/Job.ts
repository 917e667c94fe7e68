import { ExtractionArgs, ToolName } from './ExtractionRequest.js';

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

/**
 * Job domain entity
 */
export interface Job {
  id: string;
  tool: ToolName;
  args: ExtractionArgs;
  credentialMasked: string;
  status: JobStatus;
  progress: number; // 0-100
  message: string;
  log: string[];
  outputFiles: string[];
  rowsWritten: number; // across outputFiles
  outDir: string;
  createdAt: Date;
  startedAt?: Date;
  endedAt?: Date;
}

/**
 * Point-in-time copy of a job, detached from the live entity
 */
export interface JobSnapshot {
  jobId: string;
  tool: ToolName;
  status: JobStatus;
  progress: number;
  message: string;
  log: string[];
  outputs: string[];
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}
