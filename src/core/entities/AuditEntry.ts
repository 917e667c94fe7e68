import { ExtractionArgs, ToolName } from './ExtractionRequest.js';
import { JobStatus } from './Job.js';

interface AuditEntryBase {
  ts: number; // epoch seconds
  jobId: string;
  tool: ToolName;
  args: ExtractionArgs;
  credentialMasked: string;
}

export interface AuditStartEntry extends AuditEntryBase {
  status: 'started';
  commandPreview: string[];
}

export interface AuditEndEntry extends AuditEntryBase {
  status: JobStatus;
  durationSeconds: number;
  progress: number;
  outputs: string[];
  rowsWritten: number;
  lastMessage: string;
}

export type AuditEntry = AuditStartEntry | AuditEndEntry;
