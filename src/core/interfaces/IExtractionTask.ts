import { ToolName } from '../entities/ExtractionRequest.js';

/**
 * Sink a running task reports through. The worker turns each call into a
 * WorkerEvent.
 */
export interface TaskEmitter {
  progress(pct: number, message: string): void;
  /** Only after the file is completely written. */
  output(path: string, rows: number): void;
  log(line: string): void;
}

export interface ExtractionTask {
  readonly tool: ToolName;
  run(emitter: TaskEmitter): Promise<void>;
}
