/**
 * Events a worker produces while its extraction task runs.
 */
export type WorkerEvent =
  | { kind: 'progress'; pct: number; message: string }
  | { kind: 'output'; path: string; rows: number }
  | { kind: 'log'; line: string };

export interface WorkerExit {
  code: number;
  error?: Error;
}
