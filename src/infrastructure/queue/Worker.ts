import { WorkerEvent, WorkerExit } from '../../core/entities/WorkerEvent.js';
import { ExtractionTask, TaskEmitter } from '../../core/interfaces/IExtractionTask.js';
import { describeError } from '../../core/errors.js';
import { EventChannel } from './EventChannel.js';

/**
 * A running extraction. `events()` ends once the worker has exited.
 */
export interface Worker {
  events(): AsyncIterable<WorkerEvent>;
  readonly exited: Promise<WorkerExit>;
}

export type WorkerFactory = (task: ExtractionTask) => Worker;

/**
 * Runs a task on the event loop behind its own error boundary
 */
export class InProcessWorker implements Worker {
  readonly exited: Promise<WorkerExit>;
  private readonly channel = new EventChannel<WorkerEvent>();

  constructor(private readonly task: ExtractionTask) {
    this.exited = this.run();
  }

  events(): AsyncIterable<WorkerEvent> {
    return this.channel;
  }

  private async run(): Promise<WorkerExit> {
    const channel = this.channel;
    const emitter: TaskEmitter = {
      progress: (pct, message) => channel.push({ kind: 'progress', pct, message }),
      output: (path, rows) => channel.push({ kind: 'output', path, rows }),
      log: (line) => channel.push({ kind: 'log', line }),
    };

    // Let the caller attach to events() before the task emits anything
    await Promise.resolve();
    try {
      await this.task.run(emitter);
      return { code: 0 };
    } catch (error) {
      const fault = error instanceof Error ? error : new Error(describeError(error));
      channel.push({ kind: 'log', line: `${fault.name}: ${fault.message}` });
      return { code: 1, error: fault };
    } finally {
      channel.close();
    }
  }
}

export const createInProcessWorker: WorkerFactory = (task) => new InProcessWorker(task);
