import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { AuditEntry } from '../../core/entities/AuditEntry.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';

const AuditRecordSchema = z.record(z.unknown());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON-lines audit file. Appends run one at a time through a promise chain,
 * so records from jobs finishing together never interleave.
 */
export class AuditLog implements IAuditLog {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(entry: AuditEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';
    const write = this.queue.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    });
    // A failed write must not block the records queued behind it
    this.queue = write.catch((error: unknown) => {
      console.error('[AuditLog] ✗ Append failed:', error);
    });
    return write;
  }

  /**
   * Last `limit` records, oldest first. Lines that are not JSON objects are
   * skipped.
   */
  async tail(limit: number = 100): Promise<Array<Record<string, unknown>>> {
    await this.queue;

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const records: Array<Record<string, unknown>> = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        continue;
      }
      const parsed = AuditRecordSchema.safeParse(value);
      if (parsed.success) records.push(parsed.data);
    }
    return limit > 0 ? records.slice(-limit) : [];
  }
}
