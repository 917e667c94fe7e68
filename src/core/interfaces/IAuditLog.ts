import { AuditEntry } from '../entities/AuditEntry.js';

/**
 * Append-only audit store
 */
export interface IAuditLog {
  append(entry: AuditEntry): Promise<void>;

  tail(limit?: number): Promise<Array<Record<string, unknown>>>;
}
