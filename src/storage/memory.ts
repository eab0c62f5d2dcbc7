/**
 * In-memory audit store for tests and simple use.
 */

import type { AuditEvent, AuditFilter, AuditStore } from '../core/types.js';
import { matchesFilter } from '../core/audit.js';

export class MemoryAuditSink implements AuditStore {
  private events = new Map<number, AuditEvent>();

  async append(event: AuditEvent): Promise<void> {
    if (this.events.has(event.sequence)) {
      throw new Error(`Audit event ${event.sequence} already stored`);
    }
    this.events.set(event.sequence, structuredClone(event));
  }

  async list(filter?: AuditFilter): Promise<AuditEvent[]> {
    return Array.from(this.events.values())
      .filter(e => matchesFilter(e, filter))
      .sort((a, b) => a.sequence - b.sequence);
  }

  get size(): number {
    return this.events.size;
  }
}
