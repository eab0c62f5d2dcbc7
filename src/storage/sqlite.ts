/**
 * SQLite audit store using better-sqlite3.
 *
 * The table is append-only: triggers abort every UPDATE and DELETE, and the
 * sequence is the primary key, so an event can never be overwritten.
 */

import Database from 'better-sqlite3';
import type { AuditEvent, AuditFilter, AuditStore, JsonObject, JsonValue } from '../core/types.js';
import { isAuditKind, isAuditSeverity } from '../core/audit.js';

interface AuditRow {
  sequence: number;
  event_id: string;
  kind: string;
  session_id: string | null;
  subject_ids_json: string;
  related_message_id: string | null;
  timestamp: string;
  severity: string;
  details_json: string;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export class SqliteAuditSink implements AuditStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_events (
        sequence INTEGER PRIMARY KEY,
        event_id TEXT NOT NULL UNIQUE,
        kind TEXT NOT NULL,
        session_id TEXT,
        subject_ids_json TEXT NOT NULL,
        related_message_id TEXT,
        timestamp TEXT NOT NULL,
        severity TEXT NOT NULL,
        details_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_session ON audit_events(session_id);
      CREATE INDEX IF NOT EXISTS idx_audit_kind ON audit_events(kind);

      CREATE TRIGGER IF NOT EXISTS audit_events_no_update
        BEFORE UPDATE ON audit_events
        BEGIN SELECT RAISE(ABORT, 'audit_events is append-only'); END;
      CREATE TRIGGER IF NOT EXISTS audit_events_no_delete
        BEFORE DELETE ON audit_events
        BEGIN SELECT RAISE(ABORT, 'audit_events is append-only'); END;
    `);
  }

  async append(e: AuditEvent): Promise<void> {
    this.db.prepare(`
      INSERT INTO audit_events (sequence, event_id, kind, session_id, subject_ids_json, related_message_id, timestamp, severity, details_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      e.sequence,
      e.event_id,
      e.kind,
      e.session_id,
      JSON.stringify(e.subject_ids),
      e.related_message_id ?? null,
      e.timestamp,
      e.severity,
      JSON.stringify(e.details),
    );
  }

  async list(filter: AuditFilter = {}): Promise<AuditEvent[]> {
    let sql = 'SELECT * FROM audit_events WHERE 1=1';
    const params: (string | number)[] = [];
    if (filter.sessionId !== undefined) { sql += ' AND session_id = ?'; params.push(filter.sessionId); }
    if (filter.kind !== undefined) { sql += ' AND kind = ?'; params.push(filter.kind); }
    if (filter.afterSequence !== undefined) { sql += ' AND sequence > ?'; params.push(filter.afterSequence); }
    sql += ' ORDER BY sequence';
    const rows = this.db.prepare<(string | number)[], AuditRow>(sql).all(...params);
    return rows.map(r => this.rowToEvent(r));
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM audit_events').get();
    return row?.n ?? 0;
  }

  /** Direct handle, for maintenance tooling */
  get database(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  private rowToEvent(row: AuditRow): AuditEvent {
    const subjectIds: unknown = JSON.parse(row.subject_ids_json);
    const details: unknown = JSON.parse(row.details_json);
    if (!isAuditKind(row.kind) || !isAuditSeverity(row.severity) || !isStringArray(subjectIds) || !isJsonObject(details)) {
      throw new Error(`Corrupt audit row ${row.sequence}`);
    }
    const event: AuditEvent = {
      sequence: row.sequence,
      event_id: row.event_id,
      kind: row.kind,
      session_id: row.session_id,
      subject_ids: subjectIds,
      timestamp: row.timestamp,
      severity: row.severity,
      details,
    };
    if (row.related_message_id !== null) event.related_message_id = row.related_message_id;
    return event;
  }
}
