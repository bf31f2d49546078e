// ═══════════════════════════════════════════════════════════════
// Protocol :: Audit Trail
// SHA-256 hash chain over every agent action
// Append-only: entries are never updated or deleted
// ═══════════════════════════════════════════════════════════════

import { createHash } from 'crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import type { LoggerHandle, Payload } from '../core/types.js';

export interface AuditEntry {
  logId: string;
  sequenceNumber: number;
  timestamp: Date;
  agent: string;        // "HR Agent", "System", ...
  action: string;       // "Employee Onboarding", "Process Leave Request", ...
  details: Payload;
  user: string;         // who triggered it
  previousHash: string;
  hash: string;
}

export interface AuditQuery {
  since?: Date;
  until?: Date;
}

export interface AuditTrailOptions {
  now?: () => Date;
}

const AuditRow = z.object({
  log_id: z.string(),
  sequence_number: z.number(),
  timestamp: z.string(),
  agent: z.string(),
  action: z.string(),
  details: z.string(),
  user: z.string(),
  previous_hash: z.string(),
  hash: z.string(),
});

type AuditRowData = z.infer<typeof AuditRow>;

const HeadRow = z.object({ sequence_number: z.number(), hash: z.string() });
const CountRow = z.object({ c: z.number() });
const DetailsSchema = z.record(z.string(), z.unknown());

const GENESIS_HASH = '0'.repeat(64);

export class AuditTrail {
  private db: Database.Database;
  private logger: LoggerHandle;
  private sequenceCounter: number;
  private lastHash: string;
  private now: () => Date;

  constructor(db: Database.Database, logger: LoggerHandle, options: AuditTrailOptions = {}) {
    this.db = db;
    this.logger = logger;
    this.now = options.now ?? (() => new Date());
    this.initSchema();

    // Resume from last entry
    const last = this.db.prepare(
      'SELECT sequence_number, hash FROM audit_log ORDER BY sequence_number DESC LIMIT 1'
    ).get();
    const head = last === undefined ? null : HeadRow.parse(last);

    this.sequenceCounter = head ? head.sequence_number : 0;
    this.lastHash = head ? head.hash : GENESIS_HASH;

    this.logger.info(`AuditTrail initialized (${this.sequenceCounter} entries)`);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_log (
        log_id TEXT PRIMARY KEY,
        sequence_number INTEGER UNIQUE NOT NULL,
        timestamp TEXT NOT NULL,
        agent TEXT NOT NULL,
        action TEXT NOT NULL,
        details TEXT DEFAULT '{}',
        user TEXT NOT NULL,
        previous_hash TEXT NOT NULL,
        hash TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_log_agent ON audit_log(agent);
      CREATE INDEX IF NOT EXISTS idx_audit_log_action ON audit_log(action);
      CREATE INDEX IF NOT EXISTS idx_audit_log_timestamp ON audit_log(timestamp);
    `);
  }

  private static digest(previousHash: string, seq: number, timestamp: string, agent: string, action: string, details: string, user: string): string {
    const payload = `${previousHash}|${seq}|${timestamp}|${agent}|${action}|${details}|${user}`;
    return createHash('sha256').update(payload).digest('hex');
  }

  /** Append an entry to the chain */
  record(agent: string, action: string, details: Payload = {}, user = 'System'): AuditEntry {
    this.sequenceCounter++;
    const logId = uuid();
    const now = this.now();
    const serialized = JSON.stringify(details);
    const hash = AuditTrail.digest(this.lastHash, this.sequenceCounter, now.toISOString(), agent, action, serialized, user);

    const entry: AuditEntry = {
      logId,
      sequenceNumber: this.sequenceCounter,
      timestamp: now,
      agent,
      action,
      details,
      user,
      previousHash: this.lastHash,
      hash,
    };

    this.db.prepare(`
      INSERT INTO audit_log (log_id, sequence_number, timestamp, agent, action, details, user, previous_hash, hash)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(logId, this.sequenceCounter, now.toISOString(), agent, action, serialized, user, this.lastHash, hash);

    this.lastHash = hash;
    this.logger.debug(`Audit: ${agent} → ${action}`);
    return entry;
  }

  /** Verify the integrity of the entire hash chain */
  verifyChain(): { valid: boolean; brokenAt?: number; totalEntries: number } {
    const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence_number ASC').all().map(r => AuditRow.parse(r));

    if (rows.length === 0) return { valid: true, totalEntries: 0 };

    let previousHash = GENESIS_HASH;

    for (const row of rows) {
      if (row.previous_hash !== previousHash) {
        this.logger.error(`Audit chain broken at sequence ${row.sequence_number}: previous_hash mismatch`);
        return { valid: false, brokenAt: row.sequence_number, totalEntries: rows.length };
      }

      const expected = AuditTrail.digest(row.previous_hash, row.sequence_number, row.timestamp, row.agent, row.action, row.details, row.user);
      if (row.hash !== expected) {
        this.logger.error(`Audit chain broken at sequence ${row.sequence_number}: hash mismatch`);
        return { valid: false, brokenAt: row.sequence_number, totalEntries: rows.length };
      }

      previousHash = row.hash;
    }

    return { valid: true, totalEntries: rows.length };
  }

  /** Chronological entries, optionally bounded by an inclusive time window */
  list(query: AuditQuery = {}): AuditEntry[] {
    const since = query.since ? query.since.toISOString() : '0000-01-01T00:00:00.000Z';
    const until = query.until ? query.until.toISOString() : '9999-12-31T23:59:59.999Z';
    const rows = this.db.prepare(`
      SELECT * FROM audit_log
      WHERE timestamp >= ? AND timestamp <= ?
      ORDER BY sequence_number ASC
    `).all(since, until);

    return rows.map(r => this.rowToEntry(AuditRow.parse(r)));
  }

  /** Most recent entries written by one agent, newest first */
  getByAgent(agent: string, limit = 100): AuditEntry[] {
    const rows = this.db.prepare(
      'SELECT * FROM audit_log WHERE agent = ? ORDER BY sequence_number DESC LIMIT ?'
    ).all(agent, limit);

    return rows.map(r => this.rowToEntry(AuditRow.parse(r)));
  }

  /** Get the latest N entries, oldest first */
  getRecent(limit = 50): AuditEntry[] {
    const rows = this.db.prepare(
      'SELECT * FROM audit_log ORDER BY sequence_number DESC LIMIT ?'
    ).all(limit);

    return rows.map(r => this.rowToEntry(AuditRow.parse(r))).reverse();
  }

  getCount(): number {
    return CountRow.parse(this.db.prepare('SELECT COUNT(*) as c FROM audit_log').get()).c;
  }

  private rowToEntry(row: AuditRowData): AuditEntry {
    return {
      logId: row.log_id,
      sequenceNumber: row.sequence_number,
      timestamp: new Date(row.timestamp),
      agent: row.agent,
      action: row.action,
      details: DetailsSchema.parse(JSON.parse(row.details)),
      user: row.user,
      previousHash: row.previous_hash,
      hash: row.hash,
    };
  }
}
