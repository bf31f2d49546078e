// ═══════════════════════════════════════════════════════════════
// Learning :: Decision History
// Per-agent record of autonomous decisions and human overrides
// Retrieval is keyword overlap, not semantic search
// ═══════════════════════════════════════════════════════════════

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CONFIG } from '../core/config.js';
import { newId } from '../core/ids.js';
import { errorMessage, type LoggerHandle, type Payload } from '../core/types.js';

export interface DecisionRecord {
  id: string;
  agent: string;
  timestamp: Date;
  task: string;
  context: Payload;
  decision: string;
  confidence: number;
  outcome: string | null;
}

export interface OverrideRecord {
  decisionId: string;
  agent: string;
  timestamp: Date;
  originalDecision: string;
  adminDecision: string;
  reason: string;
}

export interface PerformanceStats {
  totalDecisions: number;
  totalOverrides: number;
  overrideRatePercent: number;
  averageConfidence: number;
}

export interface LearningStoreOptions {
  maxDecisions?: number;
  maxOverrides?: number;
  now?: () => Date;
}

const StoredDecision = z.object({
  id: z.string(),
  agent: z.string(),
  timestamp: z.coerce.date(),
  task: z.string(),
  context: z.record(z.string(), z.unknown()),
  decision: z.string(),
  confidence: z.number(),
  outcome: z.string().nullable(),
});

const StoredOverride = z.object({
  decisionId: z.string(),
  agent: z.string(),
  timestamp: z.coerce.date(),
  originalDecision: z.string(),
  adminDecision: z.string(),
  reason: z.string(),
});

const DataRow = z.object({ data: z.string() });

type RecordKind = 'decision' | 'override';

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export class LearningStore {
  readonly agent: string;
  private decisions: DecisionRecord[] = [];
  private overrides: OverrideRecord[] = [];
  private db: Database.Database | null;
  private logger: LoggerHandle;
  private maxDecisions: number;
  private maxOverrides: number;
  private now: () => Date;

  /** Pass `null` for db to keep the history in memory only */
  constructor(agent: string, db: Database.Database | null, logger: LoggerHandle, options: LearningStoreOptions = {}) {
    this.agent = agent;
    this.db = db;
    this.logger = logger;
    this.maxDecisions = options.maxDecisions ?? CONFIG.learning.maxDecisions;
    this.maxOverrides = options.maxOverrides ?? CONFIG.learning.maxOverrides;
    this.now = options.now ?? (() => new Date());
    this.load();
  }

  // ── Persistence ──

  private load(): void {
    if (!this.db) return;
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS learning_records (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          agent TEXT NOT NULL,
          kind TEXT NOT NULL,
          record_id TEXT NOT NULL,
          data TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_learning_agent ON learning_records(agent, kind);
      `);

      this.decisions = this.readKind('decision').map(d => StoredDecision.parse(d)).slice(-this.maxDecisions);
      this.overrides = this.readKind('override').map(o => StoredOverride.parse(o)).slice(-this.maxOverrides);
      this.logger.info(`LearningStore[${this.agent}] loaded ${this.decisions.length} decisions, ${this.overrides.length} overrides`);
    } catch (err) {
      this.decisions = [];
      this.overrides = [];
      this.logger.warn(`LearningStore[${this.agent}] history unreadable, starting empty: ${errorMessage(err)}`);
    }
  }

  private readKind(kind: RecordKind): unknown[] {
    if (!this.db) return [];
    return this.db.prepare('SELECT data FROM learning_records WHERE agent = ? AND kind = ? ORDER BY seq ASC')
      .all(this.agent, kind)
      .map(r => JSON.parse(DataRow.parse(r).data));
  }

  private persist(kind: RecordKind, recordId: string, data: DecisionRecord | OverrideRecord, keep: number): void {
    if (!this.db) return;
    try {
      this.db.prepare('INSERT INTO learning_records (agent, kind, record_id, data) VALUES (?, ?, ?, ?)')
        .run(this.agent, kind, recordId, JSON.stringify(data));
      this.db.prepare(`
        DELETE FROM learning_records WHERE agent = ? AND kind = ? AND seq NOT IN (
          SELECT seq FROM learning_records WHERE agent = ? AND kind = ? ORDER BY seq DESC LIMIT ?
        )
      `).run(this.agent, kind, this.agent, kind, keep);
    } catch (err) {
      this.logger.warn(`LearningStore[${this.agent}] write failed, record kept in memory: ${errorMessage(err)}`);
    }
  }

  // ── Record ──

  recordDecision(task: string, context: Payload, decision: string, confidence: number, outcome: string | null = null): DecisionRecord {
    const record: DecisionRecord = {
      id: newId('DEC'),
      agent: this.agent,
      timestamp: this.now(),
      task,
      context,
      decision,
      confidence,
      outcome,
    };

    this.decisions.push(record);
    if (this.decisions.length > this.maxDecisions) {
      this.decisions = this.decisions.slice(-this.maxDecisions);
    }
    this.persist('decision', record.id, record, this.maxDecisions);
    return record;
  }

  /** Human correction of an earlier decision; the decision must still be in the window */
  recordOverride(decisionId: string, originalDecision: string, adminDecision: string, reason: string): OverrideRecord {
    if (!this.getDecision(decisionId)) {
      throw new Error(`Unknown decision id for ${this.agent}: ${decisionId}`);
    }

    const override: OverrideRecord = {
      decisionId,
      agent: this.agent,
      timestamp: this.now(),
      originalDecision,
      adminDecision,
      reason,
    };

    this.overrides.push(override);
    if (this.overrides.length > this.maxOverrides) {
      this.overrides = this.overrides.slice(-this.maxOverrides);
    }
    this.persist('override', decisionId, override, this.maxOverrides);
    this.updateOutcome(decisionId, 'overridden');
    this.logger.info(`LearningStore[${this.agent}] override on ${decisionId}: ${originalDecision} → ${adminDecision}`);
    return override;
  }

  updateOutcome(decisionId: string, outcome: string): boolean {
    const record = this.getDecision(decisionId);
    if (!record) return false;
    record.outcome = outcome;

    if (this.db) {
      try {
        this.db.prepare("UPDATE learning_records SET data = ? WHERE agent = ? AND kind = 'decision' AND record_id = ?")
          .run(JSON.stringify(record), this.agent, decisionId);
      } catch (err) {
        this.logger.warn(`LearningStore[${this.agent}] outcome update not persisted: ${errorMessage(err)}`);
      }
    }
    return true;
  }

  // ── Retrieve ──

  getDecision(id: string): DecisionRecord | null {
    return this.decisions.find(d => d.id === id) ?? null;
  }

  getDecisions(limit = this.maxDecisions): DecisionRecord[] {
    return this.decisions.slice(-limit);
  }

  getOverrides(): OverrideRecord[] {
    return [...this.overrides];
  }

  /** Past decisions sharing the most whitespace tokens with the task; ties keep history order */
  getRelevantExamples(currentTask: string, n = 3): DecisionRecord[] {
    const keywords = tokenize(currentTask);
    const scored: Array<{ overlap: number; record: DecisionRecord }> = [];

    for (const record of this.decisions) {
      let overlap = 0;
      for (const word of tokenize(record.task)) {
        if (keywords.has(word)) overlap++;
      }
      if (overlap > 0) scored.push({ overlap, record });
    }

    scored.sort((a, b) => b.overlap - a.overlap);
    return scored.slice(0, Math.max(0, n)).map(s => s.record);
  }

  getPerformanceStats(): PerformanceStats {
    const total = this.decisions.length;
    const overridden = this.overrides.length;
    const avgConfidence = total > 0 ? this.decisions.reduce((sum, d) => sum + d.confidence, 0) / total : 0;

    return {
      totalDecisions: total,
      totalOverrides: overridden,
      overrideRatePercent: total > 0 ? round2((overridden / total) * 100) : 0,
      averageConfidence: round2(avgConfidence),
    };
  }
}
