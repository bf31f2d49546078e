// ═══════════════════════════════════════════════════════════════
// Protocol :: Escalation Queue
// Confidence gate for autonomous decisions
// Below the threshold nothing is executed; a human reviews instead
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import { CONFIG } from '../core/config.js';
import type { EscalationEntry, LoggerHandle, Payload } from '../core/types.js';

type EscalationEvents = {
  'escalation:created': (entry: EscalationEntry) => void;
  'escalation:resolved': (entry: EscalationEntry) => void;
};

export interface EscalationInput {
  agent: string;
  decisionId: string | null;
  task: string;
  context: Payload;
  decisionAttempt: string;
  confidence: number;
}

export interface EscalationResolution {
  adminDecision: string;
  reason: string;
  reviewer: string;
}

export interface EscalationQueueOptions {
  threshold?: number;
  maxEntries?: number;
  now?: () => Date;
}

export class EscalationQueue extends EventEmitter<EscalationEvents> {
  private entries: EscalationEntry[] = [];
  private logger: LoggerHandle;
  private threshold: number;
  private maxEntries: number;
  private now: () => Date;

  constructor(logger: LoggerHandle, options: EscalationQueueOptions = {}) {
    super();
    this.logger = logger;
    this.threshold = options.threshold ?? CONFIG.orchestrator.escalationConfidenceThreshold;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? (() => new Date());
    this.logger.info(`EscalationQueue initialized (threshold=${this.threshold})`);
  }

  getThreshold(): number {
    return this.threshold;
  }

  /** Strictly below the threshold escalates; equal to it acts */
  requiresEscalation(confidence: number): boolean {
    return confidence < this.threshold;
  }

  escalate(input: EscalationInput): EscalationEntry {
    const entry: EscalationEntry = {
      id: uuid(),
      ...input,
      timestamp: this.now(),
      state: 'pending',
    };
    this.entries.push(entry);

    // Keep the queue bounded, dropping resolved entries first
    if (this.entries.length > this.maxEntries) {
      const resolvedIdx = this.entries.findIndex(e => e.state === 'resolved');
      const [evicted] = this.entries.splice(resolvedIdx >= 0 ? resolvedIdx : 0, 1);
      if (evicted && evicted.state === 'pending') {
        this.logger.warn(`Escalation queue full (${this.maxEntries}): dropped unreviewed entry ${evicted.id} from ${evicted.agent}`);
      }
    }

    this.logger.warn(`Escalated ${input.agent} decision (confidence ${input.confidence.toFixed(2)} < ${this.threshold}): ${input.task.slice(0, 80)}`);
    this.emit('escalation:created', entry);
    return entry;
  }

  get(id: string): EscalationEntry | null {
    return this.entries.find(e => e.id === id) ?? null;
  }

  /** Entries awaiting review, oldest first */
  pending(): EscalationEntry[] {
    return this.entries.filter(e => e.state === 'pending');
  }

  list(): EscalationEntry[] {
    return [...this.entries];
  }

  /** Mark an entry reviewed. Returns null when the id is unknown or already resolved. */
  resolve(id: string, resolution: EscalationResolution): EscalationEntry | null {
    const entry = this.get(id);
    if (!entry || entry.state === 'resolved') return null;

    entry.state = 'resolved';
    entry.resolution = { ...resolution, resolvedAt: this.now() };
    this.logger.info(`Escalation ${id} resolved by ${resolution.reviewer}: ${resolution.adminDecision}`);
    this.emit('escalation:resolved', entry);
    return entry;
  }
}
