// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Event Bus
// In-process publish/subscribe broker with an append-only log
// Delivery is synchronous and depth-first
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import { CONFIG } from './config.js';
import type { DomainEvent, DomainEventType, EventHandler } from './events.js';
import { errorMessage, type LoggerHandle, type Payload } from './types.js';

type EventBusEvents = {
  'event': (event: DomainEvent) => void;
  'handler:error': (info: { event: DomainEvent; subscriber: string; error: string }) => void;
  'cascade:blocked': (event: DomainEvent) => void;
};

interface Subscription {
  handler: EventHandler;
  label: string;
}

export interface EventBusOptions {
  maxCascadeDepth?: number;
  maxLogSize?: number;
  now?: () => Date;
}

export class EventBus extends EventEmitter<EventBusEvents> {
  private subscribers: Map<DomainEventType, Subscription[]> = new Map();
  private eventLog: DomainEvent[] = [];
  private depth = 0;
  private logger: LoggerHandle;
  private maxCascadeDepth: number;
  private maxLogSize: number;
  private now: () => Date;

  constructor(logger: LoggerHandle, options: EventBusOptions = {}) {
    super();
    this.logger = logger;
    this.maxCascadeDepth = options.maxCascadeDepth ?? CONFIG.eventBus.maxCascadeDepth;
    this.maxLogSize = options.maxLogSize ?? CONFIG.eventBus.maxLogSize;
    this.now = options.now ?? (() => new Date());
  }

  // ── Subscription ──

  /** Register a handler. Identical handlers registered twice run twice. */
  subscribe(eventType: DomainEventType, handler: EventHandler, label = 'anonymous'): () => void {
    const list = this.subscribers.get(eventType) ?? [];
    const subscription: Subscription = { handler, label };
    list.push(subscription);
    this.subscribers.set(eventType, list);
    this.logger.debug(`Subscribed ${label} to ${eventType}`);

    return () => {
      const current = this.subscribers.get(eventType);
      if (!current) return;
      const idx = current.indexOf(subscription);
      if (idx >= 0) current.splice(idx, 1);
    };
  }

  // ── Publishing ──

  publish(eventType: DomainEventType, payload: Payload = {}, source = 'System'): DomainEvent {
    const event: DomainEvent = Object.freeze({
      type: eventType,
      payload: Object.freeze({ ...payload }),
      source,
      timestamp: this.now(),
    });

    this.eventLog.push(event);
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog.splice(0, this.eventLog.length - this.maxLogSize);
    }
    this.emit('event', event);

    if (this.depth >= this.maxCascadeDepth) {
      this.logger.warn(`Cascade depth ${this.depth} reached, delivery of ${eventType} from ${source} skipped`);
      this.emit('cascade:blocked', event);
      return event;
    }

    // Snapshot: handlers added during delivery wait for the next publish
    const targets = [...(this.subscribers.get(eventType) ?? [])];

    this.depth++;
    try {
      for (const { handler, label } of targets) {
        try {
          handler(eventType, event.payload);
        } catch (err) {
          const error = errorMessage(err);
          this.logger.error(`Handler ${label} failed on ${eventType}: ${error}`);
          this.emit('handler:error', { event, subscriber: label, error });
        }
      }
    } finally {
      this.depth--;
    }

    return event;
  }

  // ── Observability ──

  /** Most recent events, oldest first */
  getEventLog(limit = 50): DomainEvent[] {
    if (limit <= 0) return [];
    return this.eventLog.slice(-limit);
  }

  getSubscribersCount(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [type, list] of this.subscribers) {
      counts[type] = list.length;
    }
    return counts;
  }

  clearLog(): void {
    this.eventLog = [];
  }
}
