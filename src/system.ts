// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: System Assembly
// Builds the store, bus, protocols, agents and orchestrator
// ═══════════════════════════════════════════════════════════════

import type Database from 'better-sqlite3';
import type { BaseAgent } from './agents/base.js';
import { ComplianceAgent, type ComplianceAgentOptions } from './agents/compliance/index.js';
import { FinanceAgent, type FinanceAgentOptions } from './agents/finance/index.js';
import { HRAgent, type HRAgentOptions } from './agents/hr/index.js';
import { ITAgent, type ITAgentOptions } from './agents/it/index.js';
import { CONFIG } from './core/config.js';
import { EventBus } from './core/event-bus.js';
import { LLMService, type LanguageModel } from './core/llm-service.js';
import { createLogger } from './core/logger.js';
import { Orchestrator, type AgentRoster } from './core/orchestrator.js';
import { AGENT_KEYS, AGENT_NAMES, type AgentKey, type LoggerHandle } from './core/types.js';
import { GoalTracker } from './learning/goal-tracker.js';
import { LearningStore } from './learning/learning-store.js';
import { AuditTrail } from './protocols/audit-trail.js';
import { EscalationQueue } from './protocols/escalation.js';
import { openDatabase } from './store/database.js';
import { createEmployeeDirectory } from './store/directory.js';
import { EntityStore } from './store/entity-store.js';
import { applySeed, loadSeedFile, type SeedData } from './store/seed.js';

export interface AgentSystemOptions {
  /** Open connection; takes precedence over dbPath */
  db?: Database.Database;
  dbPath?: string;
  /** Omitted: read config/seed.json. null: start with an empty store. */
  seed?: SeedData | null;
  /** Omitted: an LLMService over the Anthropic SDK */
  llm?: LanguageModel;
  logger?: LoggerHandle;
  now?: () => Date;
  escalationThreshold?: number;
  maxCascadeDepth?: number;
  hr?: HRAgentOptions;
  it?: ITAgentOptions;
  finance?: FinanceAgentOptions;
  compliance?: ComplianceAgentOptions;
}

export interface AgentSystem {
  db: Database.Database;
  store: EntityStore;
  bus: EventBus;
  audit: AuditTrail;
  llm: LanguageModel;
  escalations: EscalationQueue;
  goals: GoalTracker;
  agents: AgentRoster;
  orchestrator: Orchestrator;
  close(): void;
}

export function createAgentSystem(options: AgentSystemOptions = {}): AgentSystem {
  const logger = options.logger ?? createLogger('workforce-agents');
  const now = options.now ?? (() => new Date());

  // ── Storage ──
  const db = options.db ?? openDatabase(options.dbPath ?? CONFIG.database.path, logger);
  const store = new EntityStore(db, logger);
  const seed = options.seed === undefined ? loadSeedFile() : options.seed;
  if (seed) applySeed(store, seed, logger);

  // ── Shared services ──
  const bus = new EventBus(logger, { maxCascadeDepth: options.maxCascadeDepth, now });
  const audit = new AuditTrail(db, logger, { now });
  const llm = options.llm ?? new LLMService(logger, { directory: createEmployeeDirectory(store) });
  const escalations = new EscalationQueue(logger, { threshold: options.escalationThreshold, now });
  const goals = new GoalTracker(undefined, now);

  const depsFor = (key: AgentKey) => ({
    store,
    bus,
    audit,
    llm,
    learning: new LearningStore(AGENT_NAMES[key], db, logger, { now }),
    escalations,
    goals,
    logger,
    now,
  });

  // ── Agents ──
  const agents: AgentRoster = {
    hr: new HRAgent(depsFor('hr'), options.hr),
    it: new ITAgent(depsFor('it'), options.it),
    finance: new FinanceAgent(depsFor('finance'), { payScale: seed?.payScale, ...options.finance }),
    compliance: new ComplianceAgent(depsFor('compliance'), options.compliance),
  };

  // Roster order fixes fan-out order on every event type
  for (const key of AGENT_KEYS) {
    const agent: BaseAgent = agents[key];
    for (const eventType of agent.subscriptions) {
      bus.subscribe(eventType, (type, payload) => agent.handleEvent(type, payload), agent.name);
    }
  }

  const orchestrator = new Orchestrator({ agents, bus, llm, escalations, goals, logger, now });
  logger.info(`Agent system ready: ${AGENT_KEYS.map(k => agents[k].name).join(', ')}`);

  return {
    db,
    store,
    bus,
    audit,
    llm,
    escalations,
    goals,
    agents,
    orchestrator,
    close: () => {
      if (db.open) db.close();
    },
  };
}
