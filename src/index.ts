#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════
//
//   WORKFORCE AGENTS
//   Event-driven coordination of HR, IT, Finance and Compliance agents
//
// ═══════════════════════════════════════════════════════════════

import { CONFIG } from './core/config.js';
import { createLogger } from './core/logger.js';
import { errorMessage } from './core/types.js';
import { GatewayServer } from './gateway/server.js';
import { createAgentSystem } from './system.js';

async function main(): Promise<void> {
  const logger = createLogger('workforce-agents');

  logger.info('═══════════════════════════════════════════════════');
  logger.info('  Workforce Agents — Booting');
  logger.info('═══════════════════════════════════════════════════');
  logger.info(`  Model: ${CONFIG.anthropic.model}`);
  logger.info(`  Gateway: ${CONFIG.gateway.host}:${CONFIG.gateway.port}`);
  logger.info(`  Database: ${CONFIG.database.path}`);
  logger.info(`  Log level: ${CONFIG.logging.level}`);

  // ── Phase 1: Store, bus, protocols, agents ──

  logger.info('[1/2] Assembling agent system...');
  const system = createAgentSystem({ logger });
  system.audit.record('System', 'Boot', { model: CONFIG.anthropic.model, llmAvailable: system.llm.isAvailable() });

  // ── Phase 2: Gateway ──

  logger.info('[2/2] Starting gateway...');
  const gateway = new GatewayServer(
    { orchestrator: system.orchestrator, bus: system.bus, audit: system.audit },
    logger,
  );
  const port = await gateway.start();

  logger.info('');
  logger.info('═══════════════════════════════════════════════════');
  logger.info('  ALL SYSTEMS OPERATIONAL');
  logger.info('');
  for (const [key, status] of Object.entries(system.orchestrator.getAllAgentStatuses())) {
    logger.info(`    ${status.name.padEnd(17)} (${key}) — ${status.capabilities.length} capabilities, ${status.status.toUpperCase()}`);
  }
  logger.info('');
  logger.info(`  Audit Trail — ${system.audit.getCount()} entries`);
  logger.info(`  Health:      http://${CONFIG.gateway.host}:${port}/health`);
  logger.info('═══════════════════════════════════════════════════');

  // ── Graceful Shutdown ──

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received — shutting down...`);
    system.audit.record('System', 'Shutdown', { signal });
    await gateway.stop();
    system.close();
    logger.info('All systems offline.');
  };

  const onSignal = (signal: string) => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

// ── Execute ──
main().catch((err: unknown) => {
  console.error('FATAL: Workforce Agents failed to start:', err);
  process.exit(1);
});
