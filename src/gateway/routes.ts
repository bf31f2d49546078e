// ═══════════════════════════════════════════════════════════════
// Gateway :: API Routes
// REST surface over the orchestrator, bus, learning and audit log
// ═══════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { EventBus } from '../core/event-bus.js';
import { DomainEventTypeSchema } from '../core/events.js';
import type { Orchestrator } from '../core/orchestrator.js';
import { errorMessage, type LoggerHandle } from '../core/types.js';
import type { AuditTrail } from '../protocols/audit-trail.js';

export interface ApiDependencies {
  orchestrator: Orchestrator;
  bus: EventBus;
  audit: AuditTrail;
  logger: LoggerHandle;
}

// ── Bodies & Queries ──

const TaskBody = z.object({
  task: z.string().trim().min(1),
  context: z.record(z.string(), z.unknown()).default({}),
});

const ParamsBody = z.record(z.string(), z.unknown()).default({});

const ResolveBody = z.object({
  adminDecision: z.string().min(1),
  reason: z.string().default(''),
  reviewer: z.string().default('admin'),
});

const PublishBody = z.object({
  type: DomainEventTypeSchema,
  payload: z.record(z.string(), z.unknown()).default({}),
  source: z.string().default('Gateway'),
});

const LimitQuery = z.object({
  limit: z.coerce.number().int().positive().max(10000).default(50),
});

const IsoDate = z.string().refine(v => !Number.isNaN(Date.parse(v)), 'expected an ISO date').transform(v => new Date(v));

const AuditQuery = z.object({
  since: IsoDate.optional(),
  until: IsoDate.optional(),
});

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'Invalid request',
    details: error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
  });
}

// ── Factory ──

export function createApiRoutes(deps: ApiDependencies): Router {
  const router = Router();
  const { orchestrator, bus, audit, logger } = deps;

  // ─── Agents ───────────────────────────────────────────────

  router.get('/api/agents', (_req: Request, res: Response) => {
    res.json(orchestrator.getAllAgentStatuses());
  });

  router.get('/api/agents/:agent', (req: Request, res: Response) => {
    const agent = orchestrator.getAgent(req.params.agent);
    if (!agent) {
      res.status(404).json({ error: `Agent not found: ${req.params.agent}` });
      return;
    }
    res.json({
      ...agent.getStatus(),
      subscriptions: agent.subscriptions,
      capabilityDefinitions: agent.getCapabilityDefinitions()
        .map(({ name, description, parameters }) => ({ name, description, parameters })),
    });
  });

  router.post('/api/agents/:agent/capabilities/:capability', async (req: Request, res: Response) => {
    const agent = orchestrator.getAgent(req.params.agent);
    if (!agent) {
      res.status(404).json({ error: `Agent not found: ${req.params.agent}` });
      return;
    }
    if (!agent.getCapabilities().includes(req.params.capability)) {
      res.status(404).json({ error: `Capability not found: ${req.params.capability}` });
      return;
    }
    const params = ParamsBody.safeParse(req.body);
    if (!params.success) {
      badRequest(res, params.error);
      return;
    }

    try {
      res.json(await agent.invokeCapability(req.params.capability, params.data));
    } catch (err) {
      logger.error(`Capability ${req.params.agent}.${req.params.capability} failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── Free-text tasks ──────────────────────────────────────

  router.post('/api/task', async (req: Request, res: Response) => {
    const body = TaskBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }

    try {
      res.json(await orchestrator.handleRequest(body.data.task, body.data.context));
    } catch (err) {
      logger.error(`Task handling failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── Workflows ────────────────────────────────────────────

  router.post('/api/workflows/:name', (req: Request, res: Response) => {
    const params = ParamsBody.safeParse(req.body);
    if (!params.success) {
      badRequest(res, params.error);
      return;
    }

    const outcome = orchestrator.executeWorkflow(req.params.name, params.data);
    if (outcome.status === 'error') {
      res.status(404).json(outcome);
      return;
    }
    res.json(outcome);
  });

  router.get('/api/workflows', (_req: Request, res: Response) => {
    res.json({
      active: orchestrator.getActiveWorkflows(),
      completed: orchestrator.getCompletedWorkflows(),
      failed: orchestrator.getFailedWorkflows(),
    });
  });

  router.get('/api/workflows/:id', (req: Request, res: Response) => {
    const run = orchestrator.getWorkflow(req.params.id);
    if (!run) {
      res.status(404).json({ error: `Workflow not found: ${req.params.id}` });
      return;
    }
    res.json(run);
  });

  // ─── Escalations ──────────────────────────────────────────

  router.get('/api/escalations', (_req: Request, res: Response) => {
    res.json(orchestrator.getEscalationQueue());
  });

  router.post('/api/escalations/:id/resolve', (req: Request, res: Response) => {
    const body = ResolveBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }

    try {
      const entry = orchestrator.resolveEscalation(req.params.id, body.data);
      if (!entry) {
        res.status(404).json({ error: `No pending escalation: ${req.params.id}` });
        return;
      }
      res.json(entry);
    } catch (err) {
      logger.error(`Escalation ${req.params.id} not resolved: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // ─── Events ───────────────────────────────────────────────

  router.get('/api/events', (req: Request, res: Response) => {
    const query = LimitQuery.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    res.json(bus.getEventLog(query.data.limit));
  });

  router.post('/api/events', (req: Request, res: Response) => {
    const body = PublishBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    res.status(201).json(bus.publish(body.data.type, body.data.payload, body.data.source));
  });

  // ─── Goals & Learning ─────────────────────────────────────

  router.get('/api/goals', (_req: Request, res: Response) => {
    res.json(orchestrator.getGoalReport());
  });

  router.get('/api/learning/:agent', (req: Request, res: Response) => {
    const agent = orchestrator.getAgent(req.params.agent);
    if (!agent) {
      res.status(404).json({ error: `Agent not found: ${req.params.agent}` });
      return;
    }
    const learning = agent.getLearningStore();
    res.json({
      agent: agent.name,
      stats: learning.getPerformanceStats(),
      recentDecisions: learning.getDecisions(20),
      overrides: learning.getOverrides(),
    });
  });

  // ─── Audit ────────────────────────────────────────────────

  router.get('/api/audit', (req: Request, res: Response) => {
    const query = AuditQuery.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    res.json(audit.list(query.data));
  });

  router.get('/api/audit/verify', (_req: Request, res: Response) => {
    res.json(audit.verifyChain());
  });

  return router;
}
