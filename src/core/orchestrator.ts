// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Orchestrator
// Task routing, named multi-agent workflows, escalation review
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import type { BaseAgent } from '../agents/base.js';
import type { ComplianceAgent } from '../agents/compliance/index.js';
import type { FinanceAgent } from '../agents/finance/index.js';
import type { HRAgent } from '../agents/hr/index.js';
import type { ITAgent } from '../agents/it/index.js';
import type { GoalReportEntry, GoalTracker } from '../learning/goal-tracker.js';
import type { EscalationQueue, EscalationResolution } from '../protocols/escalation.js';
import { SEVERITIES } from '../store/schemas.js';
import { CONFIG } from './config.js';
import type { EventBus } from './event-bus.js';
import type { DomainEvent } from './events.js';
import { newId } from './ids.js';
import type { LanguageModel } from './llm-service.js';
import {
  AGENT_KEYS, errorMessage, isAgentKey, WORKFLOW_NAMES,
  type AgentKey, type AgentStatusSummary, type CapabilityResult, type EscalationEntry, type LoggerHandle,
  type Payload, type RequestResponse, type RoutingDecision, type StepRecord, type WorkflowName,
  type WorkflowOutcome, type WorkflowRun,
} from './types.js';

// ── Events ──────────────────────────────────────────────────

type OrchestratorEvents = {
  'workflow:started': (run: WorkflowRun) => void;
  'workflow:completed': (run: WorkflowRun) => void;
  'workflow:failed': (run: WorkflowRun) => void;
  'task:routed': (info: { task: string; routing: RoutingDecision }) => void;
  'escalation:created': (entry: EscalationEntry) => void;
};

// ── Roster ──────────────────────────────────────────────────

export interface AgentRoster {
  hr: HRAgent;
  it: ITAgent;
  finance: FinanceAgent;
  compliance: ComplianceAgent;
}

export interface OrchestratorDeps {
  agents: AgentRoster;
  bus: EventBus;
  llm: LanguageModel;
  escalations: EscalationQueue;
  goals: GoalTracker;
  logger: LoggerHandle;
  historyLimit?: number;
  now?: () => Date;
}

export type HandledRequest = RequestResponse & { routing: RoutingDecision };

const DEFAULT_ROUTE: RoutingDecision = { agent: 'hr', reasoning: 'Default routing to HR' };

// ── Workflow Parameters ─────────────────────────────────────

const NewHireParams = z.object({
  name: z.string().trim().min(1),
  department: z.string().min(1).optional(),
  dept: z.string().min(1).optional(),
  email: z.string().email().optional(),
  position: z.string().min(1).default('Associate'),
  join_date: z.string().optional(),
}).transform((p, ctx) => {
  const department = p.department ?? p.dept;
  if (!department) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'department or dept is required' });
    return z.NEVER;
  }
  return { name: p.name, department, email: p.email, position: p.position, joinDate: p.join_date };
});

const EmployeeExitParams = z.object({
  employee_id: z.string().min(1),
  exit_date: z.string().optional(),
  reason: z.string().default('Employee exit'),
});

const ExpenseClaimParams = z.object({
  employee_id: z.string().min(1),
  amount: z.coerce.number().positive(),
  category: z.string().min(1).default('General'),
  description: z.string().default(''),
  receipt_uploaded: z.boolean().default(false),
});

const SecurityIncidentParams = z.object({
  incident_type: z.string().default('Security'),
  description: z.string().default('Security incident reported'),
  severity: z.enum(SEVERITIES).default('High'),
  employee_id: z.string().optional(),
});

type WorkflowHandler = (run: WorkflowRun, params: Payload) => Record<string, CapabilityResult>;

/** Mailbox derived from the name when onboarding arrives without one */
export function defaultEmail(name: string, domain: string = CONFIG.hr.emailDomain): string {
  const local = name.toLowerCase().replace(/[^a-z0-9]+/g, '.').replace(/^\.+|\.+$/g, '');
  return `${local || 'employee'}@${domain}`;
}

/** Agent key from an LLM routing reply: "key | reasoning" first, else the earliest whole-word key */
export function parseRoutingReply(reply: string): AgentKey | null {
  const head = reply.split('|')[0]?.trim().toLowerCase() ?? '';
  if (isAgentKey(head)) return head;

  const lower = reply.toLowerCase();
  let best: { key: AgentKey; index: number } | null = null;
  for (const key of AGENT_KEYS) {
    const match = new RegExp(`\\b${key}\\b`).exec(lower);
    if (match && (!best || match.index < best.index)) best = { key, index: match.index };
  }
  return best ? best.key : null;
}

export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private agents: AgentRoster;
  private bus: EventBus;
  private llm: LanguageModel;
  private escalations: EscalationQueue;
  private goals: GoalTracker;
  private logger: LoggerHandle;
  private historyLimit: number;
  private now: () => Date;

  private active: Map<string, WorkflowRun> = new Map();
  private completed: WorkflowRun[] = [];
  private failed: WorkflowRun[] = [];
  private workflows: Record<WorkflowName, WorkflowHandler>;

  constructor(deps: OrchestratorDeps) {
    super();
    this.agents = deps.agents;
    this.bus = deps.bus;
    this.llm = deps.llm;
    this.escalations = deps.escalations;
    this.goals = deps.goals;
    this.logger = deps.logger;
    this.historyLimit = deps.historyLimit ?? CONFIG.orchestrator.workflowHistoryLimit;
    this.now = deps.now ?? (() => new Date());

    this.workflows = {
      new_hire: (run, params) => this.newHire(run, params),
      employee_exit: (run, params) => this.employeeExit(run, params),
      expense_claim: (run, params) => this.expenseClaim(run, params),
      security_incident: (run, params) => this.securityIncident(run, params),
    };

    this.escalations.on('escalation:created', entry => this.emit('escalation:created', entry));
    this.logger.info(`Orchestrator ready with ${AGENT_KEYS.length} agents and ${WORKFLOW_NAMES.length} workflows`);
  }

  private roster(): BaseAgent[] {
    return AGENT_KEYS.map(key => this.agents[key]);
  }

  // ── Task Routing ────────────────────────────────────────

  async routeTask(taskDescription: string, _context: Payload = {}): Promise<RoutingDecision> {
    let routing: RoutingDecision = { ...DEFAULT_ROUTE };

    if (this.llm.isAvailable()) {
      const agentList = AGENT_KEYS
        .map(key => `${key} (${this.agents[key].name}): ${this.agents[key].getCapabilities().join(', ')}`)
        .join('\n');
      const prompt = [
        'You are a task router. Given this request, decide which agent should handle it.',
        '',
        'Available Agents:',
        agentList,
        '',
        `Task: ${taskDescription}`,
        '',
        `Return the agent key (${AGENT_KEYS.join(', ')}) and brief reasoning.`,
        'Format: agent_key | reasoning',
      ].join('\n');

      const reply = await this.llm.generate(prompt);
      const agent = parseRoutingReply(reply);
      if (agent) routing = { agent, reasoning: reply.trim() };
    }

    this.logger.info(`Routed "${taskDescription.slice(0, 60)}" to ${routing.agent}`);
    this.emit('task:routed', { task: taskDescription, routing });
    return routing;
  }

  /** Route, then let the chosen agent run its reasoning loop */
  async handleRequest(task: string, context: Payload = {}): Promise<HandledRequest> {
    const routing = await this.routeTask(task, context);
    const response = await this.agents[routing.agent].processRequest(task, context);
    return { ...response, routing };
  }

  // ── Workflow Engine ─────────────────────────────────────

  executeWorkflow(workflowName: string, params: Payload = {}): WorkflowOutcome {
    if (!this.isWorkflowName(workflowName)) {
      return { status: 'error', message: `Unknown workflow: ${workflowName}` };
    }
    const handler = this.workflows[workflowName];

    const run: WorkflowRun = {
      id: newId('WF'),
      name: workflowName,
      params,
      status: 'InProgress',
      steps: [],
      startedAt: this.now(),
    };
    this.active.set(run.id, run);
    this.logger.info(`Workflow ${run.id} (${workflowName}) started`);
    this.emit('workflow:started', run);

    try {
      const results = handler(run, params);
      run.status = 'Completed';
      run.completedAt = this.now();
      this.retire(run, this.completed);
      this.logger.info(`Workflow ${run.id} completed with ${run.steps.length} step(s)`);
      this.emit('workflow:completed', run);
      return { status: 'completed', workflowId: run.id, steps: [...run.steps], results };
    } catch (err) {
      run.status = 'Failed';
      run.completedAt = this.now();
      run.error = errorMessage(err);
      this.retire(run, this.failed);
      this.logger.error(`Workflow ${run.id} failed: ${run.error}`);
      this.emit('workflow:failed', run);
      return { status: 'failed', workflowId: run.id, steps: [...run.steps], error: run.error };
    }
  }

  private isWorkflowName(name: string): name is WorkflowName {
    return WORKFLOW_NAMES.some(w => w === name);
  }

  private retire(run: WorkflowRun, history: WorkflowRun[]): void {
    this.active.delete(run.id);
    history.push(run);
    if (history.length > this.historyLimit) history.splice(0, history.length - this.historyLimit);
  }

  private step(run: WorkflowRun, stepName: string, agent: BaseAgent, result: CapabilityResult): CapabilityResult {
    const record: StepRecord = { stepName, agent: agent.name, resultStatus: result.status, timestamp: this.now() };
    run.steps.push(record);
    this.logger.debug(`Workflow ${run.id} step "${stepName}" → ${result.status}`);
    return result;
  }

  // ── Workflows ───────────────────────────────────────────

  /** IT, Finance and Compliance follow through their employee_onboarded handlers */
  private newHire(run: WorkflowRun, params: Payload): Record<string, CapabilityResult> {
    const p = NewHireParams.parse(params);
    const { hr } = this.agents;
    const result = hr.handleEmployeeOnboarding({
      name: p.name,
      email: p.email ?? defaultEmail(p.name),
      department: p.department,
      position: p.position,
      joinDate: p.joinDate,
    });
    return { 'HR Onboarding': this.step(run, 'HR Onboarding', hr, result) };
  }

  /** Runs all four steps even when one reports a domain error */
  private employeeExit(run: WorkflowRun, params: Payload): Record<string, CapabilityResult> {
    const p = EmployeeExitParams.parse(params);
    const { hr, it, finance, compliance } = this.agents;
    const results: Record<string, CapabilityResult> = {};

    results['HR Exit Processing'] = this.step(run, 'HR Exit Processing', hr,
      hr.processEmployeeExit({ employeeId: p.employee_id, exitDate: p.exit_date, reason: p.reason }));
    results['IT Access Revocation'] = this.step(run, 'IT Access Revocation', it,
      it.revokeEmployeeAccess(p.employee_id, p.reason));
    results['Finance Final Pay'] = this.step(run, 'Finance Final Pay', finance,
      finance.settleFinalPay(p.employee_id, p.exit_date));
    results['Compliance Exit Check'] = this.step(run, 'Compliance Exit Check', compliance,
      compliance.checkEmployeeCompliance(p.employee_id));
    return results;
  }

  private expenseClaim(run: WorkflowRun, params: Payload): Record<string, CapabilityResult> {
    const p = ExpenseClaimParams.parse(params);
    const { finance } = this.agents;
    const result = finance.submitExpense({
      employeeId: p.employee_id,
      amount: p.amount,
      category: p.category,
      description: p.description,
      receiptUploaded: p.receipt_uploaded,
    });
    return { 'Finance Expense Processing': this.step(run, 'Finance Expense Processing', finance, result) };
  }

  private securityIncident(run: WorkflowRun, params: Payload): Record<string, CapabilityResult> {
    const p = SecurityIncidentParams.parse(params);
    const { it, compliance } = this.agents;
    const summary = `${p.incident_type}: ${p.description}`;

    const scan = this.step(run, 'IT Security Scan', it, it.monitorSecurity(summary));
    const review = this.step(run, 'Compliance Review', compliance,
      compliance.flagAnomaly(summary, p.severity, p.employee_id, 'Security Incident Workflow'));
    return { 'IT Security Scan': scan, 'Compliance Review': review };
  }

  // ── Escalations ─────────────────────────────────────────

  getEscalationQueue(): EscalationEntry[] {
    return this.escalations.pending();
  }

  /**
   * Human review of an escalated decision. A differing admin decision is
   * recorded as an override in the deciding agent's learning store.
   */
  resolveEscalation(id: string, resolution: EscalationResolution): EscalationEntry | null {
    const entry = this.escalations.get(id);
    if (!entry || entry.state === 'resolved') return null;

    const agent = this.roster().find(a => a.name === entry.agent);
    const learning = agent?.getLearningStore();
    if (learning && entry.decisionId && !learning.getDecision(entry.decisionId)) {
      this.logger.warn(`Escalation ${id}: decision ${entry.decisionId} is no longer in ${entry.agent}'s history; resolving without a learning update`);
    } else if (learning && entry.decisionId) {
      if (resolution.adminDecision !== entry.decisionAttempt) {
        learning.recordOverride(entry.decisionId, entry.decisionAttempt, resolution.adminDecision, resolution.reason);
      } else {
        learning.updateOutcome(entry.decisionId, 'confirmed');
      }
    }
    return this.escalations.resolve(id, resolution);
  }

  // ── State Queries ───────────────────────────────────────

  getAllAgentStatuses(): Record<AgentKey, AgentStatusSummary> {
    return {
      hr: this.agents.hr.getStatus(),
      it: this.agents.it.getStatus(),
      finance: this.agents.finance.getStatus(),
      compliance: this.agents.compliance.getStatus(),
    };
  }

  getAgent(key: string): BaseAgent | null {
    return isAgentKey(key) ? this.agents[key] : null;
  }

  getWorkflow(id: string): WorkflowRun | null {
    return this.active.get(id)
      ?? this.completed.find(w => w.id === id)
      ?? this.failed.find(w => w.id === id)
      ?? null;
  }

  getActiveWorkflows(): WorkflowRun[] {
    return [...this.active.values()];
  }

  getCompletedWorkflows(limit = 20): WorkflowRun[] {
    return limit > 0 ? this.completed.slice(-limit) : [];
  }

  getFailedWorkflows(limit = 20): WorkflowRun[] {
    return limit > 0 ? this.failed.slice(-limit) : [];
  }

  getEventLog(limit = 50): DomainEvent[] {
    return this.bus.getEventLog(limit);
  }

  getGoalReport(): Record<string, GoalReportEntry[]> {
    for (const agent of this.roster()) agent.refreshGoals();
    return this.goals.getReport();
  }
}
