// ═══════════════════════════════════════════════════════════════
// Agents :: Base Agent
// Capability registry, event reactions, audit sink and the
// perceive → plan → gate → act → respond → learn loop
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { AuditEntry, AuditTrail } from '../protocols/audit-trail.js';
import type { EscalationQueue } from '../protocols/escalation.js';
import type { EventBus } from '../core/event-bus.js';
import { isDomainEventType, type DomainEventType } from '../core/events.js';
import type { LanguageModel } from '../core/llm-service.js';
import type { GoalTracker } from '../learning/goal-tracker.js';
import type { LearningStore } from '../learning/learning-store.js';
import type { EntityStore } from '../store/entity-store.js';
import type { Policy } from '../store/schemas.js';
import {
  AGENT_NAMES, ReasoningPlanSchema, errorMessage, fail, ok,
  type AgentKey, type AgentStatusSummary, type CapabilityDefinition, type CapabilityResult,
  type Decision, type LoggerHandle, type Payload, type ReasoningPlan, type RequestResponse,
  type StepExecution,
} from '../core/types.js';

export interface AgentDeps {
  store: EntityStore;
  bus: EventBus;
  audit: AuditTrail;
  llm: LanguageModel;
  learning: LearningStore;
  escalations: EscalationQueue;
  goals: GoalTracker;
  logger: LoggerHandle;
  now?: () => Date;
}

const NO_TOOL = 'no_tool_needed';

/** What the agent knows before planning; persisted with the decision */
export type Perception = {
  agent: string;
  availableTools: string[];
  timestamp: string;
  employee?: Payload;
  similarPastDecisions?: Payload[];
  domain: Payload;
};

export abstract class BaseAgent {
  readonly key: AgentKey;
  readonly name: string;

  /** Event types this agent reacts to, wired onto the bus by the composition root */
  abstract readonly subscriptions: readonly DomainEventType[];

  protected store: EntityStore;
  protected bus: EventBus;
  protected audit: AuditTrail;
  protected llm: LanguageModel;
  protected learning: LearningStore;
  protected escalations: EscalationQueue;
  protected goals: GoalTracker;
  protected logger: LoggerHandle;
  protected now: () => Date;

  private capabilities: Map<string, CapabilityDefinition> = new Map();
  private decisionsMade = 0;

  constructor(key: AgentKey, deps: AgentDeps) {
    this.key = key;
    this.name = AGENT_NAMES[key];
    this.store = deps.store;
    this.bus = deps.bus;
    this.audit = deps.audit;
    this.llm = deps.llm;
    this.learning = deps.learning;
    this.escalations = deps.escalations;
    this.goals = deps.goals;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  // ── Capability Registry ─────────────────────────────────

  protected registerCapability<S extends z.ZodTypeAny>(
    name: string,
    description: string,
    parameters: string,
    inputSchema: S,
    run: (input: z.output<S>) => CapabilityResult | Promise<CapabilityResult>,
  ): void {
    this.capabilities.set(name, {
      name,
      description,
      parameters,
      inputSchema,
      execute: async (input: unknown) => run(inputSchema.parse(input)),
    });
  }

  getCapabilities(): string[] {
    return [...this.capabilities.keys()];
  }

  getCapabilityDefinitions(): CapabilityDefinition[] {
    return [...this.capabilities.values()];
  }

  describeCapabilities(): string {
    return this.getCapabilityDefinitions()
      .map(c => `- ${c.name}(${c.parameters})\n  Description: ${c.description}`)
      .join('\n');
  }

  /** Validate and run one capability by name; never throws */
  async invokeCapability(name: string, params: unknown): Promise<CapabilityResult> {
    const capability = this.capabilities.get(name);
    if (!capability) return fail(`Capability '${name}' not found on ${this.name}`);

    const parsed = capability.inputSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
      return fail(`Invalid parameters for ${name}: ${issues}`);
    }

    try {
      return await capability.execute(parsed.data);
    } catch (err) {
      this.logger.error(`${this.name} capability ${name} threw: ${errorMessage(err)}`);
      return fail(errorMessage(err));
    }
  }

  // ── Events ──────────────────────────────────────────────

  /** Entry point for bus deliveries. Unknown or unsubscribed types are ignored. */
  handleEvent(eventType: string, payload: Payload): void {
    if (!isDomainEventType(eventType) || !this.subscriptions.includes(eventType)) return;
    this.onEvent(eventType, payload);
  }

  protected abstract onEvent(eventType: DomainEventType, payload: Payload): void;

  protected publish(eventType: DomainEventType, payload: Payload): void {
    this.bus.publish(eventType, payload, this.name);
  }

  // ── Audit ───────────────────────────────────────────────

  logAction(action: string, details: Payload, user = 'System'): AuditEntry {
    return this.audit.record(this.name, action, details, user);
  }

  // ── Status ──────────────────────────────────────────────

  getStatus(): AgentStatusSummary {
    return {
      name: this.name,
      capabilities: this.getCapabilities(),
      decisionsMade: this.decisionsMade,
      status: this.llm.isAvailable() ? 'active' : 'degraded',
    };
  }

  getLearningStore(): LearningStore {
    return this.learning;
  }

  /** Recompute this agent's KPI actuals from the store */
  refreshGoals(): void {
    // agents with measurable goals override this
  }

  // ── Autonomous Decision ─────────────────────────────────

  async decide(task: string, context: Payload = {}): Promise<Decision> {
    const plan = await this.reasonAndPlan(task, this.perceive(task, context));
    return this.toDecision(plan);
  }

  /** Full reasoning loop for a free-text request */
  async processRequest(message: string, context: Payload = {}): Promise<RequestResponse> {
    const perception = this.perceive(message, context);
    const plan = await this.reasonAndPlan(message, perception);
    const decision = this.toDecision(plan);

    // ── Confidence gate ──
    if (!plan || this.escalations.requiresEscalation(decision.confidence)) {
      const record = this.learning.recordDecision(message, { perception }, decision.action, decision.confidence, 'escalated');
      const entry = this.escalations.escalate({
        agent: this.name,
        decisionId: record.id,
        task: message,
        context,
        decisionAttempt: decision.action,
        confidence: decision.confidence,
      });

      const response = plan
        ? `I've analyzed your request but I'm not confident enough to act autonomously ` +
          `(confidence: ${Math.round(decision.confidence * 100)}%). My reasoning: ${decision.reasoning}\n\n` +
          'This has been escalated for human review.'
        : this.fallbackText();

      return {
        status: 'escalated',
        agent: this.name,
        response,
        reasoning: decision.reasoning,
        confidence: decision.confidence,
        escalationId: entry.id,
        decisionId: record.id,
      };
    }

    // ── Act ──
    const actions: StepExecution[] = [];
    for (const step of plan.steps) {
      if (step.tool === NO_TOOL) continue;
      const result = await this.invokeCapability(step.tool, step.parameters);
      actions.push({ tool: step.tool, parameters: step.parameters, success: result.status !== 'error', result });
    }

    const response = await this.respond(message, plan.reasoning, actions, plan.direct_response ?? '');

    // ── Learn ──
    const outcome = actions.every(a => a.success) ? 'success' : 'partial_failure';
    const record = this.learning.recordDecision(
      message,
      { perception, reasoning: plan.reasoning, toolsUsed: actions.map(a => a.tool) },
      decision.action,
      decision.confidence,
      outcome,
    );
    this.decisionsMade++;
    this.refreshGoals();

    return {
      status: 'success',
      agent: this.name,
      response,
      reasoning: plan.reasoning,
      confidence: decision.confidence,
      actionsTaken: actions,
      decisionId: record.id,
    };
  }

  // ── Perceive ──

  protected perceive(message: string, context: Payload): Perception {
    const perception: Perception = {
      agent: this.name,
      availableTools: this.getCapabilities(),
      timestamp: this.now().toISOString(),
      domain: this.domainContext(message, context),
    };

    const employeeId = context.employee_id;
    if (typeof employeeId === 'string') {
      const emp = this.store.employees.get(employeeId);
      if (emp) {
        perception.employee = {
          id: emp.employeeId,
          name: emp.name,
          department: emp.department,
          position: emp.position,
          email: emp.email,
          leaveBalance: emp.leaveBalance,
        };
      }
    }

    const past = this.learning.getRelevantExamples(message, 3);
    if (past.length > 0) {
      perception.similarPastDecisions = past.map(d => ({
        task: d.task,
        decision: d.decision,
        confidence: d.confidence,
        outcome: d.outcome,
      }));
    }

    return perception;
  }

  /** Domain-specific facts added to the planning prompt */
  protected domainContext(_message: string, _context: Payload): Payload {
    return {};
  }

  // ── Plan ──

  protected buildPlanPrompt(message: string, perception: Perception): string {
    const sections: string[] = [];
    if (perception.employee) {
      sections.push(`Employee Context:\n  ${JSON.stringify(perception.employee)}`);
    }
    if (perception.similarPastDecisions) {
      sections.push(`Similar Past Decisions (learn from these):\n  ${JSON.stringify(perception.similarPastDecisions)}`);
    }
    if (Object.keys(perception.domain).length > 0) {
      sections.push(`Additional Context:\n  ${JSON.stringify(perception.domain)}`);
    }

    return `You are ${this.name}, an autonomous agent in an enterprise system.

TASK: Analyze the user's request and decide what action(s) to take.

USER REQUEST: "${message}"

${sections.join('\n\n')}

AVAILABLE TOOLS:
${this.describeCapabilities()}

Return ONLY a valid JSON object in this exact format:
{
  "reasoning": "why you chose this action",
  "confidence": 0.85,
  "steps": [{"tool": "tool_name", "parameters": {"param": "value"}}],
  "direct_response": "conversational answer when no tool is needed"
}

RULES:
- Parameter values must be concrete, extracted from the message or context, never placeholders
- If information is missing and cannot be inferred, set confidence low and say why in reasoning
- Dates use YYYY-MM-DD
- For purely informational requests use tool "${NO_TOOL}" with empty parameters`;
  }

  protected async reasonAndPlan(message: string, perception: Perception): Promise<ReasoningPlan | null> {
    const raw = await this.llm.generateStructured(this.buildPlanPrompt(message, perception));
    const plan = parsePlan(raw);
    if (!plan) this.logger.warn(`${this.name} could not parse plan: ${raw.slice(0, 200)}`);
    return plan;
  }

  protected toDecision(plan: ReasoningPlan | null): Decision {
    if (!plan) {
      return { action: 'escalate', reasoning: 'The plan could not be parsed', confidence: 0 };
    }
    const tools = plan.steps.map(s => s.tool).filter(t => t !== NO_TOOL);
    return {
      action: tools.length > 0 ? tools.join(' → ') : 'respond',
      reasoning: plan.reasoning,
      confidence: plan.confidence,
    };
  }

  // ── Respond ──

  protected async respond(message: string, reasoning: string, actions: StepExecution[], directResponse: string): Promise<string> {
    if (actions.length === 0 && directResponse) return directResponse;

    if (!this.llm.isAvailable()) {
      return actions.length > 0 && actions.every(a => a.success)
        ? `Done. I've processed your request. ${reasoning}`.trim()
        : `I attempted to process your request but encountered an issue. ${reasoning}`.trim();
    }

    const summary = actions.map(a => {
      const result = JSON.stringify(a.result);
      return `Outcome: ${a.success ? 'ok' : 'failed'} | Result: ${result.length > 500 ? result.slice(0, 500) + '...' : result}`;
    });

    const prompt = `You are ${this.name}. You just processed a user's request.

ORIGINAL REQUEST: "${message}"

YOUR REASONING: ${reasoning}

ACTIONS TAKEN AND RESULTS:
${summary.length > 0 ? summary.join('\n') : 'No actions taken.'}

Write a clear, concise reply for the user covering what was done, relevant IDs, dates and amounts, and next steps if something failed.
Do not mention tool names or internal system details.`;

    return this.llm.generate(prompt, { systemPrompt: `You are a helpful ${this.name} assistant. Respond naturally and concisely.` });
  }

  protected fallbackText(): string {
    return `I can help you with the following: ${this.getCapabilities().join(', ')}. ` +
      'Could you please rephrase your request with more details?';
  }

  // ── Policy Q&A ──────────────────────────────────────────

  /** Answer a question grounded on the stored policies of one domain */
  async askPolicy(
    question: string,
    domain: AgentKey = this.key,
    includeDirectory = false,
  ): Promise<CapabilityResult<{ question: string; answer: string }>> {
    if (!question.trim()) return fail('Question must not be empty');
    const policies = this.store.policies.list({ domain });
    const answer = await this.llm.generate(question, {
      systemPrompt: policyPrompt(this.name, policies),
      includeDirectory,
    });
    return ok({ question, answer });
  }
}

function policyPrompt(agentName: string, policies: Policy[]): string {
  const text = policies.map(p => `=== ${p.policyId.toUpperCase()} ===\n${p.text}`).join('\n\n');
  return `You are a ${agentName} assistant helping with company policies.\n\n` +
    `Policies:\n${text}\n\nAnswer professionally and concisely. If unsure, say so.`;
}

/** First JSON object in a model reply, validated as a plan */
export function parsePlan(raw: string): ReasoningPlan | null {
  const match = raw.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const parsed = ReasoningPlanSchema.safeParse(JSON.parse(match[0]));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
