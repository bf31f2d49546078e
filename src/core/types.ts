// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Core Type Definitions
// Shared contracts for agents, decisions, workflows and results
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';

// ── Agent Identity ──────────────────────────────────────────

export const AGENT_KEYS = ['hr', 'it', 'finance', 'compliance'] as const;

export type AgentKey = (typeof AGENT_KEYS)[number];

export const AGENT_NAMES: Record<AgentKey, string> = {
  hr: 'HR Agent',
  it: 'IT Agent',
  finance: 'Finance Agent',
  compliance: 'Compliance Agent',
};

export function isAgentKey(value: string): value is AgentKey {
  return AGENT_KEYS.some(k => k === value);
}

export type AgentStatus = 'active' | 'degraded';

export interface AgentStatusSummary {
  name: string;
  capabilities: string[];
  decisionsMade: number;
  status: AgentStatus;
}

// ── Capability Results ──────────────────────────────────────

export type Payload = Record<string, unknown>;

export type CapabilitySuccess<T extends object = object> = { status: 'success' } & T;

export interface CapabilityError {
  status: 'error';
  message: string;
}

export type CapabilityResult<T extends object = object> = CapabilitySuccess<T> | CapabilityError;

export function ok<T extends object>(data: T): CapabilitySuccess<T> {
  return { status: 'success', ...data };
}

/** `extra` carries domain fields an error reply still reports, such as a decision */
export function fail(message: string, extra: Payload = {}): CapabilityError {
  return { ...extra, status: 'error', message };
}

export function isSuccess<T extends object>(result: CapabilityResult<T>): result is CapabilitySuccess<T> {
  return result.status === 'success';
}

// ── Capability Definitions ──────────────────────────────────

export interface CapabilityDefinition {
  name: string;
  description: string;
  parameters: string;
  inputSchema: z.ZodType;
  execute: (input: unknown) => Promise<CapabilityResult>;
}

// ── Decisions ───────────────────────────────────────────────

export interface Decision {
  action: string;
  reasoning: string;
  confidence: number; // 0-1
}

export const PlanStepSchema = z.object({
  tool: z.string(),
  parameters: z.record(z.string(), z.unknown()).default({}),
});

export const ReasoningPlanSchema = z.object({
  reasoning: z.string().default(''),
  confidence: z.coerce.number().min(0).max(1).default(0.7),
  steps: z.array(PlanStepSchema).default([]),
  direct_response: z.string().nullable().optional(),
});

export type PlanStep = z.infer<typeof PlanStepSchema>;
export type ReasoningPlan = z.infer<typeof ReasoningPlanSchema>;

export type DecisionOutcome = 'success' | 'partial_failure' | 'escalated' | 'confirmed' | 'overridden';

export interface StepExecution {
  tool: string;
  parameters: Payload;
  success: boolean;
  result: CapabilityResult;
}

export type RequestResponse =
  | {
      status: 'success';
      agent: string;
      response: string;
      reasoning: string;
      confidence: number;
      actionsTaken: StepExecution[];
      decisionId: string;
    }
  | {
      status: 'escalated';
      agent: string;
      response: string;
      reasoning: string;
      confidence: number;
      escalationId: string;
      decisionId: string;
    };

// ── Escalation ──────────────────────────────────────────────

export type EscalationState = 'pending' | 'resolved';

export interface EscalationEntry {
  id: string;
  agent: string;
  decisionId: string | null;
  task: string;
  context: Payload;
  decisionAttempt: string;
  confidence: number;
  timestamp: Date;
  state: EscalationState;
  resolution?: {
    adminDecision: string;
    reason: string;
    reviewer: string;
    resolvedAt: Date;
  };
}

// ── Workflows ───────────────────────────────────────────────

export const WORKFLOW_NAMES = ['new_hire', 'employee_exit', 'expense_claim', 'security_incident'] as const;

export type WorkflowName = (typeof WORKFLOW_NAMES)[number];

export type WorkflowStatus = 'InProgress' | 'Completed' | 'Failed';

export interface StepRecord {
  stepName: string;
  agent: string;
  resultStatus: string;
  timestamp: Date;
}

export interface WorkflowRun {
  id: string;
  name: WorkflowName;
  params: Payload;
  status: WorkflowStatus;
  steps: StepRecord[];
  startedAt: Date;
  completedAt?: Date;
  error?: string;
}

export type WorkflowOutcome =
  | { status: 'completed'; workflowId: string; steps: StepRecord[]; results: Record<string, CapabilityResult> }
  | { status: 'failed'; workflowId: string; steps: StepRecord[]; error: string }
  | { status: 'error'; message: string };

// ── Routing ─────────────────────────────────────────────────

export interface RoutingDecision {
  agent: AgentKey;
  reasoning: string;
}

// ── Logger ──────────────────────────────────────────────────

export interface LoggerHandle {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
