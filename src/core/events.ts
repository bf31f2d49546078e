// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Domain Event Catalogue
// Closed set of event types exchanged between agents
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { Payload } from './types.js';

export const DOMAIN_EVENTS = [
  // HR
  'employee_onboarded',
  'employee_exited',
  'leave_processed',
  'new_candidate_applied',
  'candidate_evaluated',
  // IT
  'ticket_created',
  'ticket_resolved',
  'access_provisioned',
  'access_revoked',
  'security_incident',
  // Finance
  'expense_submitted',
  'expense_approved',
  'payroll_processed',
  'payroll_setup_complete',
  'budget_alert',
  'reimbursement_processed',
  'final_pay_settled',
  // Compliance
  'violation_reported',
  'violation_resolved',
  'training_scheduled',
  'training_overdue',
  'compliance_verified',
] as const;

export type DomainEventType = (typeof DOMAIN_EVENTS)[number];

export const DomainEventTypeSchema = z.enum(DOMAIN_EVENTS);

export function isDomainEventType(value: string): value is DomainEventType {
  return DOMAIN_EVENTS.some(t => t === value);
}

export interface DomainEvent {
  readonly type: DomainEventType;
  readonly payload: Readonly<Payload>;
  readonly source: string;
  readonly timestamp: Date;
}

export type EventHandler = (eventType: DomainEventType, payload: Payload) => void;

// ── Payload Schemas (consumed events) ───────────────────────

export const EmployeeOnboardedSchema = z.object({
  employee_id: z.string(),
  name: z.string(),
  department: z.string(),
  position: z.string().optional(),
});

export const AccessProvisionedSchema = z.object({
  employee_id: z.string(),
  systems: z.array(z.string()),
});

export const ExpenseSubmittedSchema = z.object({
  claim_id: z.string(),
  employee_id: z.string(),
  amount: z.number(),
  category: z.string(),
  status: z.string(),
});

export const SecurityIncidentSchema = z.object({
  incident_id: z.string().optional(),
  description: z.string(),
  severity: z.string().default('High'),
  employee_id: z.string().nullable().optional(),
});

export const ViolationReportedSchema = z.object({
  violation_id: z.string(),
  violation_type: z.string(),
  severity: z.string(),
  employee_id: z.string().nullable().optional(),
});

export const CandidateAppliedSchema = z.object({
  candidate_id: z.string(),
  job_id: z.string(),
});
