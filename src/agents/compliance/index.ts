// ═══════════════════════════════════════════════════════════════
// Agent::Compliance
// Violations, mandatory training and compliance audits
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import { CONFIG } from '../../core/config.js';
import { addDays, parseIsoDate, toIsoDate } from '../../core/dates.js';
import {
  AccessProvisionedSchema, EmployeeOnboardedSchema, SecurityIncidentSchema, ViolationReportedSchema,
  type DomainEventType,
} from '../../core/events.js';
import { newId } from '../../core/ids.js';
import { fail, isSuccess, ok, type CapabilityResult, type Payload } from '../../core/types.js';
import { SEVERITIES, type ComplianceAudit, type Severity, type TrainingRecord, type Violation } from '../../store/schemas.js';
import { BaseAgent, type AgentDeps } from '../base.js';

export interface ComplianceAgentOptions {
  trainingOverdueDays?: number;
  mandatoryTrainings?: readonly string[];
}

// ── Inputs ──

const ReportViolationInput = z.object({
  violationType: z.string().min(1),
  description: z.string().min(1),
  severity: z.enum(SEVERITIES).default('Medium'),
  employeeId: z.string().optional(),
  reportedBy: z.string().default('Compliance Agent'),
});

const ViolationIdInput = z.object({ violationId: z.string().min(1) });

const ResolveViolationInput = z.object({
  violationId: z.string().min(1),
  resolution: z.string().min(1),
  dismiss: z.boolean().default(false),
});

const ScheduleTrainingInput = z.object({
  employeeId: z.string().min(1),
  trainingName: z.string().min(1),
  dueDate: z.string(),
  required: z.boolean().default(true),
});

const CompleteTrainingInput = z.object({
  recordId: z.string().min(1),
  score: z.coerce.number().min(0).max(100).optional(),
});

const TrainingStatusInput = z.object({
  recordId: z.string().optional(),
  employeeId: z.string().optional(),
});

const AuditInput = z.object({ scope: z.string().default('full') });

const EmployeeIdInput = z.object({ employeeId: z.string().min(1) });

const AnomalyInput = z.object({
  description: z.string().min(1),
  severity: z.enum(SEVERITIES).default('High'),
  employeeId: z.string().optional(),
  source: z.string().default('Security Review'),
});

const QuestionInput = z.object({ question: z.string().min(1) });

const URGENT: readonly Severity[] = ['High', 'Critical'];

function isOpen(v: Violation): boolean {
  return v.status === 'Open' || v.status === 'Under Review';
}

export class ComplianceAgent extends BaseAgent {
  readonly subscriptions: readonly DomainEventType[] = [
    'employee_onboarded', 'security_incident', 'violation_reported', 'access_provisioned',
  ];

  private trainingOverdueDays: number;
  private mandatoryTrainings: readonly string[];

  constructor(deps: AgentDeps, options: ComplianceAgentOptions = {}) {
    super('compliance', deps);
    this.trainingOverdueDays = options.trainingOverdueDays ?? CONFIG.compliance.trainingOverdueDays;
    this.mandatoryTrainings = options.mandatoryTrainings ?? CONFIG.compliance.mandatoryTrainings;

    this.registerCapability('reportViolation',
      'Record a policy violation',
      "violationType, description, severity?: 'Low'|'Medium'|'High'|'Critical', employeeId?, reportedBy?",
      ReportViolationInput, i => this.reportViolation(i));
    this.registerCapability('getViolationStatus',
      'Look up a violation',
      'violationId',
      ViolationIdInput, i => this.getViolationStatus(i.violationId));
    this.registerCapability('resolveViolation',
      'Resolve or dismiss an open violation',
      'violationId, resolution, dismiss?',
      ResolveViolationInput, i => this.resolveViolation(i.violationId, i.resolution, i.dismiss));
    this.registerCapability('scheduleTraining',
      'Assign a training with a due date',
      'employeeId, trainingName, dueDate, required?',
      ScheduleTrainingInput, i => this.scheduleTraining(i.employeeId, i.trainingName, i.dueDate, i.required));
    this.registerCapability('completeTraining',
      'Mark a training as completed',
      'recordId, score?',
      CompleteTrainingInput, i => this.completeTraining(i.recordId, i.score));
    this.registerCapability('getTrainingStatus',
      'Look up one training record or all trainings of an employee',
      'recordId? | employeeId?',
      TrainingStatusInput, i => this.getTrainingStatus(i.recordId, i.employeeId));
    this.registerCapability('runComplianceAudit',
      'Scan for overdue mandatory trainings and open violations',
      'scope?',
      AuditInput, i => this.runComplianceAudit(i.scope));
    this.registerCapability('checkEmployeeCompliance',
      'Exit clearance: outstanding trainings, violations and access',
      'employeeId',
      EmployeeIdInput, i => this.checkEmployeeCompliance(i.employeeId));
    this.registerCapability('flagAnomaly',
      'Record a suspicious finding as a violation for review',
      'description, severity?, employeeId?, source?',
      AnomalyInput, i => this.flagAnomaly(i.description, i.severity, i.employeeId, i.source));
    this.registerCapability('askCompliancePolicy',
      'Answer compliance policy questions',
      'question',
      QuestionInput, i => this.askCompliancePolicy(i.question));
  }

  // ── Events ──

  protected onEvent(eventType: DomainEventType, payload: Payload): void {
    switch (eventType) {
      case 'employee_onboarded': {
        const parsed = EmployeeOnboardedSchema.safeParse(payload);
        if (parsed.success) this.scheduleMandatoryTraining(parsed.data.employee_id);
        else this.logger.warn(`Compliance Agent ignored malformed employee_onboarded: ${parsed.error.message}`);
        break;
      }
      case 'security_incident': {
        const parsed = SecurityIncidentSchema.safeParse(payload);
        if (!parsed.success) {
          this.logger.warn(`Compliance Agent ignored malformed security_incident: ${parsed.error.message}`);
          break;
        }
        const result = this.reportViolation({
          violationType: 'Security',
          description: parsed.data.description,
          severity: 'High',
          employeeId: parsed.data.employee_id ?? undefined,
          reportedBy: 'SYSTEM',
        });
        if (!isSuccess(result)) this.logger.warn(`Security incident not recorded: ${result.message}`);
        break;
      }
      case 'violation_reported': {
        const parsed = ViolationReportedSchema.safeParse(payload);
        if (!parsed.success) {
          this.logger.warn(`Compliance Agent ignored malformed violation_reported: ${parsed.error.message}`);
          break;
        }
        if (URGENT.some(s => s === parsed.data.severity)) {
          this.logAction('Urgent Violation Alert', {
            violationId: parsed.data.violation_id,
            violationType: parsed.data.violation_type,
            severity: parsed.data.severity,
          });
        }
        break;
      }
      case 'access_provisioned': {
        const parsed = AccessProvisionedSchema.safeParse(payload);
        if (parsed.success) {
          this.logAction('Access Review', { employeeId: parsed.data.employee_id, systems: parsed.data.systems });
        } else {
          this.logger.warn(`Compliance Agent ignored malformed access_provisioned: ${parsed.error.message}`);
        }
        break;
      }
      default:
        break;
    }
  }

  private scheduleMandatoryTraining(employeeId: string): void {
    const due = toIsoDate(addDays(this.now(), this.trainingOverdueDays));
    for (const training of this.mandatoryTrainings) {
      const result = this.scheduleTraining(employeeId, training, due, true);
      if (!isSuccess(result)) this.logger.debug(`Mandatory ${training} for ${employeeId} not scheduled: ${result.message}`);
    }
  }

  protected domainContext(): Payload {
    return {
      openViolations: this.store.violations.filter(isOpen).length,
      mandatoryTrainings: [...this.mandatoryTrainings],
    };
  }

  refreshGoals(): void {
    this.goals.recordMetric(this.name, 'Policy violations', this.store.violations.filter(isOpen).length);

    const trainings = this.store.trainings.list();
    if (trainings.length > 0) {
      const completed = trainings.filter(t => t.status === 'Completed').length;
      this.goals.recordMetric(this.name, 'Training completion', Math.round((completed / trainings.length) * 10000) / 100);
    }
  }

  // ── Violations ────────────────────────────────────────────

  reportViolation(input: z.output<typeof ReportViolationInput>): CapabilityResult<{ violationId: string; severity: Severity }> {
    if (input.employeeId && !this.store.employees.get(input.employeeId)) return fail('Employee not found');

    const violation = this.store.violations.put({
      violationId: newId('VIO'),
      violationType: input.violationType,
      employeeId: input.employeeId ?? null,
      description: input.description,
      severity: input.severity,
      detectedDate: this.now().toISOString(),
      detectedBy: input.reportedBy,
      status: 'Open',
      resolution: null,
      resolvedDate: null,
    });

    this.publish('violation_reported', {
      violation_id: violation.violationId,
      violation_type: violation.violationType,
      severity: violation.severity,
      employee_id: violation.employeeId,
    });
    this.logAction('Report Violation', { violationId: violation.violationId, severity: violation.severity }, input.reportedBy);
    return ok({ violationId: violation.violationId, severity: violation.severity });
  }

  getViolationStatus(violationId: string): CapabilityResult<{ violation: Violation }> {
    const violation = this.store.violations.get(violationId);
    return violation ? ok({ violation }) : fail('Violation not found');
  }

  resolveViolation(violationId: string, resolution: string, dismiss = false): CapabilityResult<{ violationId: string; outcome: Violation['status'] }> {
    const violation = this.store.violations.get(violationId);
    if (!violation) return fail('Violation not found');
    if (!isOpen(violation)) return fail(`Violation ${violationId} is already ${violation.status}`);

    const outcome: Violation['status'] = dismiss ? 'Dismissed' : 'Resolved';
    this.store.violations.put({ ...violation, status: outcome, resolution, resolvedDate: this.now().toISOString() });
    this.publish('violation_resolved', { violation_id: violationId, outcome });
    this.logAction('Resolve Violation', { violationId, outcome, resolution });
    return ok({ violationId, outcome });
  }

  flagAnomaly(description: string, severity: Severity = 'High', employeeId?: string, source = 'Security Review'): CapabilityResult<{ violationId: string; severity: Severity }> {
    const result = this.reportViolation({ violationType: 'Anomaly', description, severity, employeeId, reportedBy: source });
    if (isSuccess(result)) this.logAction('Flag Anomaly', { violationId: result.violationId, source });
    return result;
  }

  // ── Training ──────────────────────────────────────────────

  scheduleTraining(employeeId: string, trainingName: string, dueDate: string, required = true): CapabilityResult<{
    recordId: string;
    trainingName: string;
    dueDate: string;
  }> {
    const employee = this.store.employees.get(employeeId);
    if (!employee) return fail('Employee not found');
    if (!parseIsoDate(dueDate)) return fail('Invalid due date, expected YYYY-MM-DD');

    const duplicate = this.store.trainings.list({ employeeId, trainingName })
      .some(t => t.status !== 'Completed');
    if (duplicate) return fail(`${trainingName} is already scheduled for ${employeeId}`);

    const record = this.store.trainings.put({
      recordId: newId('TRN'),
      employeeId,
      trainingName,
      required,
      status: 'Not Started',
      dueDate,
      completedDate: null,
      score: null,
    });

    this.publish('training_scheduled', { employee_id: employeeId, training_name: trainingName, due_date: dueDate, record_id: record.recordId });
    this.logAction('Schedule Training', { recordId: record.recordId, trainingName, dueDate }, employeeId);
    return ok({ recordId: record.recordId, trainingName, dueDate });
  }

  completeTraining(recordId: string, score?: number): CapabilityResult<{ recordId: string; completedDate: string }> {
    const record = this.store.trainings.get(recordId);
    if (!record) return fail('Training not found');
    if (record.status === 'Completed') return fail(`Training ${recordId} is already completed`);

    const completedDate = toIsoDate(this.now());
    this.store.trainings.put({ ...record, status: 'Completed', completedDate, score: score ?? null });
    this.logAction('Complete Training', { recordId, trainingName: record.trainingName, score: score ?? null }, record.employeeId);
    return ok({ recordId, completedDate });
  }

  getTrainingStatus(recordId?: string, employeeId?: string): CapabilityResult<{ trainings: TrainingRecord[] }> {
    if (recordId) {
      const record = this.store.trainings.get(recordId);
      return record ? ok({ trainings: [record] }) : fail('Training not found');
    }
    if (employeeId) return ok({ trainings: this.store.trainings.list({ employeeId }) });
    return fail('Provide recordId or employeeId');
  }

  // ── Audits ────────────────────────────────────────────────

  runComplianceAudit(scope = 'full'): CapabilityResult<{
    auditId: string;
    complianceStatus: ComplianceAudit['status'];
    findingsCount: number;
    findings: string[];
    score: number;
  }> {
    const today = toIsoDate(this.now());
    const findings: string[] = [];

    const overdue = this.store.trainings.filter(t => t.required && t.status !== 'Completed' && t.dueDate < today)
      .filter(t => this.store.employees.get(t.employeeId)?.status === 'Active');
    for (const t of overdue) {
      findings.push(`Overdue training: ${t.trainingName} for ${t.employeeId}`);
      if (t.status !== 'Overdue') this.store.trainings.put({ ...t, status: 'Overdue' });
    }

    const openViolations = this.store.violations.filter(isOpen);
    if (openViolations.length > 0) findings.push(`${openViolations.length} open violation(s)`);

    const complianceStatus: ComplianceAudit['status'] = findings.length === 0 ? 'COMPLIANT' : 'ISSUES_FOUND';
    const audit = this.store.audits.put({
      auditId: newId('AUD'),
      auditDate: this.now().toISOString(),
      scope,
      status: complianceStatus,
      findings,
      score: Math.max(0, 100 - findings.length * 10),
    });

    for (const t of overdue) {
      this.publish('training_overdue', { employee_id: t.employeeId, training_name: t.trainingName, due_date: t.dueDate, record_id: t.recordId });
    }
    if (complianceStatus === 'COMPLIANT') {
      this.publish('compliance_verified', { audit_id: audit.auditId, scope });
    }

    this.logAction('Run Compliance Audit', { auditId: audit.auditId, complianceStatus, findingsCount: findings.length });
    return ok({ auditId: audit.auditId, complianceStatus, findingsCount: findings.length, findings, score: audit.score });
  }

  checkEmployeeCompliance(employeeId: string): CapabilityResult<{ employeeId: string; clearance: 'CLEARED' | 'ISSUES_FOUND'; issues: string[] }> {
    const employee = this.store.employees.get(employeeId);
    if (!employee) return fail('Employee not found');

    const issues: string[] = [];
    const pendingTrainings = this.store.trainings.list({ employeeId }).filter(t => t.required && t.status !== 'Completed');
    if (pendingTrainings.length > 0) issues.push(`${pendingTrainings.length} mandatory training(s) not completed`);

    const openViolations = this.store.violations.list({ employeeId }).filter(isOpen);
    if (openViolations.length > 0) issues.push(`${openViolations.length} open violation(s)`);

    const activeAccess = this.store.accessRecords.list({ employeeId, status: 'Active' });
    if (activeAccess.length > 0) issues.push(`Active access still held: ${activeAccess.map(a => a.system).join(', ')}`);

    const clearance: 'CLEARED' | 'ISSUES_FOUND' = issues.length === 0 ? 'CLEARED' : 'ISSUES_FOUND';
    this.logAction('Exit Compliance Check', { clearance, issues }, employeeId);
    return ok({ employeeId, clearance, issues });
  }

  // ── Policy ────────────────────────────────────────────────

  async askCompliancePolicy(question: string): Promise<CapabilityResult<{ question: string; answer: string }>> {
    const result = await this.askPolicy(question, 'compliance');
    if (isSuccess(result)) this.logAction('Compliance Policy Question', { question });
    return result;
  }
}
