// ═══════════════════════════════════════════════════════════════
// Agent::HR
// Leave, onboarding and exit, policy Q&A, audit reports, hiring
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import { CONFIG } from '../../core/config.js';
import { addDays, daysBetween, inclusiveDays, parseIsoDate, rangesOverlap, toIsoDate } from '../../core/dates.js';
import { CandidateAppliedSchema, type DomainEventType } from '../../core/events.js';
import { newId, sequentialId } from '../../core/ids.js';
import { errorMessage, fail, isSuccess, ok, type CapabilityResult, type Payload } from '../../core/types.js';
import { LEAVE_TYPES, type Candidate, type CandidateEvaluation, type Employee, type LeaveRequest } from '../../store/schemas.js';
import { BaseAgent, type AgentDeps } from '../base.js';
import {
  NOT_SPECIFIED, fallbackParseResume, loadResumeKeywords, scoreCandidate,
  type ParsedResume, type ResumeKeywords, type ScoringRules,
} from './resume.js';

export interface HRAgentOptions {
  leaveAutoApproveMaxDays?: number;
  auditPendingDays?: number;
  candidateAcceptThreshold?: number;
  candidateReviewThreshold?: number;
  resumeKeywords?: ResumeKeywords;
}

// ── Inputs ──

const LeaveInput = z.object({
  employeeId: z.string().min(1),
  leaveType: z.enum(LEAVE_TYPES),
  startDate: z.string(),
  endDate: z.string(),
  reason: z.string().default(''),
});

const OnboardingInput = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  department: z.string().min(1),
  position: z.string().min(1),
  joinDate: z.string().optional(),
});

const ExitInput = z.object({
  employeeId: z.string().min(1),
  exitDate: z.string().optional(),
  reason: z.string().default(''),
});

const PolicyQuestionInput = z.object({
  question: z.string().min(1),
  employeeId: z.string().default('GUEST'),
});

const AuditReportInput = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
});

const ApplicationInput = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  phone: z.string().default(''),
  jobId: z.string().min(1),
  resumeText: z.string().min(1),
});

const EvaluateInput = z.object({
  candidateId: z.string().min(1),
  jobId: z.string().optional(),
});

const ResumeInput = z.object({ resumeText: z.string().min(1) });

const LlmResumeSchema = z.object({
  skills: z.array(z.string()).default([]),
  experience_years: z.coerce.number().int().nonnegative().default(0),
  education: z.string().default(NOT_SPECIFIED),
});

const ONBOARDING_DOCUMENTS = [
  'Employee Handbook', 'Company Policies', 'IT Security Guidelines', 'Benefits Information', 'Tax Forms',
];

const POLICY_TAGS: Array<{ policy: string; words: string[] }> = [
  { policy: 'Leave Policy', words: ['leave', 'vacation', 'time off'] },
  { policy: 'Onboarding Policy', words: ['onboard', 'joining', 'new employee'] },
  { policy: 'Working Hours Policy', words: ['hours', 'timing', 'schedule', 'remote'] },
  { policy: 'Code of Conduct', words: ['conduct', 'behavior', 'dress'] },
];

export class HRAgent extends BaseAgent {
  readonly subscriptions: readonly DomainEventType[] = ['new_candidate_applied'];

  private leaveMaxDays: number;
  private auditPendingDays: number;
  private scoring: ScoringRules;
  private keywords: ResumeKeywords;

  constructor(deps: AgentDeps, options: HRAgentOptions = {}) {
    super('hr', deps);
    this.leaveMaxDays = options.leaveAutoApproveMaxDays ?? CONFIG.hr.leaveAutoApproveMaxDays;
    this.auditPendingDays = options.auditPendingDays ?? CONFIG.hr.auditPendingDays;
    this.keywords = options.resumeKeywords ?? loadResumeKeywords();
    this.scoring = {
      acceptThreshold: options.candidateAcceptThreshold ?? CONFIG.hr.candidateAcceptThreshold,
      reviewThreshold: options.candidateReviewThreshold ?? CONFIG.hr.candidateReviewThreshold,
      experiencePenalty: CONFIG.hr.experiencePenalty,
      educationPenalty: CONFIG.hr.educationPenalty,
      education: this.keywords.education,
    };

    this.registerCapability('processLeaveRequest',
      'Submit a leave request; auto-approves short leave within balance',
      'employeeId, leaveType, startDate, endDate, reason',
      LeaveInput, i => this.processLeaveRequest(i));
    this.registerCapability('handleEmployeeOnboarding',
      'Create an employee record and start onboarding',
      'name, email, department, position, joinDate?',
      OnboardingInput, i => this.handleEmployeeOnboarding(i));
    this.registerCapability('processEmployeeExit',
      'Mark an employee as exited',
      'employeeId, exitDate?, reason?',
      ExitInput, i => this.processEmployeeExit(i));
    this.registerCapability('askHrPolicyQuestion',
      'Answer HR policy or employee directory questions',
      'question, employeeId?',
      PolicyQuestionInput, i => this.askHrPolicyQuestion(i.question, i.employeeId));
    this.registerCapability('generateAuditReport',
      'Summarize HR activity in a date window and check pending leave',
      'startDate?, endDate?',
      AuditReportInput, i => this.generateAuditReport(i.startDate, i.endDate));
    this.registerCapability('submitApplication',
      'Register a job application from resume text',
      'name, email, phone?, jobId, resumeText',
      ApplicationInput, i => this.submitApplication(i));
    this.registerCapability('evaluateCandidate',
      'Score a candidate against a job opening',
      'candidateId, jobId?',
      EvaluateInput, i => this.evaluateCandidate(i.candidateId, i.jobId));
    this.registerCapability('parseResumeText',
      'Extract skills, experience and education from resume text',
      'resumeText',
      ResumeInput, async i => ok({ ...(await this.parseResume(i.resumeText)) }));
  }

  // ── Events ──

  protected onEvent(eventType: DomainEventType, payload: Payload): void {
    if (eventType !== 'new_candidate_applied') return;

    const parsed = CandidateAppliedSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(`HR Agent ignored malformed new_candidate_applied: ${parsed.error.message}`);
      return;
    }
    const result = this.evaluateCandidate(parsed.data.candidate_id, parsed.data.job_id);
    if (!isSuccess(result)) {
      this.logger.warn(`Auto-evaluation of ${parsed.data.candidate_id} failed: ${result.message}`);
    }
  }

  protected domainContext(): Payload {
    return {
      openPositions: this.store.jobPositions.list({ status: 'Active' }).map(j => `${j.jobId}: ${j.title}`),
      pendingLeaveRequests: this.store.leaveRequests.list({ status: 'Pending' }).length,
    };
  }

  // ── Leave ─────────────────────────────────────────────────

  processLeaveRequest(input: z.output<typeof LeaveInput>): CapabilityResult<{ requestId: string; decision: LeaveRequest['status']; days: number; message: string }> {
    const employee = this.store.employees.get(input.employeeId);
    if (!employee) return fail('Employee not found');
    if (employee.status !== 'Active') return fail(`Employee ${employee.employeeId} is no longer active`);

    const start = parseIsoDate(input.startDate);
    const end = parseIsoDate(input.endDate);
    if (!start || !end) return fail('Invalid date format, expected YYYY-MM-DD');
    if (end < start) return fail('End date is before start date');

    const conflict = this.store.leaveRequests.list({ employeeId: employee.employeeId, status: 'Approved' })
      .find(r => rangesOverlap(input.startDate, input.endDate, r.startDate, r.endDate));
    if (conflict) {
      return fail(
        `Dates conflict with approved leave ${conflict.requestId} (${conflict.startDate} to ${conflict.endDate})`,
        { decision: 'Rejected' },
      );
    }

    const days = inclusiveDays(start, end);
    const balance = employee.leaveBalance[input.leaveType] ?? 0;

    let decision: LeaveRequest['status'];
    let message: string;
    if (days > balance) {
      decision = 'Rejected';
      message = `Insufficient balance (${balance} available, ${days} requested)`;
    } else if (days > this.leaveMaxDays) {
      decision = 'Pending';
      message = `Requires manager approval (more than ${this.leaveMaxDays} days)`;
    } else {
      decision = 'Approved';
      message = 'Auto-approved';
    }

    const now = this.now();
    const requestId = newId('LR');
    this.store.transaction(() => {
      if (decision === 'Approved') {
        this.store.employees.put({
          ...employee,
          leaveBalance: { ...employee.leaveBalance, [input.leaveType]: balance - days },
        });
      }
      this.store.leaveRequests.put({
        requestId,
        employeeId: employee.employeeId,
        employeeName: employee.name,
        leaveType: input.leaveType,
        startDate: input.startDate,
        endDate: input.endDate,
        days,
        reason: input.reason,
        status: decision,
        submittedDate: now.toISOString(),
        processedDate: decision === 'Approved' ? now.toISOString() : null,
      });
    });

    this.publish('leave_processed', { employee_id: employee.employeeId, request_id: requestId, status: decision, days });
    this.logAction('Process Leave Request', { requestId, decision, days, message }, employee.employeeId);
    return ok({ requestId, decision, days, message });
  }

  // ── Onboarding / Exit ─────────────────────────────────────

  handleEmployeeOnboarding(input: z.output<typeof OnboardingInput>): CapabilityResult<{
    employeeId: string;
    credentials: { username: string; tempPassword: string; portalUrl: string };
    documents: string[];
  }> {
    const joinDate = input.joinDate ?? toIsoDate(this.now());
    if (!parseIsoDate(joinDate)) return fail('Invalid join date, expected YYYY-MM-DD');

    const employeeId = this.nextEmployeeId();
    const employee: Employee = {
      employeeId,
      name: input.name,
      email: input.email,
      department: input.department,
      position: input.position,
      joinDate,
      status: 'Active',
      leaveBalance: { ...CONFIG.hr.defaultLeaveBalance },
    };
    this.store.employees.put(employee);

    this.publish('employee_onboarded', {
      employee_id: employeeId,
      name: input.name,
      department: input.department,
      position: input.position,
    });

    const credentials = {
      username: input.email.split('@')[0] ?? input.email,
      tempPassword: `Welcome@${employeeId}`,
      portalUrl: CONFIG.hr.portalUrl,
    };
    this.logAction('Employee Onboarding', { employeeId, name: input.name, department: input.department, position: input.position }, employeeId);
    return ok({ employeeId, credentials, documents: [...ONBOARDING_DOCUMENTS] });
  }

  processEmployeeExit(input: z.output<typeof ExitInput>): CapabilityResult<{ employeeId: string; exitDate: string }> {
    const employee = this.store.employees.get(input.employeeId);
    if (!employee) return fail('Employee not found');
    if (employee.status === 'Exited') return fail(`Employee ${employee.employeeId} has already exited`);

    const exitDate = input.exitDate ?? toIsoDate(this.now());
    if (!parseIsoDate(exitDate)) return fail('Invalid exit date, expected YYYY-MM-DD');

    this.store.employees.put({ ...employee, status: 'Exited', exitDate });
    this.publish('employee_exited', {
      employee_id: employee.employeeId,
      name: employee.name,
      department: employee.department,
      exit_date: exitDate,
    });
    this.logAction('Employee Exit', { employeeId: employee.employeeId, exitDate, reason: input.reason }, employee.employeeId);
    return ok({ employeeId: employee.employeeId, exitDate });
  }

  private nextEmployeeId(): string {
    let n = this.store.employees.count() + 1;
    while (this.store.employees.get(sequentialId('EMP', n))) n++;
    return sequentialId('EMP', n);
  }

  // ── Policy Q&A ────────────────────────────────────────────

  async askHrPolicyQuestion(question: string, employeeId = 'GUEST'): Promise<CapabilityResult<{
    question: string;
    answer: string;
    relevantPolicies: string[];
    employeeDataAccessed: boolean;
  }>> {
    const answered = await this.askPolicy(question, 'hr', true);
    if (!isSuccess(answered)) return answered;

    const q = question.toLowerCase();
    const relevantPolicies = POLICY_TAGS.filter(t => t.words.some(w => q.includes(w))).map(t => t.policy);
    const employeeDataAccessed = this.employeeMentioned(question) !== null;

    this.logAction('HR Policy Question', { question, dbAccess: employeeDataAccessed }, employeeId);
    return ok({ question, answer: answered.answer, relevantPolicies, employeeDataAccessed });
  }

  private employeeMentioned(question: string): Employee | null {
    const id = question.match(/EMP\d{3}/i);
    if (id) return this.store.employees.get(id[0].toUpperCase());

    const q = question.toLowerCase();
    return this.store.employees.list().find(e => {
      const name = e.name.toLowerCase();
      const first = name.split(' ')[0] ?? name;
      return q.includes(name) || q.includes(first);
    }) ?? null;
  }

  // ── Audit Report ──────────────────────────────────────────

  generateAuditReport(startDate?: string, endDate?: string): CapabilityResult<Payload> {
    const now = this.now();
    const start = startDate ?? toIsoDate(addDays(now, -CONFIG.hr.auditWindowDays));
    const end = endDate ?? toIsoDate(now);

    const since = parseIsoDate(start);
    const endDay = parseIsoDate(end);
    if (!since || !endDay) return fail('Invalid date format');
    const until = new Date(endDay.getTime() + 86_399_999);

    const entries = this.audit.list({ since, until });
    const leaveLogs = entries.filter(e => e.action === 'Process Leave Request');
    const countDecision = (d: string) => leaveLogs.filter(e => e.details.decision === d).length;

    const complianceIssues = this.store.leaveRequests.list({ status: 'Pending' })
      .filter(r => daysBetween(new Date(r.submittedDate), now) > this.auditPendingDays)
      .map(r => `Leave request ${r.requestId} pending more than ${this.auditPendingDays} days`);

    const reportId = newId('AUDIT');
    const report = {
      reportId,
      generatedDate: now.toISOString(),
      period: { start, end },
      summary: {
        totalActivities: entries.length,
        leaveRequests: {
          total: leaveLogs.length,
          approved: countDecision('Approved'),
          rejected: countDecision('Rejected'),
          pending: countDecision('Pending'),
        },
        onboarding: entries.filter(e => e.action === 'Employee Onboarding').length,
        policyQuestions: entries.filter(e => e.action === 'HR Policy Question').length,
      },
      detailedLogs: entries.map(e => ({
        logId: e.logId,
        timestamp: e.timestamp.toISOString(),
        agent: e.agent,
        action: e.action,
        user: e.user,
        details: e.details,
      })),
      complianceStatus: complianceIssues.length === 0 ? 'COMPLIANT' : 'ISSUES_FOUND',
      complianceIssues,
    };

    this.logAction('Generate Audit Report', { reportId }, 'Admin');
    return ok(report);
  }

  // ── Hiring ────────────────────────────────────────────────

  async submitApplication(input: z.output<typeof ApplicationInput>): Promise<CapabilityResult<{
    candidateId: string;
    parsed: ParsedResume;
    evaluation: CandidateEvaluation | null;
  }>> {
    const job = this.store.jobPositions.get(input.jobId);
    if (!job) return fail(`Job position ${input.jobId} not found`);
    if (job.status !== 'Active') return fail(`Job position ${input.jobId} is closed`);

    const parsed = await this.parseResume(input.resumeText);
    const candidate: Candidate = {
      candidateId: newId('CAND'),
      name: input.name,
      email: input.email,
      phone: input.phone,
      appliedPosition: job.title,
      resumeText: input.resumeText,
      extractedSkills: parsed.skills,
      experienceYears: parsed.experienceYears,
      education: parsed.education,
      applicationDate: this.now().toISOString(),
      status: 'Pending',
      evaluation: null,
    };
    this.store.candidates.put(candidate);
    this.logAction('Candidate Application', { candidateId: candidate.candidateId, jobId: job.jobId });

    // Evaluation runs in our own new_candidate_applied handler
    this.publish('new_candidate_applied', { candidate_id: candidate.candidateId, job_id: job.jobId });

    const evaluation = this.store.candidates.get(candidate.candidateId)?.evaluation ?? null;
    return ok({ candidateId: candidate.candidateId, parsed, evaluation });
  }

  evaluateCandidate(candidateId: string, jobId?: string): CapabilityResult<{ candidateId: string; evaluation: CandidateEvaluation }> {
    const candidate = this.store.candidates.get(candidateId);
    if (!candidate) return fail(`Candidate ${candidateId} not found`);

    const job = jobId
      ? this.store.jobPositions.get(jobId)
      : this.store.jobPositions.list().find(j => j.title === candidate.appliedPosition) ?? null;
    if (!job) return fail(`Job position for candidate ${candidateId} not found`);

    const evaluation = scoreCandidate(candidate, job, this.scoring, this.now());
    this.store.candidates.put({ ...candidate, status: evaluation.decision, evaluation });

    this.logAction('Candidate Evaluation', { candidateId, decision: evaluation.decision, score: evaluation.score });
    this.publish('candidate_evaluated', { candidate_id: candidateId, decision: evaluation.decision, score: evaluation.score });
    return ok({ candidateId, evaluation });
  }

  /** Model extraction first, keyword parser when the model is absent or unparseable */
  async parseResume(resumeText: string): Promise<ParsedResume & { method: 'llm' | 'keyword' }> {
    if (this.llm.isAvailable()) {
      const prompt = `Analyze this resume and extract JSON:\n\n${resumeText.slice(0, 3000)}\n\n` +
        'Return: {"skills":["..."],"experience_years":<int>,' +
        `"education":"PhD|Master's Degree|Bachelor's Degree|Diploma|High School|${NOT_SPECIFIED}"}`;
      const raw = await this.llm.generate(prompt, { systemPrompt: 'Expert resume parser. Return valid JSON only.' });

      const match = raw.match(/\{[\s\S]*\}/);
      if (match) {
        try {
          const parsed = LlmResumeSchema.safeParse(JSON.parse(match[0]));
          if (parsed.success) {
            return {
              skills: parsed.data.skills,
              experienceYears: parsed.data.experience_years,
              education: parsed.data.education,
              method: 'llm',
            };
          }
          this.logger.debug(`Resume extraction rejected: ${parsed.error.message}`);
        } catch (err) {
          this.logger.debug(`Resume extraction not JSON: ${errorMessage(err)}`);
        }
      }
    }
    return { ...fallbackParseResume(resumeText, this.keywords), method: 'keyword' };
  }
}
