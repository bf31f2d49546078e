import { describe, it, expect, vi } from 'vitest';
import { defaultEmail, parseRoutingReply } from './orchestrator.js';
import { createStubLLM, createTestSystem, planReply } from '../test-utils/mocks.js';

describe('parseRoutingReply', () => {
  it('should take the key before the separator', () => {
    expect(parseRoutingReply('IT | password resets belong to IT')).toBe('it');
    expect(parseRoutingReply('finance|expenses')).toBe('finance');
  });

  it('should fall back to the earliest whole-word key', () => {
    expect(parseRoutingReply('This belongs to compliance, not hr')).toBe('compliance');
    expect(parseRoutingReply('Route to: hr')).toBe('hr');
  });

  it('should not match keys inside other words', () => {
    expect(parseRoutingReply('the audit team should decide')).toBeNull();
    expect(parseRoutingReply('')).toBeNull();
  });
});

describe('defaultEmail', () => {
  it('should derive a mailbox from the name', () => {
    expect(defaultEmail('Carol Davis', 'company.example')).toBe('carol.davis@company.example');
    expect(defaultEmail('  Jo-Ann  O\'Neil ', 'corp.test')).toBe('jo.ann.o.neil@corp.test');
    expect(defaultEmail('!!!', 'corp.test')).toBe('employee@corp.test');
  });
});

describe('Orchestrator', () => {
  // ── Routing ──

  it('should route to HR without calling an unavailable model', async () => {
    const system = createTestSystem();

    const routing = await system.orchestrator.routeTask('Reset my VPN password');

    expect(routing).toEqual({ agent: 'hr', reasoning: 'Default routing to HR' });
    expect(system.llm.calls).toHaveLength(0);
  });

  it('should route by the model reply and keep it as reasoning', async () => {
    const system = createTestSystem({ llm: createStubLLM(['  finance | this is an expense question ']) });
    const routed = vi.fn();
    system.orchestrator.on('task:routed', routed);

    const routing = await system.orchestrator.routeTask('Can I expense a conference ticket?');

    expect(routing).toEqual({ agent: 'finance', reasoning: 'finance | this is an expense question' });
    expect(system.llm.calls[0]?.prompt).toContain('Task: Can I expense a conference ticket?');
    expect(system.llm.calls[0]?.prompt.endsWith('Format: agent_key | reasoning')).toBe(true);
    expect(routed).toHaveBeenCalledWith({ task: 'Can I expense a conference ticket?', routing });
  });

  it('should keep the default route when the reply names no agent', async () => {
    const system = createTestSystem({ llm: createStubLLM(['not sure']) });

    await expect(system.orchestrator.routeTask('hello')).resolves.toEqual({ agent: 'hr', reasoning: 'Default routing to HR' });
  });

  it('should route then run the chosen agent', async () => {
    const llm = createStubLLM([
      'it | hardware problem',
      planReply(0.9, [{
        tool: 'createTicket',
        parameters: { employeeId: 'EMP001', category: 'Hardware', description: 'Laptop screen flickers' },
      }]),
    ], { defaultReply: 'Ticket opened.' });
    const system = createTestSystem({ llm });

    const result = await system.orchestrator.handleRequest('My laptop screen flickers', { employee_id: 'EMP001' });

    expect(result.status).toBe('success');
    expect(result.agent).toBe('IT Agent');
    expect(result.routing.agent).toBe('it');
    expect(result.response).toBe('Ticket opened.');
    expect(system.store.tickets.count()).toBe(1);
    expect(system.orchestrator.getAllAgentStatuses().it.decisionsMade).toBe(1);
  });

  // ── Escalations ──

  it('should escalate a low-confidence plan without acting', async () => {
    const llm = createStubLLM([
      'hr | leave',
      planReply(0.3, [{
        tool: 'processLeaveRequest',
        parameters: { employeeId: 'EMP001', leaveType: 'Annual Leave', startDate: '2026-04-01', endDate: '2026-04-20' },
      }], 'dates are unclear'),
    ]);
    const system = createTestSystem({ llm });
    const escalated = vi.fn();
    system.orchestrator.on('escalation:created', escalated);

    const result = await system.orchestrator.handleRequest('I need most of April off', { employee_id: 'EMP001' });

    expect(result.status).toBe('escalated');
    expect(system.store.leaveRequests.count()).toBe(0);
    expect(system.bus.getEventLog(100)).toEqual([]);
    expect(system.audit.getCount()).toBe(0);
    expect(system.orchestrator.getEscalationQueue()).toHaveLength(1);
    expect(escalated).toHaveBeenCalledTimes(1);
    expect(system.orchestrator.getAllAgentStatuses().hr.decisionsMade).toBe(0);
  });

  it('should record an override when the reviewer decides differently', async () => {
    const llm = createStubLLM(['hr | leave', planReply(0.2, [{ tool: 'processLeaveRequest' }])]);
    const system = createTestSystem({ llm });
    const result = await system.orchestrator.handleRequest('time off?');
    if (result.status !== 'escalated') throw new Error('expected escalation');

    const resolved = system.orchestrator.resolveEscalation(result.escalationId, {
      adminDecision: 'askHrPolicyQuestion',
      reason: 'employee only asked about policy',
      reviewer: 'admin',
    });

    const learning = system.agents.hr.getLearningStore();
    expect(resolved?.state).toBe('resolved');
    expect(learning.getOverrides()).toHaveLength(1);
    expect(learning.getDecision(result.decisionId)?.outcome).toBe('overridden');
    expect(system.orchestrator.getEscalationQueue()).toEqual([]);
  });

  it('should confirm the decision when the reviewer agrees', async () => {
    const llm = createStubLLM(['hr | leave', planReply(0.2, [{ tool: 'processLeaveRequest' }])]);
    const system = createTestSystem({ llm });
    const result = await system.orchestrator.handleRequest('time off?');
    if (result.status !== 'escalated') throw new Error('expected escalation');

    system.orchestrator.resolveEscalation(result.escalationId, { adminDecision: 'processLeaveRequest', reason: '', reviewer: 'admin' });

    const learning = system.agents.hr.getLearningStore();
    expect(learning.getOverrides()).toEqual([]);
    expect(learning.getDecision(result.decisionId)?.outcome).toBe('confirmed');
    expect(system.orchestrator.resolveEscalation(result.escalationId, { adminDecision: 'x', reason: '', reviewer: 'admin' })).toBeNull();
    expect(system.orchestrator.resolveEscalation('missing', { adminDecision: 'x', reason: '', reviewer: 'admin' })).toBeNull();
  });

  it('should still resolve an escalation whose decision has aged out of the history', async () => {
    const llm = createStubLLM(['hr | leave', planReply(0.2, [{ tool: 'processLeaveRequest' }])]);
    const system = createTestSystem({ llm });
    const result = await system.orchestrator.handleRequest('time off?');
    if (result.status !== 'escalated') throw new Error('expected escalation');

    const learning = system.agents.hr.getLearningStore();
    for (let i = 0; i < 500; i++) learning.recordDecision(`task ${i}`, {}, 'respond', 0.9, 'success');
    expect(learning.getDecision(result.decisionId)).toBeNull();

    const resolved = system.orchestrator.resolveEscalation(result.escalationId, {
      adminDecision: 'askHrPolicyQuestion',
      reason: 'policy query',
      reviewer: 'admin',
    });

    expect(resolved?.state).toBe('resolved');
    expect(system.orchestrator.getEscalationQueue()).toEqual([]);
    expect(learning.getOverrides()).toEqual([]);
    expect(system.logger.warn).toHaveBeenCalledWith(expect.stringContaining(`decision ${result.decisionId} is no longer in HR Agent's history`));
  });

  // ── Workflows ──

  it('should reject unknown workflows without recording a run', () => {
    const system = createTestSystem();

    expect(system.orchestrator.executeWorkflow('payroll_run', {})).toEqual({ status: 'error', message: 'Unknown workflow: payroll_run' });
    expect(system.orchestrator.getCompletedWorkflows()).toEqual([]);
    expect(system.orchestrator.getFailedWorkflows()).toEqual([]);
  });

  it('should mark a run failed when its parameters are invalid', () => {
    const system = createTestSystem();
    const failed = vi.fn();
    system.orchestrator.on('workflow:failed', failed);

    const outcome = system.orchestrator.executeWorkflow('expense_claim', { amount: 10 });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.steps).toEqual([]);
    expect(system.orchestrator.getWorkflow(outcome.workflowId)?.status).toBe('Failed');
    expect(system.orchestrator.getFailedWorkflows()).toHaveLength(1);
    expect(system.orchestrator.getActiveWorkflows()).toEqual([]);
    expect(failed).toHaveBeenCalledTimes(1);
  });

  it('should auto-approve small claims and leave large ones pending', () => {
    const system = createTestSystem({ finance: { expenseAutoApproveLimit: 5000 } });

    const small = system.orchestrator.executeWorkflow('expense_claim', {
      employee_id: 'EMP001', amount: 3500, category: 'Travel', description: 'Client visit', receipt_uploaded: true,
    });
    const large = system.orchestrator.executeWorkflow('expense_claim', {
      employee_id: 'EMP001', amount: 15000, category: 'Equipment', description: 'Workstation',
    });

    expect(small.status === 'completed' && small.results['Finance Expense Processing']).toMatchObject({ status: 'success', approvalStatus: 'Approved' });
    expect(large.status === 'completed' && large.results['Finance Expense Processing']).toMatchObject({ status: 'success', approvalStatus: 'Pending' });

    const [first, second] = system.store.expenses.list();
    expect(first?.flagged).toBe(false);
    expect(second?.flagged).toBe(true);
    expect(system.bus.getEventLog(10).map(e => e.type)).toEqual(['expense_submitted', 'expense_approved', 'expense_submitted']);
  });

  it('should run every exit step even when the employee is unknown', () => {
    const system = createTestSystem();

    const outcome = system.orchestrator.executeWorkflow('employee_exit', { employee_id: 'EMP999' });

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.steps.map(s => `${s.stepName}:${s.agent}:${s.resultStatus}`)).toEqual([
      'HR Exit Processing:HR Agent:error',
      'IT Access Revocation:IT Agent:error',
      'Finance Final Pay:Finance Agent:error',
      'Compliance Exit Check:Compliance Agent:error',
    ]);
  });

  it('should settle a prorated final pay on exit', () => {
    const system = createTestSystem();

    const outcome = system.orchestrator.executeWorkflow('employee_exit', { employee_id: 'EMP001', exit_date: '2026-03-15' });

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.steps.every(s => s.resultStatus === 'success')).toBe(true);
    expect(outcome.results['Finance Final Pay']).toMatchObject({ recordId: 'PAY-2026-03-EMP001-FINAL', netSalary: 3483.87 });
    expect(outcome.results['Compliance Exit Check']).toMatchObject({ clearance: 'CLEARED', issues: [] });
    expect(system.store.employees.get('EMP001')?.status).toBe('Exited');
  });

  it('should flag a security incident for compliance review', () => {
    const system = createTestSystem();

    const outcome = system.orchestrator.executeWorkflow('security_incident', {
      description: 'Phishing link opened', employee_id: 'EMP002',
    });

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.results['IT Security Scan']).toMatchObject({ findings: [], riskLevel: 'Low' });
    const [violation] = system.store.violations.list();
    expect(violation).toMatchObject({
      violationType: 'Anomaly',
      description: 'Security: Phishing link opened',
      severity: 'High',
      employeeId: 'EMP002',
      detectedBy: 'Security Incident Workflow',
    });
    expect(system.audit.getByAgent('Compliance Agent').map(e => e.action)).toEqual(['Flag Anomaly', 'Report Violation', 'Urgent Violation Alert']);
  });

  it('should keep a bounded history of completed runs', () => {
    const system = createTestSystem();
    const completed = vi.fn();
    system.orchestrator.on('workflow:completed', completed);

    for (const amount of [10, 20, 30]) {
      system.orchestrator.executeWorkflow('expense_claim', { employee_id: 'EMP002', amount });
    }

    expect(completed).toHaveBeenCalledTimes(3);
    expect(system.orchestrator.getCompletedWorkflows(2).map(w => w.params.amount)).toEqual([20, 30]);
    expect(system.orchestrator.getCompletedWorkflows(0)).toEqual([]);
    expect(system.orchestrator.getCompletedWorkflows()[0]?.status).toBe('Completed');
  });

  // ── Queries ──

  it('should look up agents by key', () => {
    const system = createTestSystem();

    expect(system.orchestrator.getAgent('compliance')?.name).toBe('Compliance Agent');
    expect(system.orchestrator.getAgent('legal')).toBeNull();
    expect(system.orchestrator.getAllAgentStatuses().finance.status).toBe('degraded');
  });

  it('should refresh goals before reporting', () => {
    const system = createTestSystem();
    system.orchestrator.executeWorkflow('new_hire', { name: 'Dana Reyes', department: 'Engineering', join_date: '2026-03-16' });

    const report = system.orchestrator.getGoalReport();

    expect(report['IT Agent']?.find(g => g.name === 'Open tickets')).toMatchObject({ actual: 0, met: true });
    expect(report['Compliance Agent']?.find(g => g.name === 'Training completion')).toMatchObject({ actual: 0, met: false });
  });
});
