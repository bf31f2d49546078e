import { describe, it, expect } from 'vitest';
import { createStubLLM, createTestSystem, expectError, expectSuccess } from '../../test-utils/mocks.js';

const ONBOARDED = { employee_id: 'EMP001', name: 'Test Person', department: 'Engineering' };

describe('ITAgent', () => {
  // ── Provisioning ──

  it('should provision the standard systems once per onboarded employee', () => {
    const { bus, store, audit } = createTestSystem();

    bus.publish('employee_onboarded', ONBOARDED, 'HR Agent');
    bus.publish('employee_onboarded', ONBOARDED, 'HR Agent');

    expect(store.accessRecords.list({ employeeId: 'EMP001' }).map(r => r.system)).toEqual(['Email', 'VPN', 'JIRA', 'Slack']);
    expect(bus.getEventLog(100).filter(e => e.type === 'access_provisioned')).toHaveLength(1);
    expect(audit.getByAgent('IT Agent').map(e => e.action)).toEqual(['Auto IT Setup']);
  });

  it('should ignore malformed onboarding events', () => {
    const { bus, store, logger } = createTestSystem();

    bus.publish('employee_onboarded', { employee_id: 42 });

    expect(store.accessRecords.count()).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('IT Agent ignored malformed employee_onboarded'));
  });

  // ── Access ──

  it('should grant access once per system', () => {
    const { agents } = createTestSystem();

    expect(expectSuccess(agents.it.grantAccess('EMP001', 'VPN', 'Admin'))).toMatchObject({ system: 'VPN', accessLevel: 'Admin' });
    expectError(agents.it.grantAccess('EMP001', 'VPN'), 'Employee EMP001 already has active VPN access');
    expectError(agents.it.grantAccess('EMP404', 'VPN'), 'Employee not found');
  });

  it('should revoke everything an employee holds', () => {
    const { agents, bus, store } = createTestSystem();
    bus.publish('employee_onboarded', ONBOARDED);

    const result = expectSuccess(agents.it.revokeEmployeeAccess('EMP001', 'Contract ended'));

    expect(result.systems).toEqual(['Email', 'VPN', 'JIRA', 'Slack']);
    expect(result.revoked).toHaveLength(4);
    expect(store.accessRecords.list({ employeeId: 'EMP001', status: 'Active' })).toEqual([]);
    expect(store.accessRecords.list({ employeeId: 'EMP001' })[0]).toMatchObject({ status: 'Revoked', revokeReason: 'Contract ended' });
    expect(bus.getEventLog(1)[0]).toMatchObject({
      type: 'access_revoked',
      payload: { employee_id: 'EMP001', systems: ['Email', 'VPN', 'JIRA', 'Slack'], reason: 'Contract ended' },
    });
  });

  it('should revoke a single system', () => {
    const { agents, bus, store } = createTestSystem();
    bus.publish('employee_onboarded', ONBOARDED);

    expectSuccess(agents.it.revokeAccess('EMP001', 'Slack'));

    expect(store.accessRecords.list({ employeeId: 'EMP001', status: 'Active' }).map(r => r.system)).toEqual(['Email', 'VPN', 'JIRA']);
  });

  // ── Tickets ──

  it('should open tickets with a model suggestion when available', async () => {
    const llm = createStubLLM(['Restart the dock.']);
    const { agents, store } = createTestSystem({ llm });

    const result = expectSuccess(await agents.it.createTicket({
      employeeId: 'EMP001', category: 'Hardware', description: 'Second monitor is blank', priority: 'Low',
    }));

    expect(result.suggestion).toBe('Restart the dock.');
    expect(store.tickets.get(result.ticketId)).toMatchObject({
      subject: 'Hardware', status: 'Open', priority: 'Low', suggestedFix: 'Restart the dock.', assignedTo: 'IT Support',
    });
  });

  it('should resolve a ticket once', async () => {
    const { agents } = createTestSystem();
    const { ticketId } = expectSuccess(await agents.it.createTicket({
      employeeId: 'EMP002', category: 'Software', description: 'Editor crashes', priority: 'Medium',
    }));

    expect(agents.it.resolveTicket(ticketId, 'Reinstalled')).toEqual({ status: 'success', ticketId, resolution: 'Reinstalled' });
    expectError(agents.it.resolveTicket(ticketId, 'Again'), `Ticket ${ticketId} is already Resolved`);
    expect(expectSuccess(agents.it.getTicketStatus(ticketId)).ticket.suggestedFix).toBeNull();
    expectError(await agents.it.createTicket({ employeeId: 'EMP404', category: 'x', description: 'y', priority: 'Low' }), 'Employee not found');
  });

  // ── Licences ──

  it('should track licence seats', () => {
    const { agents, store } = createTestSystem();
    const template = store.employees.get('EMP001');
    if (!template) throw new Error('seed employee missing');
    store.employees.put({ ...template, employeeId: 'EMP003', name: 'Third Tester' });

    expect(expectSuccess(agents.it.manageSoftwareLicense('assign', 'editor pro', 'EMP001')).available).toBe(0);
    expectError(agents.it.manageSoftwareLicense('assign', 'Editor Pro', 'EMP001'), 'EMP001 already holds a Editor Pro licence');
    expectError(agents.it.manageSoftwareLicense('assign', 'Editor Pro', 'EMP003'), 'No available license for Editor Pro');
    expect(expectSuccess(agents.it.manageSoftwareLicense('release', 'LIC001', 'EMP002')).available).toBe(1);
    expect(store.licenses.get('LIC001')?.assignees).toEqual(['EMP001']);
    expectError(agents.it.manageSoftwareLicense('status', 'Paint'), 'No licence record for Paint');
    expectError(agents.it.manageSoftwareLicense('assign', 'Editor Pro'), 'employeeId is required to assign a licence');
  });

  // ── Assets ──

  it('should assign, track and return assets', () => {
    const { agents } = createTestSystem();

    expect(expectSuccess(agents.it.assignAsset('ASSET001', 'EMP001')).asset).toMatchObject({ assignedTo: 'EMP001', status: 'Assigned' });
    expect(expectSuccess(agents.it.trackAsset(undefined, 'EMP001')).assets.map(a => a.assetId)).toEqual(['ASSET001']);
    expectError(agents.it.assignAsset('ASSET001', 'EMP002'), 'Asset ASSET001 is assigned to EMP001');
    expect(expectSuccess(agents.it.assignAsset('ASSET001', null)).asset).toMatchObject({ assignedTo: null, status: 'Available' });
    expectError(agents.it.trackAsset(), 'Provide assetId or employeeId');
  });

  // ── Security ──

  it('should raise an incident that compliance records as a violation', () => {
    const { agents, store, bus } = createTestSystem();

    const { incidentId } = expectSuccess(agents.it.reportSecurityIncident('Suspicious login from new country', 'High', 'EMP001'));

    expect(store.tickets.get(incidentId)).toMatchObject({ employeeId: 'SYSTEM', category: 'Security', priority: 'Critical' });
    expect(store.violations.list()).toEqual([
      expect.objectContaining({
        violationType: 'Security',
        description: 'Suspicious login from new country',
        severity: 'High',
        employeeId: 'EMP001',
        detectedBy: 'SYSTEM',
      }),
    ]);
    expect(bus.getEventLog(10).map(e => e.type)).toEqual(['ticket_created', 'security_incident', 'violation_reported']);
  });

  it('should report scan findings with a risk level', () => {
    const { agents, bus, store } = createTestSystem();
    bus.publish('employee_onboarded', ONBOARDED);
    const employee = store.employees.get('EMP001');
    if (!employee) throw new Error('seed employee missing');
    store.employees.put({ ...employee, status: 'Exited' });

    const scan = expectSuccess(agents.it.monitorSecurity('quarterly review'));

    expect(scan.findings).toEqual([
      'Active Email access held by inactive employee EMP001',
      'Active VPN access held by inactive employee EMP001',
      'Active JIRA access held by inactive employee EMP001',
      'Active Slack access held by inactive employee EMP001',
    ]);
    expect(scan.riskLevel).toBe('High');
  });

  it('should measure provisioning coverage and open tickets', async () => {
    const { agents, bus, goals } = createTestSystem();
    bus.publish('employee_onboarded', ONBOARDED);
    await agents.it.createTicket({ employeeId: 'EMP001', category: 'Access', description: 'VPN drops', priority: 'Medium' });

    agents.it.refreshGoals();

    expect(goals.getAgentPerformance('IT Agent').map(g => [g.name, g.actual])).toEqual([
      ['Provisioning SLA', 50],
      ['Open tickets', 1],
    ]);
  });
});
