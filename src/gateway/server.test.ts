import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';
import { createTestSystem, type TestSystem } from '../test-utils/mocks.js';
import { GatewayServer } from './server.js';

function waitForMessages(ws: WebSocket, count: number): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    const messages: unknown[] = [];
    ws.on('message', data => {
      messages.push(JSON.parse(String(data)));
      if (messages.length === count) resolve(messages);
    });
    ws.once('error', reject);
  });
}

describe('GatewayServer', () => {
  let system: TestSystem;
  let gateway: GatewayServer;
  let base: string;

  beforeEach(async () => {
    system = createTestSystem();
    gateway = new GatewayServer(
      { orchestrator: system.orchestrator, bus: system.bus, audit: system.audit },
      system.logger,
      { host: '127.0.0.1', port: 0 },
    );
    const port = await gateway.start();
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await gateway.stop();
    system.close();
  });

  async function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should report health', async () => {
    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'operational', clients: 0 });
  });

  // ── Agents ──

  it('should list agents and describe one', async () => {
    const all = await fetch(`${base}/api/agents`);
    expect(await all.json()).toMatchObject({
      hr: { name: 'HR Agent', status: 'degraded' },
      it: { name: 'IT Agent' },
      finance: { name: 'Finance Agent' },
      compliance: { name: 'Compliance Agent' },
    });

    const one = await fetch(`${base}/api/agents/it`);
    const body = await one.json();
    expect(body).toMatchObject({ name: 'IT Agent', subscriptions: ['employee_onboarded'] });
    expect(body).toHaveProperty('capabilityDefinitions', expect.arrayContaining([
      { name: 'resolveTicket', description: 'Close a ticket with a resolution note', parameters: 'ticketId, resolution, resolvedBy?' },
    ]));

    const missing = await fetch(`${base}/api/agents/payroll`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Agent not found: payroll' });
  });

  it('should invoke a capability directly', async () => {
    const res = await post('/api/agents/hr/capabilities/processLeaveRequest', {
      employeeId: 'EMP001', leaveType: 'Sick Leave', startDate: '2026-03-11', endDate: '2026-03-11',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'success', decision: 'Approved', days: 1 });
    expect(system.store.employees.get('EMP001')?.leaveBalance['Sick Leave']).toBe(14);

    const unknown = await post('/api/agents/hr/capabilities/fly', {});
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Capability not found: fly' });
  });

  // ── Workflows ──

  it('should run workflows and look them up', async () => {
    const res = await post('/api/workflows/expense_claim', { employee_id: 'EMP001', amount: 3500, category: 'Travel' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'completed', steps: [{ stepName: 'Finance Expense Processing', resultStatus: 'success' }] });

    const [run] = system.orchestrator.getCompletedWorkflows();
    if (!run) throw new Error('workflow not recorded');
    const lookup = await fetch(`${base}/api/workflows/${run.id}`);
    expect(await lookup.json()).toMatchObject({ id: run.id, name: 'expense_claim', status: 'Completed' });

    const list = await fetch(`${base}/api/workflows`);
    expect(await list.json()).toMatchObject({ active: [], failed: [] });
  });

  it('should return 404 for unknown workflows', async () => {
    const unknown = await post('/api/workflows/teleport', {});
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ status: 'error', message: 'Unknown workflow: teleport' });

    const missing = await fetch(`${base}/api/workflows/WF-none`);
    expect(missing.status).toBe(404);
  });

  // ── Tasks & Escalations ──

  it('should escalate a task it cannot plan and accept a review', async () => {
    const res = await post('/api/task', { task: 'Sort out my thing' });

    expect(await res.json()).toMatchObject({ status: 'escalated', agent: 'HR Agent', routing: { agent: 'hr' } });

    const queue = await fetch(`${base}/api/escalations`);
    expect(await queue.json()).toHaveLength(1);

    const [entry] = system.escalations.pending();
    if (!entry) throw new Error('escalation missing');
    const resolved = await post(`/api/escalations/${entry.id}/resolve`, { adminDecision: 'askHrPolicyQuestion', reason: 'policy query' });
    expect(await resolved.json()).toMatchObject({ id: entry.id, state: 'resolved' });
    expect(system.agents.hr.getLearningStore().getOverrides()).toHaveLength(1);

    const again = await post(`/api/escalations/${entry.id}/resolve`, { adminDecision: 'x' });
    expect(again.status).toBe(404);
  });

  it('should reject invalid and malformed bodies', async () => {
    const invalid = await post('/api/task', { task: '   ' });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: 'Invalid request', details: ['task: String must contain at least 1 character(s)'] });

    const malformed = await fetch(`${base}/api/task`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"task": ',
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Malformed request body' });

    const nowhere = await fetch(`${base}/nowhere`);
    expect(nowhere.status).toBe(404);
    expect(await nowhere.json()).toEqual({ error: 'Not found' });
  });

  // ── Events ──

  it('should publish events onto the bus', async () => {
    const res = await post('/api/events', { type: 'access_provisioned', payload: { employee_id: 'EMP002', systems: ['VPN'] } });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ type: 'access_provisioned', source: 'Gateway' });
    expect(system.audit.getByAgent('Compliance Agent', 1)[0]?.action).toBe('Access Review');

    const log = await fetch(`${base}/api/events?limit=1`);
    expect(await log.json()).toMatchObject([{ type: 'access_provisioned' }]);

    expect((await post('/api/events', { type: 'party_started' })).status).toBe(400);
    expect((await fetch(`${base}/api/events?limit=0`)).status).toBe(400);
  });

  it('should serve the audit log and its verification', async () => {
    await post('/api/events', { type: 'access_provisioned', payload: { employee_id: 'EMP002', systems: ['VPN'] } });

    const log = await fetch(`${base}/api/audit`);
    expect(await log.json()).toMatchObject([{ agent: 'Compliance Agent', action: 'Access Review' }]);

    const verify = await fetch(`${base}/api/audit/verify`);
    expect(await verify.json()).toEqual({ valid: true, totalEntries: 1 });

    expect((await fetch(`${base}/api/audit?since=yesterday`)).status).toBe(400);
  });

  it('should stream bus events to websocket clients', async () => {
    const ws = new WebSocket(`${base.replace('http', 'ws')}/ws`);
    const feed = waitForMessages(ws, 2);
    await new Promise<void>((resolve, reject) => {
      ws.once('message', () => resolve());
      ws.once('error', reject);
    });

    system.bus.publish('ticket_resolved', { ticket_id: 'TKT-1' }, 'IT Agent');

    const [connected, event] = await feed;
    expect(connected).toMatchObject({ channel: 'system', payload: { event: 'connected' } });
    expect(event).toMatchObject({
      channel: 'event',
      payload: { type: 'ticket_resolved', payload: { ticket_id: 'TKT-1' }, source: 'IT Agent' },
    });
    expect(gateway.getClientCount()).toBe(1);
    ws.close();
  });
});
