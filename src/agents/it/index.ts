// ═══════════════════════════════════════════════════════════════
// Agent::IT
// Tickets, system access, licences, assets and security scans
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import { CONFIG } from '../../core/config.js';
import { EmployeeOnboardedSchema, type DomainEventType } from '../../core/events.js';
import { newId } from '../../core/ids.js';
import { fail, ok, type CapabilityResult, type Payload } from '../../core/types.js';
import { TICKET_PRIORITIES, type AccessRecord, type Asset, type License, type Ticket, type TicketPriority } from '../../store/schemas.js';
import { BaseAgent, type AgentDeps } from '../base.js';

export interface ITAgentOptions {
  standardSystems?: readonly string[];
}

const SYSTEM_USER = 'SYSTEM';

// ── Inputs ──

const CreateTicketInput = z.object({
  employeeId: z.string().min(1),
  category: z.string().min(1),
  description: z.string().min(1),
  subject: z.string().optional(),
  priority: z.enum(TICKET_PRIORITIES).default('Medium'),
});

const ResolveTicketInput = z.object({
  ticketId: z.string().min(1),
  resolution: z.string().min(1),
  resolvedBy: z.string().default('IT Agent'),
});

const TicketIdInput = z.object({ ticketId: z.string().min(1) });

const GrantAccessInput = z.object({
  employeeId: z.string().min(1),
  system: z.string().min(1),
  accessLevel: z.string().default('Standard'),
  approvedBy: z.string().default('IT Admin'),
});

const RevokeAccessInput = z.object({
  employeeId: z.string().min(1),
  system: z.string().min(1),
  reason: z.string().default('Policy change'),
});

const RevokeAllInput = z.object({
  employeeId: z.string().min(1),
  reason: z.string().default('Employee exit'),
});

const LicenseInput = z.object({
  action: z.enum(['assign', 'release', 'status']),
  software: z.string().min(1),
  employeeId: z.string().optional(),
});

const TrackAssetInput = z.object({
  assetId: z.string().optional(),
  employeeId: z.string().optional(),
});

const AssignAssetInput = z.object({
  assetId: z.string().min(1),
  employeeId: z.string().nullable(),
});

const IncidentInput = z.object({
  description: z.string().min(1),
  severity: z.enum(['Low', 'Medium', 'High', 'Critical']).default('High'),
  employeeId: z.string().optional(),
});

const ScanInput = z.object({
  description: z.string().optional(),
});

export class ITAgent extends BaseAgent {
  readonly subscriptions: readonly DomainEventType[] = ['employee_onboarded'];

  private standardSystems: readonly string[];

  constructor(deps: AgentDeps, options: ITAgentOptions = {}) {
    super('it', deps);
    this.standardSystems = options.standardSystems ?? CONFIG.it.standardSystems;

    this.registerCapability('createTicket',
      'Open a support ticket with a suggested fix',
      'employeeId, category, description, subject?, priority?',
      CreateTicketInput, i => this.createTicket(i));
    this.registerCapability('resolveTicket',
      'Close a ticket with a resolution note',
      'ticketId, resolution, resolvedBy?',
      ResolveTicketInput, i => this.resolveTicket(i.ticketId, i.resolution, i.resolvedBy));
    this.registerCapability('getTicketStatus',
      'Look up a ticket',
      'ticketId',
      TicketIdInput, i => this.getTicketStatus(i.ticketId));
    this.registerCapability('grantAccess',
      'Grant an employee access to one system',
      'employeeId, system, accessLevel?, approvedBy?',
      GrantAccessInput, i => this.grantAccess(i.employeeId, i.system, i.accessLevel, i.approvedBy));
    this.registerCapability('revokeAccess',
      "Revoke an employee's access to one system",
      'employeeId, system, reason?',
      RevokeAccessInput, i => this.revokeAccess(i.employeeId, i.system, i.reason));
    this.registerCapability('revokeEmployeeAccess',
      'Revoke all active access held by an employee',
      'employeeId, reason?',
      RevokeAllInput, i => this.revokeEmployeeAccess(i.employeeId, i.reason));
    this.registerCapability('manageSoftwareLicense',
      'Assign, release or inspect software licence seats',
      "action: 'assign'|'release'|'status', software, employeeId?",
      LicenseInput, i => this.manageSoftwareLicense(i.action, i.software, i.employeeId));
    this.registerCapability('trackAsset',
      'Look up one asset or every asset held by an employee',
      'assetId? | employeeId?',
      TrackAssetInput, i => this.trackAsset(i.assetId, i.employeeId));
    this.registerCapability('assignAsset',
      'Assign an asset to an employee, or return it with employeeId null',
      'assetId, employeeId|null',
      AssignAssetInput, i => this.assignAsset(i.assetId, i.employeeId));
    this.registerCapability('reportSecurityIncident',
      'Open a critical security ticket and alert compliance',
      'description, severity?, employeeId?',
      IncidentInput, i => this.reportSecurityIncident(i.description, i.severity, i.employeeId));
    this.registerCapability('monitorSecurity',
      'Scan for open security tickets and stale access',
      'description?',
      ScanInput, i => this.monitorSecurity(i.description));
  }

  // ── Events ──

  protected onEvent(eventType: DomainEventType, payload: Payload): void {
    if (eventType !== 'employee_onboarded') return;

    const parsed = EmployeeOnboardedSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(`IT Agent ignored malformed employee_onboarded: ${parsed.error.message}`);
      return;
    }
    this.provisionStandardAccess(parsed.data.employee_id);
  }

  /** Grant the standard systems the employee does not already hold */
  private provisionStandardAccess(employeeId: string): void {
    const held = new Set(this.activeAccess(employeeId).map(r => r.system));
    const granted: string[] = [];
    for (const system of this.standardSystems) {
      if (held.has(system)) continue;
      this.store.accessRecords.put(this.accessRecord(employeeId, system, 'Standard', 'Auto-provisioned'));
      granted.push(system);
    }
    if (granted.length === 0) return;

    this.logAction('Auto IT Setup', { employeeId, systems: granted });
    this.publish('access_provisioned', { employee_id: employeeId, systems: granted });
  }

  protected domainContext(): Payload {
    return {
      openTickets: this.openTickets().length,
      standardSystems: [...this.standardSystems],
    };
  }

  refreshGoals(): void {
    const active = this.store.employees.list({ status: 'Active' });
    const provisioned = active.filter(e => {
      const held = new Set(this.activeAccess(e.employeeId).map(r => r.system));
      return this.standardSystems.every(s => held.has(s));
    });
    const sla = active.length > 0 ? Math.round((provisioned.length / active.length) * 10000) / 100 : 100;

    this.goals.recordMetric(this.name, 'Provisioning SLA', sla);
    this.goals.recordMetric(this.name, 'Open tickets', this.openTickets().length);
  }

  // ── Tickets ───────────────────────────────────────────────

  async createTicket(input: z.output<typeof CreateTicketInput>): Promise<CapabilityResult<{ ticketId: string; suggestion: string }>> {
    if (input.employeeId !== SYSTEM_USER && !this.store.employees.get(input.employeeId)) {
      return fail('Employee not found');
    }

    let suggestion = '';
    if (this.llm.isAvailable()) {
      suggestion = await this.llm.generate(
        `IT support ticket:\nCategory: ${input.category}\nDescription: ${input.description}\nPriority: ${input.priority}\n\n` +
        'Suggest a brief resolution approach (2-3 sentences).',
        { systemPrompt: 'You are an IT support specialist.' },
      );
    }

    const ticket = this.openTicket(input.employeeId, input.category, input.subject ?? input.category, input.description, input.priority, suggestion || null);
    this.logAction('Create IT Ticket', { ticketId: ticket.ticketId, category: ticket.category, priority: ticket.priority }, input.employeeId);
    return ok({ ticketId: ticket.ticketId, suggestion });
  }

  private openTicket(employeeId: string, category: string, subject: string, description: string, priority: TicketPriority, suggestedFix: string | null): Ticket {
    const ticket = this.store.tickets.put({
      ticketId: newId('TKT'),
      employeeId,
      category,
      subject,
      description,
      priority,
      status: 'Open',
      createdDate: this.now().toISOString(),
      resolvedDate: null,
      resolution: null,
      suggestedFix,
      assignedTo: 'IT Support',
    });
    this.publish('ticket_created', { ticket_id: ticket.ticketId, priority, category });
    return ticket;
  }

  resolveTicket(ticketId: string, resolution: string, resolvedBy = 'IT Agent'): CapabilityResult<{ ticketId: string; resolution: string }> {
    const ticket = this.store.tickets.get(ticketId);
    if (!ticket) return fail('Ticket not found');
    if (ticket.status === 'Resolved' || ticket.status === 'Closed') return fail(`Ticket ${ticketId} is already ${ticket.status}`);

    this.store.tickets.put({
      ...ticket,
      status: 'Resolved',
      resolution,
      resolvedDate: this.now().toISOString(),
      assignedTo: resolvedBy,
    });
    this.publish('ticket_resolved', { ticket_id: ticketId });
    this.logAction('Resolve IT Ticket', { ticketId, resolution, resolvedBy });
    return ok({ ticketId, resolution });
  }

  getTicketStatus(ticketId: string): CapabilityResult<{ ticket: Ticket }> {
    const ticket = this.store.tickets.get(ticketId);
    return ticket ? ok({ ticket }) : fail('Ticket not found');
  }

  private openTickets(): Ticket[] {
    return this.store.tickets.filter(t => t.status === 'Open' || t.status === 'In Progress');
  }

  // ── Access ────────────────────────────────────────────────

  grantAccess(employeeId: string, system: string, accessLevel = 'Standard', approvedBy = 'IT Admin'): CapabilityResult<{ recordId: string; system: string; accessLevel: string }> {
    const employee = this.store.employees.get(employeeId);
    if (!employee) return fail('Employee not found');
    if (employee.status !== 'Active') return fail(`Employee ${employeeId} is no longer active`);
    if (this.activeAccess(employeeId).some(r => r.system === system)) {
      return fail(`Employee ${employeeId} already has active ${system} access`);
    }

    const record = this.store.accessRecords.put(this.accessRecord(employeeId, system, accessLevel, approvedBy));
    this.logAction('Grant Access', { recordId: record.recordId, system, accessLevel }, employeeId);
    return ok({ recordId: record.recordId, system, accessLevel });
  }

  revokeAccess(employeeId: string, system: string, reason = 'Policy change'): CapabilityResult<{ revoked: string[]; reason: string }> {
    if (!this.store.employees.get(employeeId)) return fail('Employee not found');

    const revoked = this.revokeRecords(this.activeAccess(employeeId).filter(r => r.system === system), reason);
    this.logAction('Revoke Access', { revoked, system, reason }, employeeId);
    return ok({ revoked, reason });
  }

  revokeEmployeeAccess(employeeId: string, reason = 'Employee exit'): CapabilityResult<{ employeeId: string; revoked: string[]; systems: string[] }> {
    if (!this.store.employees.get(employeeId)) return fail('Employee not found');

    const records = this.activeAccess(employeeId);
    const systems = records.map(r => r.system);
    const revoked = this.revokeRecords(records, reason);

    this.publish('access_revoked', { employee_id: employeeId, systems, reason });
    this.logAction('Revoke All Access', { revoked, systems, reason }, employeeId);
    return ok({ employeeId, revoked, systems });
  }

  private activeAccess(employeeId: string): AccessRecord[] {
    return this.store.accessRecords.list({ employeeId, status: 'Active' });
  }

  private accessRecord(employeeId: string, system: string, accessLevel: string, approvedBy: string): AccessRecord {
    return {
      recordId: newId('ACC'),
      employeeId,
      system,
      accessLevel,
      approvedBy,
      grantedDate: this.now().toISOString(),
      status: 'Active',
      revokedDate: null,
      revokeReason: null,
    };
  }

  private revokeRecords(records: AccessRecord[], reason: string): string[] {
    const revokedDate = this.now().toISOString();
    this.store.transaction(() => {
      for (const r of records) {
        this.store.accessRecords.put({ ...r, status: 'Revoked', revokedDate, revokeReason: reason });
      }
    });
    return records.map(r => r.recordId);
  }

  // ── Licences ──────────────────────────────────────────────

  manageSoftwareLicense(action: 'assign' | 'release' | 'status', software: string, employeeId?: string): CapabilityResult<{
    licenseId: string;
    softwareName: string;
    available: number;
  }> {
    const license = this.findLicense(software);
    if (!license) return fail(`No licence record for ${software}`);

    if (action === 'status') {
      return ok({ licenseId: license.licenseId, softwareName: license.softwareName, available: license.totalLicenses - license.usedLicenses });
    }

    if (!employeeId) return fail(`employeeId is required to ${action} a licence`);
    if (!this.store.employees.get(employeeId)) return fail('Employee not found');

    let updated: License;
    if (action === 'assign') {
      if (license.assignees.includes(employeeId)) return fail(`${employeeId} already holds a ${license.softwareName} licence`);
      if (license.usedLicenses >= license.totalLicenses) return fail(`No available license for ${license.softwareName}`);
      updated = { ...license, usedLicenses: license.usedLicenses + 1, assignees: [...license.assignees, employeeId] };
    } else {
      if (!license.assignees.includes(employeeId)) return fail(`${employeeId} holds no ${license.softwareName} licence`);
      updated = { ...license, usedLicenses: license.usedLicenses - 1, assignees: license.assignees.filter(a => a !== employeeId) };
    }

    this.store.licenses.put(updated);
    this.logAction('Manage License', { action, licenseId: license.licenseId, software: license.softwareName }, employeeId);
    return ok({ licenseId: updated.licenseId, softwareName: updated.softwareName, available: updated.totalLicenses - updated.usedLicenses });
  }

  private findLicense(software: string): License | null {
    const needle = software.toLowerCase();
    return this.store.licenses.list().find(l => l.softwareName.toLowerCase() === needle || l.licenseId === software) ?? null;
  }

  // ── Assets ────────────────────────────────────────────────

  trackAsset(assetId?: string, employeeId?: string): CapabilityResult<{ assets: Asset[] }> {
    if (assetId) {
      const asset = this.store.assets.get(assetId);
      return asset ? ok({ assets: [asset] }) : fail('Asset not found');
    }
    if (employeeId) {
      return ok({ assets: this.store.assets.list({ assignedTo: employeeId }) });
    }
    return fail('Provide assetId or employeeId');
  }

  assignAsset(assetId: string, employeeId: string | null): CapabilityResult<{ asset: Asset }> {
    const asset = this.store.assets.get(assetId);
    if (!asset) return fail('Asset not found');
    if (asset.status === 'Retired') return fail(`Asset ${assetId} is retired`);

    if (employeeId !== null) {
      const employee = this.store.employees.get(employeeId);
      if (!employee || employee.status !== 'Active') return fail('Employee not found');
      if (asset.assignedTo && asset.assignedTo !== employeeId) return fail(`Asset ${assetId} is assigned to ${asset.assignedTo}`);
    }

    const updated = this.store.assets.put({
      ...asset,
      assignedTo: employeeId,
      status: employeeId === null ? 'Available' : 'Assigned',
    });
    this.logAction('Assign Asset', { assetId, employeeId });
    return ok({ asset: updated });
  }

  // ── Security ──────────────────────────────────────────────

  reportSecurityIncident(description: string, severity: TicketPriority = 'High', employeeId?: string): CapabilityResult<{ incidentId: string }> {
    if (employeeId && !this.store.employees.get(employeeId)) return fail('Employee not found');

    const ticket = this.openTicket(SYSTEM_USER, 'Security', 'Security incident', `Security incident: ${description}`, 'Critical', null);
    this.logAction('Report Security Incident', { incidentId: ticket.ticketId, severity, employeeId: employeeId ?? null });
    this.publish('security_incident', {
      incident_id: ticket.ticketId,
      description,
      severity,
      employee_id: employeeId ?? null,
    });
    return ok({ incidentId: ticket.ticketId });
  }

  monitorSecurity(description?: string): CapabilityResult<{ scanId: string; findings: string[]; riskLevel: 'Low' | 'Medium' | 'High' }> {
    const findings: string[] = [];

    for (const t of this.openTickets()) {
      if (t.category === 'Security' && (t.priority === 'High' || t.priority === 'Critical')) {
        findings.push(`Open ${t.priority} security ticket ${t.ticketId}`);
      }
    }
    for (const r of this.store.accessRecords.list({ status: 'Active' })) {
      const employee = this.store.employees.get(r.employeeId);
      if (!employee || employee.status === 'Exited') {
        findings.push(`Active ${r.system} access held by inactive employee ${r.employeeId}`);
      }
    }

    const riskLevel: 'Low' | 'Medium' | 'High' = findings.length === 0 ? 'Low' : findings.length < 3 ? 'Medium' : 'High';
    const scanId = newId('SCAN');
    this.logAction('Security Scan', { scanId, findings: findings.length, riskLevel, context: description ?? null });
    return ok({ scanId, findings, riskLevel });
  }
}
