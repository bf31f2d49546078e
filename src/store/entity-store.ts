// ═══════════════════════════════════════════════════════════════
// Store :: Entity Store
// CRUD-by-id collections over a single SQLite entities table
// ═══════════════════════════════════════════════════════════════

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { LoggerHandle } from '../core/types.js';
import {
  AccessRecordSchema, AssetSchema, BudgetSchema, CandidateSchema, ComplianceAuditSchema,
  EmployeeSchema, ExpenseSchema, JobPositionSchema, LeaveRequestSchema, LicenseSchema,
  PayrollRecordSchema, PolicySchema, ReimbursementSchema, TicketSchema, TrainingRecordSchema,
  ViolationSchema,
  type AccessRecord, type Asset, type Budget, type Candidate, type ComplianceAudit,
  type Employee, type Expense, type JobPosition, type LeaveRequest, type License,
  type PayrollRecord, type Policy, type Reimbursement, type Ticket, type TrainingRecord,
  type Violation,
} from './schemas.js';

const DataRow = z.object({ data: z.string() });
const CountRow = z.object({ c: z.number() });

type Entity = Record<string, unknown>;

export class Collection<T extends Entity> {
  constructor(
    private db: Database.Database,
    readonly kind: string,
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private idOf: (entity: T) => string,
  ) {}

  get(id: string): T | null {
    const row = this.db.prepare('SELECT data FROM entities WHERE kind = ? AND id = ?').get(this.kind, id);
    return row === undefined ? null : this.decode(row);
  }

  /** Insert or replace by id; replaced entities keep their original position */
  put(entity: T): T {
    const valid = this.schema.parse(entity);
    this.db.prepare(`
      INSERT INTO entities (kind, id, data, updated_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(kind, id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
    `).run(this.kind, this.idOf(valid), JSON.stringify(valid), new Date().toISOString());
    return valid;
  }

  /** All entities in insertion order, optionally filtered by attribute equality */
  list(where: Partial<T> = {}): T[] {
    const rows = this.db.prepare('SELECT data FROM entities WHERE kind = ? ORDER BY seq ASC').all(this.kind);
    const all = rows.map(r => this.decode(r));
    const criteria = Object.entries(where);
    if (criteria.length === 0) return all;
    return all.filter(e => criteria.every(([key, value]) => e[key] === value));
  }

  filter(predicate: (entity: T) => boolean): T[] {
    return this.list().filter(predicate);
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM entities WHERE kind = ? AND id = ?').run(this.kind, id).changes > 0;
  }

  count(): number {
    return CountRow.parse(this.db.prepare('SELECT COUNT(*) as c FROM entities WHERE kind = ?').get(this.kind)).c;
  }

  private decode(row: unknown): T {
    return this.schema.parse(JSON.parse(DataRow.parse(row).data));
  }
}

export class EntityStore {
  readonly employees: Collection<Employee>;
  readonly leaveRequests: Collection<LeaveRequest>;
  readonly jobPositions: Collection<JobPosition>;
  readonly candidates: Collection<Candidate>;
  readonly tickets: Collection<Ticket>;
  readonly accessRecords: Collection<AccessRecord>;
  readonly licenses: Collection<License>;
  readonly assets: Collection<Asset>;
  readonly expenses: Collection<Expense>;
  readonly payroll: Collection<PayrollRecord>;
  readonly budgets: Collection<Budget>;
  readonly reimbursements: Collection<Reimbursement>;
  readonly violations: Collection<Violation>;
  readonly trainings: Collection<TrainingRecord>;
  readonly audits: Collection<ComplianceAudit>;
  readonly policies: Collection<Policy>;

  private db: Database.Database;
  private logger: LoggerHandle;

  constructor(db: Database.Database, logger: LoggerHandle) {
    this.db = db;
    this.logger = logger;
    this.initSchema();

    this.employees = new Collection(db, 'employee', EmployeeSchema, e => e.employeeId);
    this.leaveRequests = new Collection(db, 'leave_request', LeaveRequestSchema, e => e.requestId);
    this.jobPositions = new Collection(db, 'job_position', JobPositionSchema, e => e.jobId);
    this.candidates = new Collection(db, 'candidate', CandidateSchema, e => e.candidateId);
    this.tickets = new Collection(db, 'it_ticket', TicketSchema, e => e.ticketId);
    this.accessRecords = new Collection(db, 'access_record', AccessRecordSchema, e => e.recordId);
    this.licenses = new Collection(db, 'software_license', LicenseSchema, e => e.licenseId);
    this.assets = new Collection(db, 'it_asset', AssetSchema, e => e.assetId);
    this.expenses = new Collection(db, 'expense_claim', ExpenseSchema, e => e.claimId);
    this.payroll = new Collection(db, 'payroll_record', PayrollRecordSchema, e => e.recordId);
    this.budgets = new Collection(db, 'budget', BudgetSchema, e => e.budgetId);
    this.reimbursements = new Collection(db, 'reimbursement', ReimbursementSchema, e => e.reimbursementId);
    this.violations = new Collection(db, 'violation', ViolationSchema, e => e.violationId);
    this.trainings = new Collection(db, 'training_record', TrainingRecordSchema, e => e.recordId);
    this.audits = new Collection(db, 'compliance_audit', ComplianceAuditSchema, e => e.auditId);
    this.policies = new Collection(db, 'policy', PolicySchema, e => e.policyId);

    this.logger.info('EntityStore initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS entities (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL,
        id TEXT NOT NULL,
        data TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(kind, id)
      );

      CREATE INDEX IF NOT EXISTS idx_entities_kind ON entities(kind);
    `);
  }

  /** Run several writes as one unit; a throw rolls all of them back */
  transaction<R>(fn: () => R): R {
    return this.db.transaction(fn)();
  }

  // ── Lookups shared by several agents ──

  findEmployeeByName(fragment: string): Employee | null {
    const needle = fragment.toLowerCase();
    return this.employees.list().find(e => e.name.toLowerCase().includes(needle)) ?? null;
  }

  findBudget(department: string): Budget | null {
    return this.budgets.list().find(b => b.department.toLowerCase() === department.toLowerCase()) ?? null;
  }
}
