// ═══════════════════════════════════════════════════════════════
// Agent::Finance
// Expenses, payroll, budgets and reimbursements
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import { CONFIG } from '../../core/config.js';
import { daysBetween, parseIsoDate, toIsoDate } from '../../core/dates.js';
import { EmployeeOnboardedSchema, ExpenseSubmittedSchema, type DomainEventType } from '../../core/events.js';
import { newId } from '../../core/ids.js';
import { fail, isSuccess, ok, type CapabilityResult, type Payload } from '../../core/types.js';
import type { Budget, Employee, Expense, PayrollRecord } from '../../store/schemas.js';
import { BaseAgent, type AgentDeps } from '../base.js';

export interface FinanceAgentOptions {
  payScale?: Record<string, number>;
  expenseAutoApproveLimit?: number;
  budgetAlertThresholdPercent?: number;
}

// ── Inputs ──

const Amount = z.coerce.number().positive();

const SubmitExpenseInput = z.object({
  employeeId: z.string().min(1),
  category: z.string().min(1),
  amount: Amount,
  description: z.string().default(''),
  receiptUploaded: z.boolean().default(false),
});

const ApproveExpenseInput = z.object({
  claimId: z.string().min(1),
  approvedBy: z.string().min(1),
  decision: z.enum(['Approved', 'Rejected']).default('Approved'),
  notes: z.string().default(''),
});

const ClaimIdInput = z.object({ claimId: z.string().min(1) });

const PeriodInput = z.object({
  month: z.coerce.number().int().min(1).max(12),
  year: z.coerce.number().int().min(2000).max(2100),
});

const BudgetInput = z.object({
  department: z.string().min(1),
  action: z.enum(['view', 'allocate', 'spend']).default('view'),
  amount: z.coerce.number().nonnegative().default(0),
  category: z.string().default('general'),
});

const ReimbursementInput = z.object({
  claimId: z.string().min(1),
  paymentMethod: z.string().default('Direct Deposit'),
});

const FinalPayInput = z.object({
  employeeId: z.string().min(1),
  exitDate: z.string().optional(),
});

const QuestionInput = z.object({ question: z.string().min(1) });

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function periodOf(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}

export interface BudgetView {
  department: string;
  allocated: number;
  spent: number;
  remaining: number;
  utilizationPercent: number;
  alert: boolean;
}

export class FinanceAgent extends BaseAgent {
  readonly subscriptions: readonly DomainEventType[] = ['employee_onboarded', 'expense_submitted'];

  private payScale: Record<string, number>;
  private expenseLimit: number;
  private alertThreshold: number;

  constructor(deps: AgentDeps, options: FinanceAgentOptions = {}) {
    super('finance', deps);
    this.payScale = options.payScale ?? {};
    this.expenseLimit = options.expenseAutoApproveLimit ?? CONFIG.finance.expenseAutoApproveLimit;
    this.alertThreshold = options.budgetAlertThresholdPercent ?? CONFIG.finance.budgetAlertThresholdPercent;

    this.registerCapability('submitExpense',
      `Submit an expense claim; claims up to ${this.expenseLimit} are auto-approved`,
      'employeeId, category, amount, description?, receiptUploaded?',
      SubmitExpenseInput, i => this.submitExpense(i));
    this.registerCapability('approveExpense',
      'Approve or reject a pending expense claim',
      "claimId, approvedBy, decision?: 'Approved'|'Rejected', notes?",
      ApproveExpenseInput, i => this.approveExpense(i.claimId, i.approvedBy, i.decision, i.notes));
    this.registerCapability('getExpenseStatus',
      'Look up an expense claim',
      'claimId',
      ClaimIdInput, i => this.getExpenseStatus(i.claimId));
    this.registerCapability('processPayroll',
      'Run payroll for every active employee for one month',
      'month (1-12), year',
      PeriodInput, i => this.processPayroll(i.month, i.year));
    this.registerCapability('getPayrollSummary',
      'Totals for a processed payroll month',
      'month (1-12), year',
      PeriodInput, i => this.getPayrollSummary(i.month, i.year));
    this.registerCapability('manageBudget',
      'View a department budget, set its allocation or record spend',
      "department, action?: 'view'|'allocate'|'spend', amount?, category?",
      BudgetInput, i => this.manageBudget(i.department, i.action, i.amount, i.category));
    this.registerCapability('processReimbursement',
      'Pay out an approved expense and charge the department budget',
      'claimId, paymentMethod?',
      ReimbursementInput, i => this.processReimbursement(i.claimId, i.paymentMethod));
    this.registerCapability('settleFinalPay',
      'Compute the prorated final salary for an exiting employee',
      'employeeId, exitDate?',
      FinalPayInput, i => this.settleFinalPay(i.employeeId, i.exitDate));
    this.registerCapability('askFinancePolicy',
      'Answer finance policy questions',
      'question',
      QuestionInput, i => this.askFinancePolicy(i.question));
  }

  // ── Events ──

  protected onEvent(eventType: DomainEventType, payload: Payload): void {
    switch (eventType) {
      case 'employee_onboarded': {
        const parsed = EmployeeOnboardedSchema.safeParse(payload);
        if (!parsed.success) {
          this.logger.warn(`Finance Agent ignored malformed employee_onboarded: ${parsed.error.message}`);
          return;
        }
        this.setupPayroll(parsed.data.employee_id);
        break;
      }
      case 'expense_submitted': {
        const parsed = ExpenseSubmittedSchema.safeParse(payload);
        if (!parsed.success) {
          this.logger.warn(`Finance Agent ignored malformed expense_submitted: ${parsed.error.message}`);
          return;
        }
        this.reviewSubmittedExpense(parsed.data.claim_id, parsed.data.amount);
        break;
      }
      default:
        break;
    }
  }

  private setupPayroll(employeeId: string): void {
    const employee = this.store.employees.get(employeeId);
    if (!employee) {
      this.logger.warn(`Payroll setup skipped, employee ${employeeId} not found`);
      return;
    }
    const annualPay = this.annualPay(employee);
    this.logAction('Setup Payroll Record', { employeeId, position: employee.position, annualPay }, employeeId);
    this.publish('payroll_setup_complete', { employee_id: employeeId, annual_pay: annualPay });
  }

  /** Over-limit claims are flagged for a human approver */
  private reviewSubmittedExpense(claimId: string, amount: number): void {
    if (amount <= this.expenseLimit) return;
    const expense = this.store.expenses.get(claimId);
    if (!expense || expense.flagged) return;

    this.store.expenses.put({ ...expense, flagged: true });
    this.logAction('Expense Flagged for Review', { claimId, amount, limit: this.expenseLimit });
  }

  protected domainContext(): Payload {
    return {
      expenseAutoApproveLimit: this.expenseLimit,
      pendingExpenses: this.store.expenses.list({ status: 'Pending' }).length,
    };
  }

  refreshGoals(): void {
    const overspend = this.store.budgets.list()
      .filter(b => b.allocatedAmount > 0)
      .map(b => Math.max(0, ((b.spentAmount - b.allocatedAmount) / b.allocatedAmount) * 100));
    this.goals.recordMetric(this.name, 'Budget variance', round2(Math.max(0, ...overspend)));

    const turnaround: number[] = [];
    for (const r of this.store.reimbursements.list()) {
      const expense = this.store.expenses.get(r.claimId);
      if (expense) turnaround.push(daysBetween(new Date(expense.submittedDate), new Date(r.processedDate)));
    }
    if (turnaround.length > 0) {
      this.goals.recordMetric(this.name, 'Avg reimbursement time', round2(turnaround.reduce((a, b) => a + b, 0) / turnaround.length));
    }
  }

  // ── Expenses ──────────────────────────────────────────────

  submitExpense(input: z.output<typeof SubmitExpenseInput>): CapabilityResult<{ claimId: string; approvalStatus: Expense['status']; message: string }> {
    const employee = this.store.employees.get(input.employeeId);
    if (!employee) return fail('Employee not found');

    const now = this.now().toISOString();
    const autoApproved = input.amount <= this.expenseLimit;
    const expense = this.store.expenses.put({
      claimId: newId('EXP'),
      employeeId: employee.employeeId,
      category: input.category,
      amount: input.amount,
      description: input.description,
      receiptUploaded: input.receiptUploaded,
      submittedDate: now,
      status: autoApproved ? 'Approved' : 'Pending',
      approvedDate: autoApproved ? now : null,
      approver: autoApproved ? 'Auto-approval' : null,
      rejectionReason: null,
      flagged: false,
    });

    this.publish('expense_submitted', {
      claim_id: expense.claimId,
      employee_id: expense.employeeId,
      amount: expense.amount,
      category: expense.category,
      status: expense.status,
    });
    if (autoApproved) {
      this.publish('expense_approved', { claim_id: expense.claimId, employee_id: expense.employeeId, amount: expense.amount });
    }

    const message = autoApproved ? `Auto-approved (up to ${this.expenseLimit})` : 'Pending manager approval';
    this.logAction('Submit Expense', { claimId: expense.claimId, amount: expense.amount, approvalStatus: expense.status }, employee.employeeId);
    return ok({ claimId: expense.claimId, approvalStatus: expense.status, message });
  }

  approveExpense(claimId: string, approvedBy: string, decision: 'Approved' | 'Rejected' = 'Approved', notes = ''): CapabilityResult<{ claimId: string; decision: string }> {
    const expense = this.store.expenses.get(claimId);
    if (!expense) return fail('Expense not found');
    if (expense.status !== 'Pending') return fail(`Expense ${claimId} is already ${expense.status}`);

    this.store.expenses.put({
      ...expense,
      status: decision,
      approver: approvedBy,
      approvedDate: this.now().toISOString(),
      rejectionReason: decision === 'Rejected' ? notes || 'Rejected by approver' : null,
    });

    if (decision === 'Approved') {
      this.publish('expense_approved', { claim_id: claimId, employee_id: expense.employeeId, amount: expense.amount });
    }
    this.logAction('Approve Expense', { claimId, decision, notes }, approvedBy);
    return ok({ claimId, decision });
  }

  getExpenseStatus(claimId: string): CapabilityResult<{ claimId: string; approvalStatus: Expense['status']; amount: number; flagged: boolean }> {
    const expense = this.store.expenses.get(claimId);
    if (!expense) return fail('Expense not found');
    return ok({ claimId, approvalStatus: expense.status, amount: expense.amount, flagged: expense.flagged });
  }

  // ── Payroll ───────────────────────────────────────────────

  private annualPay(employee: Employee): number {
    return this.payScale[employee.position] ?? CONFIG.finance.defaultAnnualPay;
  }

  private payrollRecord(employee: Employee, period: string, kind: PayrollRecord['kind'], gross: number): PayrollRecord {
    const grossSalary = round2(gross);
    const deductions = round2(grossSalary * CONFIG.finance.payrollDeductionRate);
    return {
      recordId: `PAY-${period}-${employee.employeeId}${kind === 'Final' ? '-FINAL' : ''}`,
      employeeId: employee.employeeId,
      period,
      kind,
      grossSalary,
      deductions,
      netSalary: round2(grossSalary - deductions),
      status: 'Processed',
      processedDate: this.now().toISOString(),
    };
  }

  /** Re-running a month only pays employees not yet paid for it */
  processPayroll(month: number, year: number): CapabilityResult<{
    period: string;
    totalEmployees: number;
    totalPayroll: number;
    records: Array<{ employeeId: string; netSalary: number }>;
    skipped: string[];
  }> {
    const period = periodOf(year, month);
    const records: PayrollRecord[] = [];
    const skipped: string[] = [];

    this.store.transaction(() => {
      for (const employee of this.store.employees.list({ status: 'Active' })) {
        const record = this.payrollRecord(employee, period, 'Regular', this.annualPay(employee) / 12);
        if (this.store.payroll.get(record.recordId)) {
          skipped.push(employee.employeeId);
          continue;
        }
        records.push(this.store.payroll.put(record));
      }
    });

    const totalPayroll = round2(records.reduce((sum, r) => sum + r.netSalary, 0));
    this.publish('payroll_processed', { period, total_employees: records.length, total_payroll: totalPayroll });
    this.logAction('Process Payroll', { period, processed: records.length, skipped: skipped.length });
    return ok({
      period,
      totalEmployees: records.length,
      totalPayroll,
      records: records.map(r => ({ employeeId: r.employeeId, netSalary: r.netSalary })),
      skipped,
    });
  }

  getPayrollSummary(month: number, year: number): CapabilityResult<{ period: string; totalEmployees: number; totalPayroll: number }> {
    const period = periodOf(year, month);
    const records = this.store.payroll.list({ period });
    return ok({
      period,
      totalEmployees: records.length,
      totalPayroll: round2(records.reduce((sum, r) => sum + r.netSalary, 0)),
    });
  }

  settleFinalPay(employeeId: string, exitDate?: string): CapabilityResult<{
    employeeId: string;
    recordId: string;
    netSalary: number;
    pendingReimbursements: number;
  }> {
    const employee = this.store.employees.get(employeeId);
    if (!employee) return fail('Employee not found');

    const exitIso = exitDate ?? employee.exitDate ?? toIsoDate(this.now());
    const exit = parseIsoDate(exitIso);
    if (!exit) return fail('Invalid exit date, expected YYYY-MM-DD');

    // Prorate the exit month by calendar days worked
    const daysInMonth = new Date(Date.UTC(exit.getUTCFullYear(), exit.getUTCMonth() + 1, 0)).getUTCDate();
    const monthly = this.annualPay(employee) / 12;
    const record = this.payrollRecord(
      employee,
      periodOf(exit.getUTCFullYear(), exit.getUTCMonth() + 1),
      'Final',
      (monthly * exit.getUTCDate()) / daysInMonth,
    );
    if (this.store.payroll.get(record.recordId)) return fail(`Final pay for ${employeeId} already settled`);

    const pendingReimbursements = round2(
      this.store.expenses.list({ employeeId, status: 'Approved' }).reduce((sum, e) => sum + e.amount, 0),
    );

    this.store.payroll.put(record);
    this.publish('final_pay_settled', {
      employee_id: employeeId,
      net_salary: record.netSalary,
      pending_reimbursements: pendingReimbursements,
    });
    this.logAction('Settle Final Pay', { recordId: record.recordId, netSalary: record.netSalary, pendingReimbursements }, employeeId);
    return ok({ employeeId, recordId: record.recordId, netSalary: record.netSalary, pendingReimbursements });
  }

  // ── Budgets ───────────────────────────────────────────────

  manageBudget(department: string, action: 'view' | 'allocate' | 'spend' = 'view', amount = 0, category = 'general'): CapabilityResult<BudgetView> {
    const budget = this.store.findBudget(department);

    if (action === 'view') {
      return budget ? ok(this.view(budget, false)) : fail(`No budget for ${department}`);
    }
    if (amount <= 0) return fail('Amount must be greater than zero');

    let updated: Budget;
    if (action === 'allocate') {
      updated = budget
        ? { ...budget, allocatedAmount: amount }
        : {
            budgetId: `BUD-${department.slice(0, 3).toUpperCase()}`,
            department,
            fiscalYear: String(this.now().getUTCFullYear()),
            allocatedAmount: amount,
            spentAmount: 0,
            categoryBreakdown: {},
          };
    } else {
      if (!budget) return fail(`No budget for ${department}`);
      updated = this.charge(budget, amount, category);
    }

    this.store.budgets.put(updated);
    this.logAction(action === 'allocate' ? 'Allocate Budget' : 'Record Spend', { department: updated.department, amount, category });
    return ok(this.view(updated, this.checkUtilization(updated)));
  }

  private charge(budget: Budget, amount: number, category: string): Budget {
    return {
      ...budget,
      spentAmount: round2(budget.spentAmount + amount),
      categoryBreakdown: {
        ...budget.categoryBreakdown,
        [category]: round2((budget.categoryBreakdown[category] ?? 0) + amount),
      },
    };
  }

  private utilization(budget: Budget): number {
    return budget.allocatedAmount > 0 ? round2((budget.spentAmount / budget.allocatedAmount) * 100) : 0;
  }

  /** Publishes budget_alert when spend reaches the alert threshold */
  private checkUtilization(budget: Budget): boolean {
    const utilization = this.utilization(budget);
    if (utilization < this.alertThreshold) return false;

    this.logger.warn(`Budget ${budget.department} at ${utilization}% utilization`);
    this.publish('budget_alert', {
      department: budget.department,
      utilization_percent: utilization,
      allocated: budget.allocatedAmount,
      spent: budget.spentAmount,
    });
    return true;
  }

  private view(budget: Budget, alert: boolean): BudgetView {
    return {
      department: budget.department,
      allocated: budget.allocatedAmount,
      spent: budget.spentAmount,
      remaining: round2(budget.allocatedAmount - budget.spentAmount),
      utilizationPercent: this.utilization(budget),
      alert,
    };
  }

  // ── Reimbursements ────────────────────────────────────────

  processReimbursement(claimId: string, paymentMethod = 'Direct Deposit'): CapabilityResult<{
    reimbursementId: string;
    amount: number;
    budgetCharged: boolean;
  }> {
    const expense = this.store.expenses.get(claimId);
    if (!expense) return fail('Expense not found');
    if (expense.status !== 'Approved') return fail('Expense not approved');

    const employee = this.store.employees.get(expense.employeeId);
    const budget = employee ? this.store.findBudget(employee.department) : null;
    const reimbursementId = newId('RMB');

    const charged = this.store.transaction(() => {
      this.store.reimbursements.put({
        reimbursementId,
        employeeId: expense.employeeId,
        claimId,
        amount: expense.amount,
        processedDate: this.now().toISOString(),
        paymentMethod,
        status: 'Processed',
      });
      this.store.expenses.put({ ...expense, status: 'Reimbursed' });
      return budget ? this.store.budgets.put(this.charge(budget, expense.amount, expense.category)) : null;
    });

    this.publish('reimbursement_processed', {
      reimbursement_id: reimbursementId,
      claim_id: claimId,
      employee_id: expense.employeeId,
      amount: expense.amount,
    });
    if (charged) this.checkUtilization(charged);

    this.logAction('Process Reimbursement', { reimbursementId, claimId, amount: expense.amount }, expense.employeeId);
    return ok({ reimbursementId, amount: expense.amount, budgetCharged: budget !== null });
  }

  // ── Policy ────────────────────────────────────────────────

  async askFinancePolicy(question: string): Promise<CapabilityResult<{ question: string; answer: string }>> {
    const result = await this.askPolicy(question, 'finance');
    if (isSuccess(result)) this.logAction('Finance Policy Question', { question });
    return result;
  }
}
