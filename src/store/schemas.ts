// ═══════════════════════════════════════════════════════════════
// Store :: Entity Schemas
// Validated on every read from the entities table
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';

// ── HR ──────────────────────────────────────────────────────

export const EmployeeSchema = z.object({
  employeeId: z.string(),
  name: z.string(),
  email: z.string(),
  department: z.string(),
  position: z.string(),
  joinDate: z.string(),
  status: z.enum(['Active', 'Exited']),
  leaveBalance: z.record(z.string(), z.number()),
  exitDate: z.string().nullable().optional(),
});

export const LEAVE_TYPES = ['Casual Leave', 'Sick Leave', 'Annual Leave'] as const;

export const LeaveRequestSchema = z.object({
  requestId: z.string(),
  employeeId: z.string(),
  employeeName: z.string(),
  leaveType: z.enum(LEAVE_TYPES),
  startDate: z.string(),
  endDate: z.string(),
  days: z.number(),
  reason: z.string(),
  status: z.enum(['Pending', 'Approved', 'Rejected']),
  submittedDate: z.string(),
  processedDate: z.string().nullable(),
});

export const JobPositionSchema = z.object({
  jobId: z.string(),
  title: z.string(),
  department: z.string(),
  description: z.string(),
  requiredSkills: z.array(z.string()),
  minExperience: z.number(),
  minEducation: z.string(),
  status: z.enum(['Active', 'Closed']),
});

export const CandidateEvaluationSchema = z.object({
  score: z.number(),
  skillMatchPercentage: z.number(),
  matchedSkills: z.array(z.string()),
  experienceMet: z.boolean(),
  educationMet: z.boolean(),
  decision: z.enum(['Accepted', 'Pending Review', 'Rejected']),
  message: z.string(),
  evaluatedDate: z.string(),
});

export const CandidateSchema = z.object({
  candidateId: z.string(),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  appliedPosition: z.string(),
  resumeText: z.string(),
  extractedSkills: z.array(z.string()),
  experienceYears: z.number(),
  education: z.string(),
  applicationDate: z.string(),
  status: z.enum(['Pending', 'Accepted', 'Pending Review', 'Rejected', 'Hired']),
  evaluation: CandidateEvaluationSchema.nullable(),
});

// ── IT ──────────────────────────────────────────────────────

export const TICKET_PRIORITIES = ['Low', 'Medium', 'High', 'Critical'] as const;

export const TicketSchema = z.object({
  ticketId: z.string(),
  employeeId: z.string(),
  category: z.string(),
  subject: z.string(),
  description: z.string(),
  priority: z.enum(TICKET_PRIORITIES),
  status: z.enum(['Open', 'In Progress', 'Resolved', 'Closed']),
  createdDate: z.string(),
  resolvedDate: z.string().nullable(),
  resolution: z.string().nullable(),
  suggestedFix: z.string().nullable(),
  assignedTo: z.string(),
});

export const AccessRecordSchema = z.object({
  recordId: z.string(),
  employeeId: z.string(),
  system: z.string(),
  accessLevel: z.string(),
  approvedBy: z.string(),
  grantedDate: z.string(),
  status: z.enum(['Active', 'Revoked']),
  revokedDate: z.string().nullable(),
  revokeReason: z.string().nullable(),
});

export const LicenseSchema = z.object({
  licenseId: z.string(),
  softwareName: z.string(),
  totalLicenses: z.number(),
  usedLicenses: z.number(),
  costPerLicense: z.number(),
  renewalDate: z.string(),
  assignees: z.array(z.string()),
});

export const AssetSchema = z.object({
  assetId: z.string(),
  assetType: z.string(),
  model: z.string(),
  assignedTo: z.string().nullable(),
  status: z.enum(['Available', 'Assigned', 'Repair', 'Retired']),
});

// ── Finance ─────────────────────────────────────────────────

export const ExpenseSchema = z.object({
  claimId: z.string(),
  employeeId: z.string(),
  category: z.string(),
  amount: z.number(),
  description: z.string(),
  receiptUploaded: z.boolean(),
  submittedDate: z.string(),
  status: z.enum(['Pending', 'Approved', 'Rejected', 'Reimbursed']),
  approvedDate: z.string().nullable(),
  approver: z.string().nullable(),
  rejectionReason: z.string().nullable(),
  flagged: z.boolean(),
});

export const PayrollRecordSchema = z.object({
  recordId: z.string(),
  employeeId: z.string(),
  period: z.string(),
  kind: z.enum(['Regular', 'Final']),
  grossSalary: z.number(),
  deductions: z.number(),
  netSalary: z.number(),
  status: z.enum(['Processed', 'Paid']),
  processedDate: z.string(),
});

export const BudgetSchema = z.object({
  budgetId: z.string(),
  department: z.string(),
  fiscalYear: z.string(),
  allocatedAmount: z.number(),
  spentAmount: z.number(),
  categoryBreakdown: z.record(z.string(), z.number()),
});

export const ReimbursementSchema = z.object({
  reimbursementId: z.string(),
  employeeId: z.string(),
  claimId: z.string(),
  amount: z.number(),
  processedDate: z.string(),
  paymentMethod: z.string(),
  status: z.enum(['Processed', 'Completed']),
});

// ── Compliance ──────────────────────────────────────────────

export const SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const;

export const ViolationSchema = z.object({
  violationId: z.string(),
  violationType: z.string(),
  employeeId: z.string().nullable(),
  description: z.string(),
  severity: z.enum(SEVERITIES),
  detectedDate: z.string(),
  detectedBy: z.string(),
  status: z.enum(['Open', 'Under Review', 'Resolved', 'Dismissed']),
  resolution: z.string().nullable(),
  resolvedDate: z.string().nullable(),
});

export const TrainingRecordSchema = z.object({
  recordId: z.string(),
  employeeId: z.string(),
  trainingName: z.string(),
  required: z.boolean(),
  status: z.enum(['Not Started', 'In Progress', 'Completed', 'Overdue']),
  dueDate: z.string(),
  completedDate: z.string().nullable(),
  score: z.number().nullable(),
});

export const ComplianceAuditSchema = z.object({
  auditId: z.string(),
  auditDate: z.string(),
  scope: z.string(),
  status: z.enum(['COMPLIANT', 'ISSUES_FOUND']),
  findings: z.array(z.string()),
  score: z.number(),
});

export const PolicySchema = z.object({
  policyId: z.string(),
  domain: z.enum(['hr', 'it', 'finance', 'compliance']),
  text: z.string(),
});

export type Employee = z.infer<typeof EmployeeSchema>;
export type LeaveType = (typeof LEAVE_TYPES)[number];
export type LeaveRequest = z.infer<typeof LeaveRequestSchema>;
export type JobPosition = z.infer<typeof JobPositionSchema>;
export type CandidateEvaluation = z.infer<typeof CandidateEvaluationSchema>;
export type Candidate = z.infer<typeof CandidateSchema>;
export type Ticket = z.infer<typeof TicketSchema>;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];
export type AccessRecord = z.infer<typeof AccessRecordSchema>;
export type License = z.infer<typeof LicenseSchema>;
export type Asset = z.infer<typeof AssetSchema>;
export type Expense = z.infer<typeof ExpenseSchema>;
export type PayrollRecord = z.infer<typeof PayrollRecordSchema>;
export type Budget = z.infer<typeof BudgetSchema>;
export type Reimbursement = z.infer<typeof ReimbursementSchema>;
export type Severity = (typeof SEVERITIES)[number];
export type Violation = z.infer<typeof ViolationSchema>;
export type TrainingRecord = z.infer<typeof TrainingRecordSchema>;
export type ComplianceAudit = z.infer<typeof ComplianceAuditSchema>;
export type Policy = z.infer<typeof PolicySchema>;
