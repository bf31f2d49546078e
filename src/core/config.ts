// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: System Configuration
// ═══════════════════════════════════════════════════════════════

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

function env(key: string, fallback?: string): string {
  const v = process.env[key];
  if (!v && fallback === undefined) throw new Error(`Missing env: ${key}`);
  return v || fallback || '';
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']).catch('info');

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const CONFIG = {
  // ── Language Model ──
  anthropic: {
    apiKey: env('ANTHROPIC_API_KEY', ''),
    model: env('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    analysisModel: env('ANTHROPIC_ANALYSIS_MODEL', 'claude-3-5-sonnet-latest'),
    maxTokens: 800,
    temperature: 0.7,
    timeoutMs: parseInt(env('LLM_TIMEOUT_MS', '30000')),
    maxRetries: 1,
  },

  // ── Gateway ──
  gateway: {
    port: parseInt(env('GATEWAY_PORT', '8420')),
    host: env('GATEWAY_HOST', '127.0.0.1'),
  },

  // ── Database ──
  database: {
    path: env('SQLITE_PATH', path.join(process.cwd(), 'data', 'workforce-agents.db')),
  },

  // ── Logging ──
  logging: {
    level: LogLevelSchema.parse(env('LOG_LEVEL', 'info')),
    dir: env('LOG_DIR', path.join(process.cwd(), 'logs')),
  },

  // ── Data Files ──
  data: {
    seedPath: path.join(process.cwd(), 'config', 'seed.json'),
    resumeKeywordsPath: path.join(process.cwd(), 'config', 'resume-keywords.json'),
  },

  // ── System Prompt ──
  systemPrompt: {
    path: path.join(process.cwd(), 'config', 'system-prompt.md'),
  },

  // ══════════════════════════════════════════════════════════
  // POLICY KNOBS
  // ══════════════════════════════════════════════════════════

  // ── HR ──
  hr: {
    leaveAutoApproveMaxDays: parseInt(env('LEAVE_AUTO_APPROVE_MAX_DAYS', '10')),
    defaultLeaveBalance: { 'Casual Leave': 12, 'Sick Leave': 15, 'Annual Leave': 20 },
    candidateAcceptThreshold: parseFloat(env('CANDIDATE_ACCEPT_THRESHOLD', '50')),
    candidateReviewThreshold: parseFloat(env('CANDIDATE_REVIEW_THRESHOLD', '40')),
    experiencePenalty: 0.7,
    educationPenalty: 0.8,
    auditPendingDays: parseInt(env('AUDIT_PENDING_DAYS', '7')),
    auditWindowDays: 30,
    portalUrl: env('EMPLOYEE_PORTAL_URL', 'http://localhost:8420/portal'),
    emailDomain: env('EMPLOYEE_EMAIL_DOMAIN', 'company.example'),
  },

  // ── IT ──
  it: {
    standardSystems: ['Email', 'VPN', 'JIRA', 'Slack'],
  },

  // ── Finance ──
  finance: {
    expenseAutoApproveLimit: parseFloat(env('EXPENSE_AUTO_APPROVE_LIMIT', '5000')),
    budgetAlertThresholdPercent: parseFloat(env('BUDGET_ALERT_THRESHOLD_PERCENT', '90')),
    defaultAnnualPay: 60000,
    payrollDeductionRate: 0.1,
  },

  // ── Compliance ──
  compliance: {
    trainingOverdueDays: parseInt(env('TRAINING_OVERDUE_DAYS', '30')),
    mandatoryTrainings: ['Code of Conduct', 'Data Privacy', 'Anti-Harassment'],
  },

  // ── Coordination ──
  orchestrator: {
    escalationConfidenceThreshold: parseFloat(env('ESCALATION_CONFIDENCE_THRESHOLD', '0.6')),
    workflowHistoryLimit: 100,
  },

  eventBus: {
    maxCascadeDepth: parseInt(env('MAX_CASCADE_DEPTH', '8')),
    maxLogSize: 10000,
  },

  learning: {
    maxDecisions: parseInt(env('LEARNING_MAX_DECISIONS', '500')),
    maxOverrides: parseInt(env('LEARNING_MAX_OVERRIDES', '100')),
  },
} as const;

export type Config = typeof CONFIG;
