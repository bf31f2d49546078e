// ═══════════════════════════════════════════════════════════════
// Test Utilities :: Shared Mocks and Fixtures
// ═══════════════════════════════════════════════════════════════

import Database from 'better-sqlite3';
import { expect, vi } from 'vitest';
import type { GenerateOptions, LanguageModel } from '../core/llm-service.js';
import type { CapabilityResult, CapabilitySuccess, LoggerHandle } from '../core/types.js';
import type { SeedData } from '../store/seed.js';
import { createAgentSystem, type AgentSystem, type AgentSystemOptions } from '../system.js';

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerHandle;
}

export function createTestDb(): Database.Database {
  return new Database(':memory:');
}

// ── Language Model Stub ─────────────────────────────────────

export interface StubCall {
  prompt: string;
  options: GenerateOptions;
}

/**
 * Scripted model: each generate() call consumes the next queued reply,
 * then falls back to `defaultReply`.
 */
export class StubLanguageModel implements LanguageModel {
  readonly calls: StubCall[] = [];
  private queue: string[];
  private available: boolean;
  defaultReply: string;

  constructor(replies: string[] = [], options: { available?: boolean; defaultReply?: string } = {}) {
    this.queue = [...replies];
    this.available = options.available ?? true;
    this.defaultReply = options.defaultReply ?? 'stub reply';
  }

  enqueue(...replies: string[]): void {
    this.queue.push(...replies);
  }

  isAvailable(): boolean {
    return this.available;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    return this.queue.shift() ?? this.defaultReply;
  }

  async generateStructured(prompt: string, systemPrompt = ''): Promise<string> {
    return this.generate(prompt, { systemPrompt, model: 'analysis' });
  }
}

export function createStubLLM(replies: string[] = [], options: { available?: boolean; defaultReply?: string } = {}): StubLanguageModel {
  return new StubLanguageModel(replies, options);
}

/** A plan reply in the shape agents ask the model for */
export function planReply(
  confidence: number,
  steps: Array<{ tool: string; parameters?: Record<string, unknown> }> = [],
  reasoning = 'test reasoning',
  directResponse: string | null = null,
): string {
  return JSON.stringify({
    reasoning,
    confidence,
    steps: steps.map(s => ({ tool: s.tool, parameters: s.parameters ?? {} })),
    direct_response: directResponse,
  });
}

// ── Result Assertions ───────────────────────────────────────

export function expectSuccess<T extends object>(result: CapabilityResult<T>): CapabilitySuccess<T> {
  if (result.status !== 'success') {
    throw new Error(`Expected success, got error: ${result.message}`);
  }
  return result;
}

export function expectError(result: CapabilityResult, messagePart?: string): void {
  expect(result.status).toBe('error');
  if (messagePart !== undefined && result.status === 'error') {
    expect(result.message).toContain(messagePart);
  }
}

// ── Fixtures ────────────────────────────────────────────────

export function testSeed(): SeedData {
  return {
    employees: [
      {
        employeeId: 'EMP001',
        name: 'Test Person',
        email: 'test.person@example.com',
        department: 'Engineering',
        position: 'Senior Developer',
        joinDate: '2024-01-15',
        status: 'Active',
        leaveBalance: { 'Casual Leave': 12, 'Sick Leave': 15, 'Annual Leave': 20 },
      },
      {
        employeeId: 'EMP002',
        name: 'Sample Worker',
        email: 'sample.worker@example.com',
        department: 'Marketing',
        position: 'Marketing Manager',
        joinDate: '2023-06-01',
        status: 'Active',
        leaveBalance: { 'Casual Leave': 2, 'Sick Leave': 15, 'Annual Leave': 20 },
      },
    ],
    jobPositions: [
      {
        jobId: 'JOB001',
        title: 'Backend Developer',
        department: 'Engineering',
        description: 'Builds services',
        requiredSkills: ['Python', 'SQL', 'Docker', 'AWS'],
        minExperience: 3,
        minEducation: "Bachelor's Degree",
        status: 'Active',
      },
    ],
    budgets: [
      {
        budgetId: 'BUD001',
        department: 'Engineering',
        fiscalYear: '2026',
        allocatedAmount: 100000,
        spentAmount: 50000,
        categoryBreakdown: {},
      },
      {
        budgetId: 'BUD002',
        department: 'Marketing',
        fiscalYear: '2026',
        allocatedAmount: 10000,
        spentAmount: 8500,
        categoryBreakdown: {},
      },
    ],
    licenses: [
      {
        licenseId: 'LIC001',
        softwareName: 'Editor Pro',
        totalLicenses: 2,
        usedLicenses: 1,
        costPerLicense: 100,
        renewalDate: '2027-01-01',
        assignees: ['EMP002'],
      },
    ],
    assets: [
      { assetId: 'ASSET001', assetType: 'Laptop', model: 'Test Book 14', assignedTo: null, status: 'Available' },
    ],
    payScale: { 'Senior Developer': 96000, 'Marketing Manager': 84000 },
    policies: [
      { policyId: 'leave', domain: 'hr', text: 'Casual leave: 12 days per year.' },
      { policyId: 'expense', domain: 'finance', text: 'Claims up to 5000 are approved automatically.' },
      { policyId: 'security', domain: 'it', text: 'Report incidents within one hour.' },
      { policyId: 'conduct', domain: 'compliance', text: 'Annual code of conduct training is mandatory.' },
    ],
  };
}

// ── Assembled System ────────────────────────────────────────

export const TEST_NOW = new Date('2026-03-10T09:00:00.000Z');

export interface TestSystem extends AgentSystem {
  llm: StubLanguageModel;
  logger: ReturnType<typeof createMockLogger>;
}

/** Full system on an in-memory database, the test seed, a scripted model and a fixed clock */
export function createTestSystem(options: Omit<AgentSystemOptions, 'llm' | 'logger'> & { llm?: StubLanguageModel } = {}): TestSystem {
  const llm = options.llm ?? createStubLLM([], { available: false });
  const logger = createMockLogger();
  const system = createAgentSystem({
    db: createTestDb(),
    seed: testSeed(),
    now: () => TEST_NOW,
    ...options,
    llm,
    logger,
  });
  return { ...system, llm, logger };
}
