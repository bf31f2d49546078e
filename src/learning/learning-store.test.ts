import { describe, it, expect, beforeEach } from 'vitest';
import { LearningStore } from './learning-store.js';
import { createMockLogger, createTestDb } from '../test-utils/mocks.js';

describe('LearningStore', () => {
  let store: LearningStore;

  beforeEach(() => {
    store = new LearningStore('HR Agent', null, createMockLogger(), {
      now: () => new Date('2026-06-01T12:00:00.000Z'),
    });
  });

  it('should record decisions with an id and no outcome', () => {
    const record = store.recordDecision('approve leave', { employee_id: 'EMP001' }, 'processLeaveRequest', 0.9);

    expect(record.id).toMatch(/^DEC/);
    expect(record).toMatchObject({
      agent: 'HR Agent',
      task: 'approve leave',
      decision: 'processLeaveRequest',
      confidence: 0.9,
      outcome: null,
      timestamp: new Date('2026-06-01T12:00:00.000Z'),
    });
    expect(store.getDecision(record.id)).toBe(record);
  });

  it('should link overrides to their decision and mark the outcome', () => {
    const record = store.recordDecision('approve leave', {}, 'approve', 0.5);

    const override = store.recordOverride(record.id, 'approve', 'reject', 'team is short-staffed');

    expect(override).toMatchObject({ decisionId: record.id, originalDecision: 'approve', adminDecision: 'reject' });
    expect(store.getDecision(record.id)?.outcome).toBe('overridden');
    expect(store.getOverrides()).toHaveLength(1);
  });

  it('should reject overrides for unknown decisions', () => {
    expect(() => store.recordOverride('DEC-missing', 'a', 'b', 'c')).toThrow('Unknown decision id for HR Agent: DEC-missing');
    expect(store.getOverrides()).toEqual([]);
  });

  it('should update outcomes of known decisions only', () => {
    const record = store.recordDecision('task', {}, 'x', 0.8);

    expect(store.updateOutcome(record.id, 'confirmed')).toBe(true);
    expect(store.getDecision(record.id)?.outcome).toBe('confirmed');
    expect(store.updateOutcome('DEC-missing', 'confirmed')).toBe(false);
  });

  it('should keep only the newest decisions', () => {
    const small = new LearningStore('IT Agent', null, createMockLogger(), { maxDecisions: 2 });
    small.recordDecision('one', {}, 'a', 1);
    small.recordDecision('two', {}, 'b', 1);
    small.recordDecision('three', {}, 'c', 1);

    expect(small.getDecisions().map(d => d.task)).toEqual(['two', 'three']);
    expect(small.getDecisions(1).map(d => d.task)).toEqual(['three']);
  });

  it('should rank relevant examples by shared words and skip unrelated ones', () => {
    store.recordDecision('reset vpn password', {}, 'a', 1);
    store.recordDecision('order lunch', {}, 'b', 1);
    store.recordDecision('reset email password now', {}, 'c', 1);
    store.recordDecision('password policy', {}, 'd', 1);

    const examples = store.getRelevantExamples('Reset my email password', 3);

    expect(examples.map(e => e.decision)).toEqual(['c', 'a', 'd']);
    expect(store.getRelevantExamples('nothing shared', 3)).toEqual([]);
    expect(store.getRelevantExamples('password', 0)).toEqual([]);
  });

  it('should report zeroed stats when empty', () => {
    expect(store.getPerformanceStats()).toEqual({
      totalDecisions: 0,
      totalOverrides: 0,
      overrideRatePercent: 0,
      averageConfidence: 0,
    });
  });

  it('should compute override rate and average confidence', () => {
    const a = store.recordDecision('a', {}, 'x', 0.9);
    store.recordDecision('b', {}, 'y', 0.6);
    store.recordDecision('c', {}, 'z', 0.7);
    store.recordOverride(a.id, 'x', 'w', 'wrong');

    expect(store.getPerformanceStats()).toEqual({
      totalDecisions: 3,
      totalOverrides: 1,
      overrideRatePercent: 33.33,
      averageConfidence: 0.73,
    });
  });

  it('should restore history from the database for the same agent only', () => {
    const db = createTestDb();
    const first = new LearningStore('Finance Agent', db, createMockLogger());
    const decision = first.recordDecision('approve expense', { amount: 10 }, 'submitExpense', 0.95);
    first.recordOverride(decision.id, 'submitExpense', 'rejectExpense', 'duplicate claim');
    new LearningStore('IT Agent', db, createMockLogger()).recordDecision('reset', {}, 'x', 1);

    const reopened = new LearningStore('Finance Agent', db, createMockLogger());

    expect(reopened.getDecisions()).toHaveLength(1);
    expect(reopened.getDecision(decision.id)?.outcome).toBe('overridden');
    expect(reopened.getDecision(decision.id)?.timestamp).toEqual(decision.timestamp);
    expect(reopened.getOverrides().map(o => o.reason)).toEqual(['duplicate claim']);
  });
});
