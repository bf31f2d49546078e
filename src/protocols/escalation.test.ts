import { describe, it, expect, vi } from 'vitest';
import { EscalationQueue, type EscalationInput } from './escalation.js';
import { createMockLogger } from '../test-utils/mocks.js';

function input(overrides: Partial<EscalationInput> = {}): EscalationInput {
  return {
    agent: 'HR Agent',
    decisionId: 'DEC-1',
    task: 'approve twenty days of leave',
    context: { employee_id: 'EMP001' },
    decisionAttempt: 'processLeaveRequest',
    confidence: 0.4,
    ...overrides,
  };
}

describe('EscalationQueue', () => {
  it('should escalate strictly below the threshold', () => {
    const queue = new EscalationQueue(createMockLogger(), { threshold: 0.6 });

    expect(queue.requiresEscalation(0.59)).toBe(true);
    expect(queue.requiresEscalation(0.6)).toBe(false);
    expect(queue.requiresEscalation(0.9)).toBe(false);
    expect(queue.getThreshold()).toBe(0.6);
  });

  it('should queue pending entries and announce them', () => {
    const queue = new EscalationQueue(createMockLogger(), { now: () => new Date('2026-05-04T09:00:00.000Z') });
    const created = vi.fn();
    queue.on('escalation:created', created);

    const entry = queue.escalate(input());

    expect(entry).toMatchObject({
      agent: 'HR Agent',
      decisionId: 'DEC-1',
      confidence: 0.4,
      state: 'pending',
      timestamp: new Date('2026-05-04T09:00:00.000Z'),
    });
    expect(queue.pending()).toEqual([entry]);
    expect(created).toHaveBeenCalledWith(entry);
  });

  it('should resolve an entry once', () => {
    const queue = new EscalationQueue(createMockLogger());
    const entry = queue.escalate(input());

    const resolved = queue.resolve(entry.id, { adminDecision: 'reject', reason: 'too long', reviewer: 'admin' });

    expect(resolved?.state).toBe('resolved');
    expect(resolved?.resolution).toMatchObject({ adminDecision: 'reject', reason: 'too long', reviewer: 'admin' });
    expect(queue.pending()).toEqual([]);
    expect(queue.list()).toHaveLength(1);
    expect(queue.resolve(entry.id, { adminDecision: 'x', reason: '', reviewer: 'admin' })).toBeNull();
    expect(queue.resolve('missing', { adminDecision: 'x', reason: '', reviewer: 'admin' })).toBeNull();
  });

  it('should drop resolved entries first when full', () => {
    const queue = new EscalationQueue(createMockLogger(), { maxEntries: 2 });
    const a = queue.escalate(input({ task: 'a' }));
    const b = queue.escalate(input({ task: 'b' }));
    queue.resolve(b.id, { adminDecision: 'ok', reason: '', reviewer: 'admin' });

    queue.escalate(input({ task: 'c' }));

    expect(queue.list().map(e => e.task)).toEqual(['a', 'c']);
    expect(queue.get(a.id)?.state).toBe('pending');
    expect(queue.get(b.id)).toBeNull();
  });

  it('should warn when a full queue drops an unreviewed entry', () => {
    const logger = createMockLogger();
    const queue = new EscalationQueue(logger, { maxEntries: 1 });
    const first = queue.escalate(input({ task: 'first' }));

    queue.escalate(input({ task: 'second', agent: 'IT Agent' }));

    expect(queue.list().map(e => e.task)).toEqual(['second']);
    expect(logger.warn).toHaveBeenCalledWith(`Escalation queue full (1): dropped unreviewed entry ${first.id} from HR Agent`);
  });
});
