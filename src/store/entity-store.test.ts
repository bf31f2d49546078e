import { describe, it, expect, beforeEach } from 'vitest';
import { EntityStore } from './entity-store.js';
import { applySeed, loadSeedFile } from './seed.js';
import { createMockLogger, createTestDb, testSeed } from '../test-utils/mocks.js';
import type { Employee } from './schemas.js';

function employee(overrides: Partial<Employee> = {}): Employee {
  return {
    employeeId: 'EMP100',
    name: 'Store Tester',
    email: 'store.tester@example.com',
    department: 'Engineering',
    position: 'Developer',
    joinDate: '2025-02-01',
    status: 'Active',
    leaveBalance: { 'Casual Leave': 12 },
    ...overrides,
  };
}

describe('EntityStore', () => {
  let store: EntityStore;

  beforeEach(() => {
    store = new EntityStore(createTestDb(), createMockLogger());
  });

  it('should store and read entities by id', () => {
    store.employees.put(employee());

    expect(store.employees.get('EMP100')).toEqual(employee());
    expect(store.employees.get('EMP999')).toBeNull();
    expect(store.employees.count()).toBe(1);
  });

  it('should keep insertion order when an entity is replaced', () => {
    store.employees.put(employee({ employeeId: 'A' }));
    store.employees.put(employee({ employeeId: 'B' }));
    store.employees.put(employee({ employeeId: 'A', name: 'Renamed' }));

    expect(store.employees.list().map(e => `${e.employeeId}:${e.name}`)).toEqual(['A:Renamed', 'B:Store Tester']);
  });

  it('should filter by attribute equality and by predicate', () => {
    store.employees.put(employee({ employeeId: 'A', department: 'Sales' }));
    store.employees.put(employee({ employeeId: 'B', department: 'Engineering' }));
    store.employees.put(employee({ employeeId: 'C', department: 'Sales', status: 'Exited' }));

    expect(store.employees.list({ department: 'Sales' }).map(e => e.employeeId)).toEqual(['A', 'C']);
    expect(store.employees.list({ department: 'Sales', status: 'Active' }).map(e => e.employeeId)).toEqual(['A']);
    expect(store.employees.filter(e => e.employeeId !== 'A').map(e => e.employeeId)).toEqual(['B', 'C']);
  });

  it('should keep collections apart', () => {
    store.employees.put(employee({ employeeId: 'X1' }));
    store.policies.put({ policyId: 'X1', domain: 'hr', text: 'Policy text' });

    expect(store.employees.count()).toBe(1);
    expect(store.policies.get('X1')?.text).toBe('Policy text');
  });

  it('should delete by id', () => {
    store.employees.put(employee());

    expect(store.employees.delete('EMP100')).toBe(true);
    expect(store.employees.delete('EMP100')).toBe(false);
    expect(store.employees.count()).toBe(0);
  });

  it('should reject entities that do not match their schema', () => {
    const broken = { ...employee(), leaveBalance: { 'Casual Leave': 'twelve' } };

    expect(() => store.employees.put(JSON.parse(JSON.stringify(broken)))).toThrow();
    expect(store.employees.count()).toBe(0);
  });

  it('should roll back every write of a failed transaction', () => {
    expect(() => store.transaction(() => {
      store.employees.put(employee({ employeeId: 'T1' }));
      throw new Error('abort');
    })).toThrow('abort');

    expect(store.employees.get('T1')).toBeNull();
  });

  it('should find employees by name fragment and budgets by department', () => {
    applySeed(store, testSeed(), createMockLogger());

    expect(store.findEmployeeByName('sample')?.employeeId).toBe('EMP002');
    expect(store.findEmployeeByName('nobody')).toBeNull();
    expect(store.findBudget('engineering')?.budgetId).toBe('BUD001');
    expect(store.findBudget('Legal')).toBeNull();
  });
});

describe('seed', () => {
  it('should populate an empty store once', () => {
    const store = new EntityStore(createTestDb(), createMockLogger());

    expect(applySeed(store, testSeed(), createMockLogger())).toBe(true);
    expect(store.employees.count()).toBe(2);
    expect(store.policies.count()).toBe(4);
    expect(applySeed(store, testSeed(), createMockLogger())).toBe(false);
  });

  it('should parse the bundled seed file', () => {
    const seed = loadSeedFile();

    expect(seed.employees.map(e => e.employeeId)).toEqual(['EMP001', 'EMP002']);
    expect(seed.policies).toHaveLength(15);
    expect(seed.payScale['Senior Developer']).toBe(95000);
  });
});
