// ═══════════════════════════════════════════════════════════════
// Learning :: Goal Tracker
// Per-agent KPI targets, reported on dashboards only
// ═══════════════════════════════════════════════════════════════

export type GoalDirection = 'higher' | 'lower';

export interface Goal {
  name: string;
  target: number;
  actual: number | null;
  unit: string;
  direction: GoalDirection;
  lastUpdated: Date | null;
}

export interface GoalReportEntry extends Goal {
  met: boolean | null;
}

type GoalSeed = Pick<Goal, 'name' | 'target' | 'unit' | 'direction'>;

export const DEFAULT_GOALS: Record<string, GoalSeed[]> = {
  'HR Agent': [
    { name: 'Time-to-hire', target: 7, unit: 'days', direction: 'lower' },
    { name: 'Candidate satisfaction', target: 80, unit: '%', direction: 'higher' },
  ],
  'IT Agent': [
    { name: 'Provisioning SLA', target: 100, unit: '%', direction: 'higher' },
    { name: 'Open tickets', target: 5, unit: 'count', direction: 'lower' },
  ],
  'Finance Agent': [
    { name: 'Budget variance', target: 5, unit: '%', direction: 'lower' },
    { name: 'Avg reimbursement time', target: 3, unit: 'days', direction: 'lower' },
  ],
  'Compliance Agent': [
    { name: 'Policy violations', target: 0, unit: 'count', direction: 'lower' },
    { name: 'Training completion', target: 100, unit: '%', direction: 'higher' },
  ],
};

function evaluate(goal: Goal): boolean | null {
  if (goal.actual === null) return null;
  return goal.direction === 'higher' ? goal.actual >= goal.target : goal.actual <= goal.target;
}

export class GoalTracker {
  private goals: Map<string, Goal[]> = new Map();
  private now: () => Date;

  constructor(defaults: Record<string, GoalSeed[]> = DEFAULT_GOALS, now: () => Date = () => new Date()) {
    this.now = now;
    for (const [agent, seeds] of Object.entries(defaults)) {
      this.goals.set(agent, seeds.map(s => ({ ...s, actual: null, lastUpdated: null })));
    }
  }

  /** Create a goal or retarget an existing one; a measured actual survives retargeting */
  setGoal(agentName: string, goalName: string, target: number, unit: string, direction: GoalDirection = 'higher'): Goal {
    const list = this.goals.get(agentName) ?? [];
    this.goals.set(agentName, list);

    const existing = list.find(g => g.name === goalName);
    if (existing) {
      existing.target = target;
      existing.unit = unit;
      existing.direction = direction;
      return existing;
    }

    const goal: Goal = { name: goalName, target, actual: null, unit, direction, lastUpdated: null };
    list.push(goal);
    return goal;
  }

  /** Returns false when the goal does not exist */
  recordMetric(agentName: string, goalName: string, actual: number): boolean {
    const goal = this.goals.get(agentName)?.find(g => g.name === goalName);
    if (!goal) return false;
    goal.actual = actual;
    goal.lastUpdated = this.now();
    return true;
  }

  getAgentPerformance(agentName: string): Goal[] {
    return (this.goals.get(agentName) ?? []).map(g => ({ ...g }));
  }

  getAllPerformance(): Record<string, Goal[]> {
    const all: Record<string, Goal[]> = {};
    for (const agent of this.goals.keys()) {
      all[agent] = this.getAgentPerformance(agent);
    }
    return all;
  }

  /** null means the goal is unknown or not measured yet */
  isGoalMet(agentName: string, goalName: string): boolean | null {
    const goal = this.goals.get(agentName)?.find(g => g.name === goalName);
    return goal ? evaluate(goal) : null;
  }

  getReport(): Record<string, GoalReportEntry[]> {
    const report: Record<string, GoalReportEntry[]> = {};
    for (const [agent, goals] of this.goals) {
      report[agent] = goals.map(g => ({ ...g, met: evaluate(g) }));
    }
    return report;
  }
}
