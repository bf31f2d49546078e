// ═══════════════════════════════════════════════════════════════
// Store :: Employee Directory
// Prompt-context view of the employee records
// ═══════════════════════════════════════════════════════════════

import type { EmployeeDirectory } from '../core/llm-service.js';
import type { EntityStore } from './entity-store.js';
import type { Employee } from './schemas.js';

function balanceLine(e: Employee): string {
  return `Casual: ${e.leaveBalance['Casual Leave'] ?? 0}, Sick: ${e.leaveBalance['Sick Leave'] ?? 0}, Annual: ${e.leaveBalance['Annual Leave'] ?? 0}`;
}

export function createEmployeeDirectory(store: EntityStore): EmployeeDirectory {
  return {
    summary(): string {
      const lines = store.employees.list({ status: 'Active' }).map(e =>
        `- ${e.name} (${e.employeeId}): ${e.position}, ${e.department}, joined ${e.joinDate}, leave ${balanceLine(e)}`,
      );
      return `EMPLOYEE DIRECTORY (${lines.length} active):\n${lines.join('\n')}`;
    },

    describe(nameFragment: string): string | null {
      const e = store.findEmployeeByName(nameFragment);
      if (!e) return null;
      return `${e.name} (ID: ${e.employeeId}) works as ${e.position} in ${e.department} department. ` +
        `Email: ${e.email}. Leave balance: ${balanceLine(e)} days.`;
    },
  };
}
