// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Identifiers
// ═══════════════════════════════════════════════════════════════

import { v4 as uuid } from 'uuid';

/** Short prefixed id, e.g. EXP-1A2B3C4D */
export function newId(prefix: string): string {
  return `${prefix}-${uuid().slice(0, 8).toUpperCase()}`;
}

/** Zero-padded sequential id, e.g. EMP003 */
export function sequentialId(prefix: string, n: number, width = 3): string {
  return `${prefix}${String(n).padStart(width, '0')}`;
}
