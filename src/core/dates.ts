// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Calendar Helpers
// Dates travel as YYYY-MM-DD strings and are computed in UTC
// ═══════════════════════════════════════════════════════════════

const DAY_MS = 86_400_000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function toIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Strict YYYY-MM-DD parse; rejects impossible dates such as 2026-02-30 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE.test(value)) return null;
  const d = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime()) || toIsoDate(d) !== value) return null;
  return d;
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * DAY_MS);
}

/** Whole days from a to b, rounded down */
export function daysBetween(a: Date, b: Date): number {
  return Math.floor((b.getTime() - a.getTime()) / DAY_MS);
}

/** Calendar days covered by [start, end], both ends counted */
export function inclusiveDays(start: Date, end: Date): number {
  return daysBetween(start, end) + 1;
}

export function rangesOverlap(aStart: string, aEnd: string, bStart: string, bEnd: string): boolean {
  return !(aEnd < bStart || aStart > bEnd);
}
