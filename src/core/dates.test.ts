import { describe, it, expect } from 'vitest';
import { addDays, daysBetween, inclusiveDays, parseIsoDate, rangesOverlap, toIsoDate } from './dates.js';

describe('calendar helpers', () => {
  it('should parse valid ISO dates', () => {
    const d = parseIsoDate('2026-03-10');
    expect(d?.toISOString()).toBe('2026-03-10T00:00:00.000Z');
  });

  it('should reject malformed and impossible dates', () => {
    expect(parseIsoDate('10/03/2026')).toBeNull();
    expect(parseIsoDate('2026-02-30')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });

  it('should count both ends of a range', () => {
    const start = parseIsoDate('2026-03-10');
    const end = parseIsoDate('2026-03-12');
    if (!start || !end) throw new Error('fixture dates must parse');
    expect(inclusiveDays(start, end)).toBe(3);
    expect(inclusiveDays(start, start)).toBe(1);
  });

  it('should add days and measure whole days', () => {
    const base = new Date('2026-01-01T12:00:00.000Z');
    expect(toIsoDate(addDays(base, 30))).toBe('2026-01-31');
    expect(daysBetween(base, new Date('2026-01-09T11:00:00.000Z'))).toBe(7);
  });

  it('should detect overlapping ranges', () => {
    expect(rangesOverlap('2026-03-10', '2026-03-12', '2026-03-12', '2026-03-14')).toBe(true);
    expect(rangesOverlap('2026-03-10', '2026-03-12', '2026-03-13', '2026-03-14')).toBe(false);
    expect(rangesOverlap('2026-03-10', '2026-03-20', '2026-03-12', '2026-03-14')).toBe(true);
  });
});
