import { MS_PER_DAY } from '../constants/index.js';

export function formatDate(date: Date | string): string {
  const d = typeof date === 'string' ? new Date(date) : date;
  return d.toISOString();
}

/** YYYY-MM-DD of the UTC day */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isValidDate(date: unknown): date is Date {
  return date instanceof Date && !isNaN(date.getTime());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Monday 00:00 UTC of the week containing the date */
export function startOfUtcWeek(date: Date): Date {
  const day = startOfUtcDay(date);
  const offset = (day.getUTCDay() + 6) % 7;
  return addDays(day, -offset);
}

/** Whole days between two UTC midnights */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

// Date and time without a zone designator, e.g. "2024-01-01 00:30:00"
const ZONELESS_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Parse an ISO date or timestamp. Timestamps without an offset are read as
 * UTC. Returns null for anything unparseable.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValidDate(value) ? value : null;
  }
  if (typeof value === 'number') {
    const date = new Date(value);
    return isValidDate(date) ? date : null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const trimmed = value.trim();
  const zoneless = ZONELESS_TIMESTAMP.exec(trimmed);
  const date = new Date(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : trimmed);
  return isValidDate(date) ? date : null;
}
