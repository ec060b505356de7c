import { UNCLASSIFIED_REASON } from '../constants/index.js';

/**
 * Canonical form of a categorical value: trimmed, inner whitespace collapsed,
 * lower-cased. Empty input yields null.
 */
export function normalizeCategory(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const normalized = String(value).trim().replace(/\s+/g, ' ').toLowerCase();
  return normalized === '' ? null : normalized;
}

export function normalizeFailureReason(value: unknown): string {
  return normalizeCategory(value) ?? UNCLASSIFIED_REASON;
}

/** Trimmed display text; empty input yields null */
export function normalizeText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}
