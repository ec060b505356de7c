import type { DatasetSnapshot, FailureEvent } from '@flakelens/shared';
import {
  REQUIRED_EVENT_COLUMNS,
  normalizeCategory,
  normalizeFailureReason,
  normalizeText,
  parseTimestamp,
} from '@flakelens/shared';
import type { Logger } from 'pino';

import { ConfigurationError } from '../analytics/errors.js';
import { eventDayBounds } from '../analytics/filter-resolver.js';
import { logger as defaultLogger } from '../utils/logger.js';

import type { EventSource, LoadReport, RawEventTable } from './types.js';

export function assertRequiredColumns(columns: readonly string[], sourceId: string): void {
  const present = new Set(columns.map((column) => column.trim().toLowerCase()));
  const missing = REQUIRED_EVENT_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new ConfigurationError(`Data source is missing required columns: ${missing.join(', ')}`, {
      sourceId,
      missing,
    });
  }
}

function lowerCaseKeys(row: Readonly<Record<string, unknown>>): Map<string, unknown> {
  return new Map(Object.entries(row).map(([key, value]) => [key.trim().toLowerCase(), value]));
}

/**
 * Map one raw row to a FailureEvent. Returns null for rows without a test id
 * or a parseable timestamp.
 */
export function normalizeRow(row: Readonly<Record<string, unknown>>): FailureEvent | null {
  const fields = lowerCaseKeys(row);
  const testId = normalizeText(fields.get('test_id'));
  const occurredAt = parseTimestamp(fields.get('occurred_at'));
  if (testId === null || occurredAt === null) {
    return null;
  }

  return Object.freeze({
    testId,
    testName: normalizeText(fields.get('test_name')) ?? testId,
    owner: normalizeText(fields.get('owner')) ?? '',
    platform: normalizeCategory(fields.get('platform')) ?? '',
    team: normalizeCategory(fields.get('team')) ?? '',
    pipeline: normalizeCategory(fields.get('pipeline')) ?? '',
    appVersion: normalizeCategory(fields.get('app_version')),
    occurredAt,
    failureReason: normalizeFailureReason(fields.get('failure_reason')),
    diagnosticUrl: normalizeText(fields.get('diagnostic_url')),
    ticketUrl: normalizeText(fields.get('ticket_url')),
  });
}

export function normalizeTable(table: RawEventTable, sourceId: string): {
  events: FailureEvent[];
  report: LoadReport;
} {
  assertRequiredColumns(table.columns, sourceId);

  const events: FailureEvent[] = [];
  const seen = new Set<string>();
  let duplicatesDropped = 0;
  let invalidRowsSkipped = 0;

  for (const row of table.rows) {
    const event = normalizeRow(row);
    if (!event) {
      invalidRowsSkipped++;
      continue;
    }
    // (test_id, occurred_at) identifies an event; the first row wins
    const key = `${event.testId}\u0000${event.occurredAt.getTime()}`;
    if (seen.has(key)) {
      duplicatesDropped++;
      continue;
    }
    seen.add(key);
    events.push(event);
  }

  return {
    events,
    report: {
      rowsRead: table.rows.length,
      eventsLoaded: events.length,
      duplicatesDropped,
      invalidRowsSkipped,
    },
  };
}

export async function loadEvents(source: EventSource, log: Logger = defaultLogger): Promise<FailureEvent[]> {
  const table = await source.readTable();
  const { events, report } = normalizeTable(table, source.id);

  if (report.duplicatesDropped > 0 || report.invalidRowsSkipped > 0) {
    log.warn({ sourceId: source.id, ...report }, 'Dropped unusable rows while loading failure events');
  } else {
    log.debug({ sourceId: source.id, ...report }, 'Loaded failure events');
  }

  return events;
}

export function createSnapshot(
  events: readonly FailureEvent[],
  sourceId: string,
  loadedAt: Date
): DatasetSnapshot {
  return Object.freeze({
    sourceId,
    loadedAt,
    events: Object.freeze([...events]),
    horizon: eventDayBounds(events),
  });
}
