/**
 * Factories for failure events, snapshots and in-memory sources used across
 * the analytics, service and route tests
 */

import type { DatasetSnapshot, FailureEvent } from '@flakelens/shared';
import { OPTIONAL_EVENT_COLUMNS, REQUIRED_EVENT_COLUMNS } from '@flakelens/shared';

import { createSnapshot } from '../ingestion/load-events.js';
import type { EventSource, RawEventTable } from '../ingestion/types.js';

export type EventInput = Partial<Omit<FailureEvent, 'occurredAt'>> & { occurredAt: string };

export function makeEvent(input: EventInput): FailureEvent {
  const { occurredAt, ...fields } = input;
  const testId = fields.testId ?? 'T1';
  return {
    testId,
    testName: `test ${testId}`,
    owner: 'qa',
    platform: 'ios',
    team: 'mobile',
    pipeline: 'nightly',
    appVersion: null,
    failureReason: 'timeout',
    diagnosticUrl: null,
    ticketUrl: null,
    ...fields,
    occurredAt: new Date(occurredAt),
  };
}

export function makeSnapshot(
  events: readonly FailureEvent[],
  loadedAt = '2024-01-10T00:00:00.000Z',
  sourceId = 'memory:test'
): DatasetSnapshot {
  return createSnapshot(events, sourceId, new Date(loadedAt));
}

/**
 * The three-event dataset: T1 on ios twice, T2 on android once, all owned by
 * the mobile team.
 */
export function mobileScenario(): FailureEvent[] {
  return [
    makeEvent({ testId: 'T1', occurredAt: '2024-01-01T10:00:00.000Z', appVersion: '1.0' }),
    makeEvent({
      testId: 'T2',
      occurredAt: '2024-01-02T10:00:00.000Z',
      platform: 'android',
      pipeline: 'pr',
      appVersion: '1.0',
    }),
    makeEvent({ testId: 'T1', occurredAt: '2024-01-03T10:00:00.000Z', appVersion: '1.1' }),
  ];
}

export const EVENT_COLUMNS: readonly string[] = [...REQUIRED_EVENT_COLUMNS, ...OPTIONAL_EVENT_COLUMNS];

/** Raw source rows carrying the same values as the events */
export function toRawTable(events: readonly FailureEvent[], columns: readonly string[] = EVENT_COLUMNS): RawEventTable {
  const rows = events.map((event) => {
    const row: Record<string, unknown> = {
      test_id: event.testId,
      test_name: event.testName,
      owner: event.owner,
      platform: event.platform,
      team: event.team,
      pipeline: event.pipeline,
      occurred_at: event.occurredAt.toISOString(),
      failure_reason: event.failureReason,
      app_version: event.appVersion,
      diagnostic_url: event.diagnosticUrl,
      ticket_url: event.ticketUrl,
    };
    return Object.fromEntries(columns.map((column) => [column, row[column] ?? null]));
  });
  return { columns, rows };
}

export class InMemoryEventSource implements EventSource {
  reads = 0;
  closed = false;
  failure: Error | null = null;
  /** When set, reads hold the table they started with until it settles */
  gate: Promise<void> | null = null;

  constructor(
    public table: RawEventTable,
    readonly id = 'memory:test'
  ) {}

  async readTable(): Promise<RawEventTable> {
    this.reads++;
    const table = this.table;
    if (this.gate) {
      await this.gate;
    }
    if (this.failure) {
      throw this.failure;
    }
    return table;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
