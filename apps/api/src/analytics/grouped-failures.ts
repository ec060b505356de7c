import type { FailureEvent, GroupedFailureRow } from '@flakelens/shared';

interface FailureGroup {
  latest: FailureEvent;
  count: number;
}

/**
 * One row per impacted test. Display fields come from the group's most recent
 * event; on equal timestamps the first one seen wins.
 */
export function buildGroupedFailureTable(events: readonly FailureEvent[]): GroupedFailureRow[] {
  const groups = new Map<string, FailureGroup>();

  for (const event of events) {
    const group = groups.get(event.testId);
    if (!group) {
      groups.set(event.testId, { latest: event, count: 1 });
      continue;
    }
    group.count += 1;
    if (event.occurredAt.getTime() > group.latest.occurredAt.getTime()) {
      group.latest = event;
    }
  }

  const rows: GroupedFailureRow[] = [...groups.entries()].map(([testId, { latest, count }]) =>
    Object.freeze({
      testId,
      testName: latest.testName,
      owner: latest.owner,
      occurrenceCount: count,
      lastOccurredAt: latest.occurredAt,
      diagnosticUrl: latest.diagnosticUrl,
      ticketUrl: latest.ticketUrl,
    })
  );

  return rows.sort((a, b) => {
    if (a.occurrenceCount !== b.occurrenceCount) return b.occurrenceCount - a.occurrenceCount;
    const byRecency = b.lastOccurredAt.getTime() - a.lastOccurredAt.getTime();
    if (byRecency !== 0) return byRecency;
    return a.testId < b.testId ? -1 : a.testId > b.testId ? 1 : 0;
  });
}
