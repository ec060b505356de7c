import type { FailureEvent, RankedReason, ReasonRanking } from '@flakelens/shared';
import { DEFAULT_ANALYTICS_SETTINGS } from '@flakelens/shared';

import { ValidationError } from './errors.js';

/**
 * Top-N failure reasons by event count, ties broken by label. Everything past
 * N is summed into `other` so the counts always reconcile to `total`.
 */
export function rankFailureReasons(
  events: readonly FailureEvent[],
  topN: number = DEFAULT_ANALYTICS_SETTINGS.defaultTopN
): ReasonRanking {
  if (!Number.isInteger(topN) || topN < 0) {
    throw new ValidationError(`topN must be a non-negative integer, got ${topN}`, 'topN');
  }

  const counts = new Map<string, number>();
  for (const event of events) {
    counts.set(event.failureReason, (counts.get(event.failureReason) ?? 0) + 1);
  }

  const total = events.length;
  const share = (count: number): number => (total === 0 ? 0 : count / total);

  const ranked: RankedReason[] = [...counts.entries()]
    .sort(([reasonA, countA], [reasonB, countB]) => {
      if (countA !== countB) return countB - countA;
      return reasonA < reasonB ? -1 : reasonA > reasonB ? 1 : 0;
    })
    .map(([reason, count]) => ({ reason, count, share: share(count) }));

  const top = ranked.slice(0, topN);
  const otherCount = ranked.slice(topN).reduce((sum, entry) => sum + entry.count, 0);

  return Object.freeze({
    top: Object.freeze(top),
    other: Object.freeze({ count: otherCount, share: share(otherCount) }),
    total,
  });
}
