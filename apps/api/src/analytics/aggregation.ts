import type {
  AggregationResult,
  BucketGranularity,
  DatasetSnapshot,
  DateRange,
  FailureEvent,
  FilterSelection,
  KpiSnapshot,
  TimeSeriesPoint,
} from '@flakelens/shared';
import {
  DEFAULT_ANALYTICS_SETTINGS,
  MS_PER_DAY,
  UNCLASSIFIED_REASON,
  addDays,
  daysBetween,
  isValidDate,
} from '@flakelens/shared';

import { filterEvents } from './filter-resolver.js';

export interface AggregationOptions {
  /** Ranges spanning more days than this are bucketed by week */
  readonly bucketThresholdDays: number;
}

const BUCKET_DAYS: Readonly<Record<BucketGranularity, number>> = {
  day: 1,
  week: 7,
};

/** Inclusive day count of the range */
export function rangeLengthDays(range: DateRange): number {
  return daysBetween(range.start, range.end) + 1;
}

export function chooseGranularity(
  range: DateRange,
  bucketThresholdDays: number = DEFAULT_ANALYTICS_SETTINGS.bucketThresholdDays
): BucketGranularity {
  return rangeLengthDays(range) > bucketThresholdDays ? 'week' : 'day';
}

/**
 * Starts of the half-open buckets [start, start + Δ) covering the range. The
 * last weekly bucket may run past the range end.
 */
export function bucketStarts(range: DateRange, granularity: BucketGranularity): Date[] {
  const step = BUCKET_DAYS[granularity];
  const endExclusive = addDays(range.end, 1).getTime();
  const starts: Date[] = [];
  for (let cursor = range.start; cursor.getTime() < endExclusive; cursor = addDays(cursor, step)) {
    starts.push(cursor);
  }
  return starts;
}

/**
 * Event counts for every bucket of the range, empty buckets included.
 */
export function buildTimeSeries(
  events: readonly FailureEvent[],
  range: DateRange,
  granularity: BucketGranularity,
  starts: readonly Date[] = bucketStarts(range, granularity)
): TimeSeriesPoint[] {
  const counts = new Array<number>(starts.length).fill(0);
  const bucketMs = BUCKET_DAYS[granularity] * MS_PER_DAY;
  const origin = range.start.getTime();

  for (const event of events) {
    const index = Math.floor((event.occurredAt.getTime() - origin) / bucketMs);
    if (index >= 0 && index < counts.length) {
      counts[index] = (counts[index] ?? 0) + 1;
    }
  }

  return starts.map((bucketStart, i) => ({ bucketStart, count: counts[i] ?? 0 }));
}

/**
 * Events per elapsed bucket. Buckets starting after `asOf` have not elapsed.
 */
export function computeFailureRate(eventCount: number, starts: readonly Date[], asOf: Date): number {
  const elapsed = starts.filter((start) => start.getTime() <= asOf.getTime()).length;
  return elapsed === 0 ? 0 : eventCount / elapsed;
}

export function countDistinctTests(events: readonly FailureEvent[]): number {
  return new Set(events.map((event) => event.testId)).size;
}

export function countRootCauses(events: readonly FailureEvent[]): number {
  const reasons = new Set<string>();
  for (const event of events) {
    if (event.failureReason !== UNCLASSIFIED_REASON) reasons.add(event.failureReason);
  }
  return reasons.size;
}

/**
 * The equal-length window ending the day before the range starts.
 */
export function precedingWindow(range: DateRange): DateRange {
  const length = rangeLengthDays(range);
  return {
    start: addDays(range.start, -length),
    end: addDays(range.start, -1),
  };
}

/**
 * Failure-rate change against the preceding window under the same non-date
 * filters. null when the dataset does not reach back to that window's start.
 */
export function computeFailureRateDelta(
  snapshot: DatasetSnapshot,
  selection: FilterSelection,
  currentRate: number,
  granularity: BucketGranularity
): number | null {
  const prior = precedingWindow(selection.dateRange);
  if (
    !snapshot.horizon ||
    !isValidDate(prior.start) ||
    snapshot.horizon.start.getTime() > prior.start.getTime()
  ) {
    return null;
  }

  const priorEvents = filterEvents(snapshot.events, { ...selection, dateRange: prior });
  const priorRate = computeFailureRate(priorEvents.length, bucketStarts(prior, granularity), snapshot.loadedAt);
  return currentRate - priorRate;
}

export function aggregate(
  snapshot: DatasetSnapshot,
  selection: FilterSelection,
  events: readonly FailureEvent[],
  options: AggregationOptions = DEFAULT_ANALYTICS_SETTINGS
): AggregationResult {
  const range = selection.dateRange;
  const granularity = chooseGranularity(range, options.bucketThresholdDays);
  const starts = bucketStarts(range, granularity);
  const failureRate = computeFailureRate(events.length, starts, snapshot.loadedAt);

  const kpis: KpiSnapshot = Object.freeze({
    totalFlakyTests: countDistinctTests(events),
    uniqueRootCauses: countRootCauses(events),
    failureRate,
    failureRateDelta: computeFailureRateDelta(snapshot, selection, failureRate, granularity),
  });

  return Object.freeze({
    kpis,
    granularity,
    series: Object.freeze(buildTimeSeries(events, range, granularity, starts)),
  });
}
