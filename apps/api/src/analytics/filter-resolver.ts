import type {
  CategoricalDimension,
  DatasetSnapshot,
  DateRange,
  FailureEvent,
  FilterOptions,
  FilterQuery,
  FilterSelection,
  FilterStage,
} from '@flakelens/shared';
import { MAX_RANGE_DAYS, addDays, daysBetween, isValidDate, startOfUtcDay } from '@flakelens/shared';

import { FILTER_STAGES, type StageDescriptor } from './dimensions.js';
import { ValidationError } from './errors.js';

export interface FilterResolution {
  readonly events: readonly FailureEvent[];
  readonly options: FilterOptions;
}

export function validateSelection(selection: FilterSelection): void {
  const { start, end } = selection.dateRange;
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new ValidationError('Date range bounds must be valid dates', 'dateRange');
  }
  if (start.getTime() > end.getTime()) {
    throw new ValidationError('Date range start is after its end', 'dateRange', {
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }
  const days = daysBetween(startOfUtcDay(start), startOfUtcDay(end)) + 1;
  if (days > MAX_RANGE_DAYS) {
    throw new ValidationError(`Date range spans ${days} days, at most ${MAX_RANGE_DAYS} are allowed`, 'dateRange', {
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }
}

/**
 * Turn parsed query parameters into a selection. Missing date bounds default
 * to the data horizon, and a defaulted start is pulled in to keep the range
 * within MAX_RANGE_DAYS. Explicitly inverted or oversized ranges are rejected.
 */
export function buildSelection(query: FilterQuery, snapshot: DatasetSnapshot): FilterSelection {
  const fallbackDay = startOfUtcDay(snapshot.loadedAt);
  const horizonStart = snapshot.horizon?.start ?? fallbackDay;
  const horizonEnd = snapshot.horizon?.end ?? fallbackDay;

  let start = query.start ?? horizonStart;
  let end = query.end ?? horizonEnd;

  if (query.start === null && start.getTime() > end.getTime()) {
    start = end;
  }
  if (query.end === null && end.getTime() < start.getTime()) {
    end = start;
  }
  if (query.start === null && daysBetween(start, end) >= MAX_RANGE_DAYS) {
    start = addDays(end, -(MAX_RANGE_DAYS - 1));
  }

  const selection: FilterSelection = Object.freeze({
    platform: query.platform,
    team: query.team,
    pipeline: query.pipeline,
    appVersion: query.appVersion,
    dateRange: Object.freeze({ start, end }),
  });

  validateSelection(selection);
  return selection;
}

/**
 * Rows matching every set constraint of the selection. Stages listed in
 * `skip` are treated as wildcards.
 */
export function filterEvents(
  events: readonly FailureEvent[],
  selection: FilterSelection,
  skip: readonly FilterStage[] = []
): FailureEvent[] {
  const active = FILTER_STAGES.filter((descriptor) => !skip.includes(descriptor.stage));
  return events.filter((event) => active.every((descriptor) => descriptor.matches(event, selection)));
}

function distinctValues(events: readonly FailureEvent[], descriptor: StageDescriptor): string[] {
  if (descriptor.kind !== 'categorical') return [];
  const values = new Set<string>();
  for (const event of events) {
    const value = descriptor.accessor(event);
    if (value !== null) values.add(value);
  }
  return [...values].sort();
}

/** First and last UTC event day, null when there are no events */
export function eventDayBounds(events: readonly FailureEvent[]): DateRange | null {
  if (events.length === 0) return null;
  let min = Infinity;
  let max = -Infinity;
  for (const event of events) {
    const time = event.occurredAt.getTime();
    if (time < min) min = time;
    if (time > max) max = time;
  }
  return Object.freeze({
    start: startOfUtcDay(new Date(min)),
    end: startOfUtcDay(new Date(max)),
  });
}

/**
 * Walk the filter chain in dependency order. Each stage's options are the
 * values present in rows that survived the stages before it, so a
 * dimension's own selection never hides its alternatives.
 */
export function resolveFilters(snapshot: DatasetSnapshot, selection: FilterSelection): FilterResolution {
  validateSelection(selection);

  const options: Record<CategoricalDimension, readonly string[]> = {
    platform: [],
    team: [],
    pipeline: [],
    appVersion: [],
  };
  let dateBounds: DateRange | null = null;
  let narrowed: readonly FailureEvent[] = snapshot.events;

  for (const descriptor of FILTER_STAGES) {
    if (descriptor.kind === 'categorical') {
      options[descriptor.stage] = Object.freeze(distinctValues(narrowed, descriptor));
    } else {
      dateBounds = eventDayBounds(narrowed);
    }
    narrowed = narrowed.filter((event) => descriptor.matches(event, selection));
  }

  return Object.freeze({
    events: Object.freeze(narrowed),
    options: Object.freeze({ ...options, dateBounds }),
  });
}
