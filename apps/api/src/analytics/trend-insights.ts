import type { FailureEvent, WeeklyInsight } from '@flakelens/shared';
import { WEEKLY_INSIGHT_SETTINGS, addDays, startOfUtcWeek } from '@flakelens/shared';

export interface WeeklyInsightOptions {
  /** Preceding weeks the z-score is measured against */
  readonly baselineWeeks: number;
  readonly minBaselineWeeks: number;
  readonly anomalyZScore: number;
}

const DEFAULT_OPTIONS: WeeklyInsightOptions = {
  baselineWeeks: WEEKLY_INSIGHT_SETTINGS.BASELINE_WEEKS,
  minBaselineWeeks: WEEKLY_INSIGHT_SETTINGS.MIN_BASELINE_WEEKS,
  anomalyZScore: WEEKLY_INSIGHT_SETTINGS.ANOMALY_Z_SCORE,
};

function zScore(value: number, baseline: readonly number[]): number | null {
  const mean = baseline.reduce((sum, v) => sum + v, 0) / baseline.length;
  const variance = baseline.reduce((sum, v) => sum + (v - mean) ** 2, 0) / baseline.length;
  const deviation = Math.sqrt(variance);
  return deviation === 0 ? null : (value - mean) / deviation;
}

/**
 * Failure counts per UTC week (Monday start) from the first to the last event
 * week, with week-over-week change and a z-score against recent weeks.
 */
export function computeWeeklyInsights(
  events: readonly FailureEvent[],
  options: Partial<WeeklyInsightOptions> = {}
): WeeklyInsight[] {
  if (events.length === 0) return [];
  const { baselineWeeks, minBaselineWeeks, anomalyZScore } = { ...DEFAULT_OPTIONS, ...options };

  let min = Infinity;
  let max = -Infinity;
  for (const event of events) {
    const time = event.occurredAt.getTime();
    if (time < min) min = time;
    if (time > max) max = time;
  }

  const firstWeek = startOfUtcWeek(new Date(min));
  const lastWeek = startOfUtcWeek(new Date(max));
  const weeks: Date[] = [];
  for (let cursor = firstWeek; cursor.getTime() <= lastWeek.getTime(); cursor = addDays(cursor, 7)) {
    weeks.push(cursor);
  }

  const counts = new Map<number, number>(weeks.map((week) => [week.getTime(), 0]));
  for (const event of events) {
    const key = startOfUtcWeek(event.occurredAt).getTime();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const series = weeks.map((week) => counts.get(week.getTime()) ?? 0);

  return weeks.map((weekStart, i) => {
    const failures = series[i] ?? 0;
    const previous = i > 0 ? series[i - 1] : undefined;
    const wowDelta = previous === undefined || previous === 0 ? null : (failures - previous) / previous;

    const baseline = series.slice(Math.max(0, i - baselineWeeks), i);
    const z = baseline.length < minBaselineWeeks ? null : zScore(failures, baseline);

    return Object.freeze({
      weekStart,
      failures,
      wowDelta,
      zScore: z,
      isAnomalous: z !== null && z >= anomalyZScore,
    });
  });
}

export function latestAnomalies(
  insights: readonly WeeklyInsight[],
  lookbackWeeks: number = WEEKLY_INSIGHT_SETTINGS.LOOKBACK_WEEKS
): WeeklyInsight[] {
  if (lookbackWeeks <= 0) return [];
  return insights.slice(-lookbackWeeks).filter((insight) => insight.isAnomalous);
}
