/**
 * Analytics types for flaky-test failure events, filter selections and the
 * structures derived from them
 */

export interface FailureEvent {
  readonly testId: string;
  readonly testName: string;
  readonly owner: string;
  readonly platform: string;
  readonly team: string;
  readonly pipeline: string;
  readonly appVersion: string | null;
  readonly occurredAt: Date;
  readonly failureReason: string;
  readonly diagnosticUrl: string | null;
  readonly ticketUrl: string | null;
}

/**
 * Inclusive range of UTC days. Both bounds sit on UTC midnight.
 */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

export type CategoricalDimension = 'platform' | 'team' | 'pipeline' | 'appVersion';

export type FilterStage = 'platform' | 'team' | 'pipeline' | 'dateRange' | 'appVersion';

export interface FilterSelection {
  readonly platform: string | null;
  readonly team: string | null;
  readonly pipeline: string | null;
  readonly dateRange: DateRange;
  readonly appVersion: string | null;
}

export interface FilterOptions {
  readonly platform: readonly string[];
  readonly team: readonly string[];
  readonly pipeline: readonly string[];
  readonly appVersion: readonly string[];
  /** First and last event day among rows passing the pipeline stage */
  readonly dateBounds: DateRange | null;
}

export interface DatasetSnapshot {
  readonly sourceId: string;
  readonly loadedAt: Date;
  readonly events: readonly FailureEvent[];
  /** Event-day span of the whole dataset, null when it is empty */
  readonly horizon: DateRange | null;
}

export type BucketGranularity = 'day' | 'week';

export interface TimeSeriesPoint {
  readonly bucketStart: Date;
  readonly count: number;
}

export interface KpiSnapshot {
  readonly totalFlakyTests: number;
  readonly uniqueRootCauses: number;
  readonly failureRate: number;
  /** null when the dataset does not reach back to the preceding window */
  readonly failureRateDelta: number | null;
}

export interface AggregationResult {
  readonly kpis: KpiSnapshot;
  readonly granularity: BucketGranularity;
  readonly series: readonly TimeSeriesPoint[];
}

export type CrossTabDimension = 'platform' | 'team' | 'pipeline' | 'failureReason';

export interface CrossTabCell {
  readonly count: number;
  readonly rate: number;
}

export interface CrossTab {
  readonly rowDimension: CrossTabDimension;
  readonly columnDimension: CrossTabDimension;
  readonly rows: readonly string[];
  readonly columns: readonly string[];
  /** cells[rowIndex][columnIndex], dense */
  readonly cells: readonly (readonly CrossTabCell[])[];
  readonly rowTotals: readonly number[];
}

export interface RankedReason {
  readonly reason: string;
  readonly count: number;
  readonly share: number;
}

export interface ReasonRanking {
  readonly top: readonly RankedReason[];
  readonly other: {
    readonly count: number;
    readonly share: number;
  };
  readonly total: number;
}

export interface GroupedFailureRow {
  readonly testId: string;
  readonly testName: string;
  readonly owner: string;
  readonly occurrenceCount: number;
  readonly lastOccurredAt: Date;
  readonly diagnosticUrl: string | null;
  readonly ticketUrl: string | null;
}

export interface WeeklyInsight {
  readonly weekStart: Date;
  readonly failures: number;
  readonly wowDelta: number | null;
  readonly zScore: number | null;
  readonly isAnomalous: boolean;
}

export interface AnalyticsSettings {
  readonly defaultTopN: number;
  readonly bucketThresholdDays: number;
  readonly cacheTtlSeconds: number;
}

export interface DashboardView {
  readonly selection: FilterSelection;
  readonly options: FilterOptions;
  readonly eventCount: number;
  readonly kpis: KpiSnapshot;
  readonly granularity: BucketGranularity;
  readonly series: readonly TimeSeriesPoint[];
  readonly crossTabs: {
    readonly teamByPlatform: CrossTab;
    readonly platformByPipeline: CrossTab;
  };
  readonly reasons: ReasonRanking;
  readonly failures: readonly GroupedFailureRow[];
}

export interface AlertThresholds {
  readonly maxWeeklyFailures: number;
  readonly maxWowDelta: number;
  readonly maxZScore: number;
}

export type AlertReason = 'failure_volume' | 'week_over_week_spike' | 'anomalous_spike';

export interface TrendAlert {
  readonly reasons: readonly AlertReason[];
  readonly latest: WeeklyInsight;
  readonly anomalies: readonly WeeklyInsight[];
  readonly thresholds: AlertThresholds;
}
