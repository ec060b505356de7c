/**
 * Analytics module exports
 * Filter resolution and the aggregations derived from a filtered snapshot
 */

export { ConfigurationError, StaleCacheWarning, ValidationError } from './errors.js';

export {
  FILTER_STAGES,
  assertLinearChain,
  type StageDescriptor,
  type CategoricalStageDescriptor,
  type DateRangeStageDescriptor,
} from './dimensions.js';

export {
  buildSelection,
  eventDayBounds,
  filterEvents,
  resolveFilters,
  validateSelection,
  type FilterResolution,
} from './filter-resolver.js';

export {
  aggregate,
  bucketStarts,
  buildTimeSeries,
  chooseGranularity,
  computeFailureRate,
  computeFailureRateDelta,
  precedingWindow,
  type AggregationOptions,
} from './aggregation.js';

export { buildCrossTab, crossTabCell } from './cross-tab.js';
export { rankFailureReasons } from './ranking.js';
export { buildGroupedFailureTable } from './grouped-failures.js';
export { computeWeeklyInsights, latestAnomalies, type WeeklyInsightOptions } from './trend-insights.js';
export { buildDashboardView, type ViewSettings } from './dashboard-view.js';

// Re-export shared types for convenience
export type {
  AggregationResult,
  CrossTab,
  DashboardView,
  DatasetSnapshot,
  FailureEvent,
  FilterOptions,
  FilterSelection,
  GroupedFailureRow,
  KpiSnapshot,
  ReasonRanking,
  WeeklyInsight,
} from '@flakelens/shared';
