import type { AnalyticsSettings, DashboardView, DatasetSnapshot, FilterSelection } from '@flakelens/shared';

import { aggregate } from './aggregation.js';
import { buildCrossTab } from './cross-tab.js';
import { resolveFilters } from './filter-resolver.js';
import { buildGroupedFailureTable } from './grouped-failures.js';
import { rankFailureReasons } from './ranking.js';

export type ViewSettings = Pick<AnalyticsSettings, 'defaultTopN' | 'bucketThresholdDays'>;

/**
 * Everything the dashboard shows for one selection. The four derivations
 * only read the filtered rows and do not depend on each other.
 */
export function buildDashboardView(
  snapshot: DatasetSnapshot,
  selection: FilterSelection,
  settings: ViewSettings,
  topN: number = settings.defaultTopN
): DashboardView {
  const { events, options } = resolveFilters(snapshot, selection);
  const { kpis, granularity, series } = aggregate(snapshot, selection, events, settings);

  return Object.freeze({
    selection,
    options,
    eventCount: events.length,
    kpis,
    granularity,
    series,
    crossTabs: Object.freeze({
      teamByPlatform: buildCrossTab(events, 'team', 'platform'),
      platformByPipeline: buildCrossTab(events, 'platform', 'pipeline'),
    }),
    reasons: rankFailureReasons(events, topN),
    failures: Object.freeze(buildGroupedFailureTable(events)),
  });
}
