export const UNCLASSIFIED_REASON = 'unclassified';

export const DEFAULT_ANALYTICS_SETTINGS = {
  defaultTopN: 5,
  bucketThresholdDays: 90,
  cacheTtlSeconds: 600,
} as const;

export const DEFAULT_ALERT_THRESHOLDS = {
  maxWeeklyFailures: 50,
  maxWowDelta: 0.5,
  maxZScore: 3,
} as const;

export const WEEKLY_INSIGHT_SETTINGS = {
  BASELINE_WEEKS: 4,
  MIN_BASELINE_WEEKS: 2,
  ANOMALY_Z_SCORE: 3,
  LOOKBACK_WEEKS: 4,
} as const;

// Column names as exported by the upstream aggregation pipeline
export const REQUIRED_EVENT_COLUMNS = [
  'test_id',
  'test_name',
  'owner',
  'platform',
  'team',
  'pipeline',
  'occurred_at',
  'failure_reason',
] as const;

export const OPTIONAL_EVENT_COLUMNS = [
  'app_version',
  'diagnostic_url',
  'ticket_url',
] as const;

export const DEFAULT_ANALYTICS_TABLE = 'analytics.processed_flaky_tests';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Longest selectable date range, inclusive of both ends
export const MAX_RANGE_DAYS = 3660;

export const API_ROUTES = {
  HEALTH: '/health',
  DASHBOARD: '/api/dashboard',
  EXPORTS: '/api/exports',
  ALERTS: '/api/alerts',
} as const;

export const SESSION_HEADER = 'x-session-id';
