import type { GroupedFailureRow, WeeklyInsight } from '@flakelens/shared';
import { formatDate, formatDay } from '@flakelens/shared';
import { stringify } from 'csv-stringify/sync';

export const FAILURE_EXPORT_COLUMNS = [
  'test_id',
  'test_name',
  'owner',
  'occurrence_count',
  'last_occurred_at',
  'diagnostic_url',
  'ticket_url',
] as const;

export const TREND_EXPORT_COLUMNS = [
  'week_start',
  'flake_failures',
  'wow_delta',
  'z_score',
  'is_anomalous',
] as const;

type ExportRecord<Columns extends readonly string[]> = Record<Columns[number], string | number | null>;

export interface TrendExportRow {
  readonly week_start: string;
  readonly flake_failures: number;
  readonly wow_delta: number | null;
  readonly z_score: number | null;
  readonly is_anomalous: boolean;
}

export function toTrendExportRows(insights: readonly WeeklyInsight[]): TrendExportRow[] {
  return insights.map((insight) => ({
    week_start: formatDay(insight.weekStart),
    flake_failures: insight.failures,
    wow_delta: insight.wowDelta,
    z_score: insight.zScore,
    is_anomalous: insight.isAnomalous,
  }));
}

// Null cells come out empty
export function failuresToCsv(rows: readonly GroupedFailureRow[]): string {
  const records: ExportRecord<typeof FAILURE_EXPORT_COLUMNS>[] = rows.map((row) => ({
    test_id: row.testId,
    test_name: row.testName,
    owner: row.owner,
    occurrence_count: row.occurrenceCount,
    last_occurred_at: formatDate(row.lastOccurredAt),
    diagnostic_url: row.diagnosticUrl,
    ticket_url: row.ticketUrl,
  }));

  return stringify(records, { header: true, columns: [...FAILURE_EXPORT_COLUMNS] });
}

export function insightsToCsv(insights: readonly WeeklyInsight[]): string {
  const records: ExportRecord<typeof TREND_EXPORT_COLUMNS>[] = toTrendExportRows(insights).map((row) => ({
    ...row,
    is_anomalous: String(row.is_anomalous),
  }));

  return stringify(records, { header: true, columns: [...TREND_EXPORT_COLUMNS] });
}
