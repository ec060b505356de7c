import { describe, it, expect } from 'vitest';

import { failuresToCsv, insightsToCsv, toTrendExportRows } from '../export-service.js';

describe('export-service', () => {
  const insights = [
    { weekStart: new Date('2024-01-01T00:00:00.000Z'), failures: 2, wowDelta: null, zScore: null, isAnomalous: false },
    { weekStart: new Date('2024-01-08T00:00:00.000Z'), failures: 3, wowDelta: 0.5, zScore: 3.25, isAnomalous: true },
  ];

  it('should write the grouped failure table with empty cells for nulls', () => {
    const csv = failuresToCsv([
      {
        testId: 'T1',
        testName: 'login, happy path',
        owner: 'qa',
        occurrenceCount: 2,
        lastOccurredAt: new Date('2024-01-03T10:00:00.000Z'),
        diagnosticUrl: null,
        ticketUrl: 'https://tracker.example.com/FLK-1',
      },
    ]);

    expect(csv).toBe(
      'test_id,test_name,owner,occurrence_count,last_occurred_at,diagnostic_url,ticket_url\n' +
        'T1,"login, happy path",qa,2,2024-01-03T10:00:00.000Z,,https://tracker.example.com/FLK-1\n'
    );
  });

  it('should write weekly insights', () => {
    expect(insightsToCsv(insights)).toBe(
      'week_start,flake_failures,wow_delta,z_score,is_anomalous\n' +
        '2024-01-01,2,,,false\n' +
        '2024-01-08,3,0.5,3.25,true\n'
    );
  });

  it('should keep nulls and booleans in JSON rows', () => {
    expect(toTrendExportRows(insights)).toEqual([
      { week_start: '2024-01-01', flake_failures: 2, wow_delta: null, z_score: null, is_anomalous: false },
      { week_start: '2024-01-08', flake_failures: 3, wow_delta: 0.5, z_score: 3.25, is_anomalous: true },
    ]);
  });

  it('should write only the header for no rows', () => {
    expect(failuresToCsv([])).toBe(
      'test_id,test_name,owner,occurrence_count,last_occurred_at,diagnostic_url,ticket_url\n'
    );
  });
});
