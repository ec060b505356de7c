import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';

import { loadConfig } from '../index.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.dataSource).toEqual({
      csvPath: undefined,
      databaseUrl: undefined,
      table: 'analytics.processed_flaky_tests',
    });
    expect(config.analytics).toEqual({ defaultTopN: 5, bucketThresholdDays: 90, cacheTtlSeconds: 600 });
    expect(config.alerts).toEqual({ maxWeeklyFailures: 50, maxWowDelta: 0.5, maxZScore: 3 });
    expect(config.maxSessions).toBe(1000);
    expect(config.slack).toBeNull();
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      ANALYTICS_CSV_PATH: ' ./exports/events.csv ',
      DEFAULT_TOP_N: '10',
      BUCKET_THRESHOLD_DAYS: '30',
      CACHE_TTL_SECONDS: '0',
      ALERT_MAX_WOW_DELTA: '1.5',
    });

    expect(config.port).toBe(8080);
    expect(config.dataSource.csvPath).toBe('./exports/events.csv');
    expect(config.analytics).toEqual({ defaultTopN: 10, bucketThresholdDays: 30, cacheTtlSeconds: 0 });
    expect(config.alerts.maxWowDelta).toBe(1.5);
  });

  it('should treat blank source settings as unset', () => {
    expect(loadConfig({ ANALYTICS_CSV_PATH: '   ' }).dataSource.csvPath).toBeUndefined();
  });

  it('should enable Slack only with both token and channel', () => {
    expect(loadConfig({ SLACK_BOT_TOKEN: 'test-token' }).slack).toBeNull();
    expect(loadConfig({ SLACK_BOT_TOKEN: 'test-token', SLACK_ALERT_CHANNEL: '#flaky-tests' }).slack).toEqual({
      botToken: 'test-token',
      channel: '#flaky-tests',
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ DEFAULT_TOP_N: '-1' })).toThrow(ZodError);
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ZodError);
  });
});
