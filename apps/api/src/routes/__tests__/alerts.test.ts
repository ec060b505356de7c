import type { TrendAlert } from '@flakelens/shared';
import { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

import { buildApp } from '../../app.js';
import { loadConfig } from '../../config/index.js';
import { InMemoryEventSource, mobileScenario, toRawTable } from '../../test-utils/events.js';
import { ManualClock } from '../../utils/clock.js';

describe('/api/alerts routes', () => {
  let app: FastifyInstance;
  const send = vi.fn(async (_alert: TrendAlert) => undefined);

  beforeAll(async () => {
    app = await buildApp({
      config: loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ALERT_MAX_WEEKLY_FAILURES: '3' }),
      source: new InMemoryEventSource(toRawTable(mobileScenario())),
      clock: new ManualClock('2024-01-10T00:00:00.000Z'),
      notifiers: [{ name: 'recorder', send }],
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should dispatch an alert when the latest week breaches a threshold', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/alerts/evaluate',
    });

    expect(response.statusCode).toBe(200);
    const { data } = JSON.parse(response.payload);
    expect(data.alert.reasons).toEqual(['failure_volume']);
    expect(data.alert.latest).toEqual({
      weekStart: '2024-01-01T00:00:00.000Z',
      failures: 3,
      wowDelta: null,
      zScore: null,
      isAnomalous: false,
    });
    expect(data.delivered).toEqual(['recorder']);
    expect(data.failed).toEqual([]);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('should not dispatch when the filtered trend is quiet', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/alerts/evaluate?platform=android',
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.payload).data).toEqual({ alert: null, delivered: [], failed: [] });
    expect(send).not.toHaveBeenCalled();
  });
});
