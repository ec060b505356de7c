import type { FilterQueryInput } from '@flakelens/shared';
import { filterQuerySchema } from '@flakelens/shared';
import { describe, it, expect } from 'vitest';

import { makeSnapshot, mobileScenario } from '../../test-utils/events.js';
import { DashboardSession, SessionRegistry } from '../dashboard-session.js';
import type { CachedSnapshot } from '../snapshot-cache.js';

const SETTINGS = { defaultTopN: 5, bucketThresholdDays: 90 };

function query(input: FilterQueryInput = {}) {
  return filterQuerySchema.parse(input);
}

function cached(): CachedSnapshot {
  return { snapshot: makeSnapshot(mobileScenario()), warning: null };
}

describe('DashboardSession', () => {
  it('should compute the view for a valid selection', async () => {
    const session = new DashboardSession(async () => cached(), SETTINGS);

    const outcome = await session.select(query({ platform: 'ios', topN: 1 }));

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.view.eventCount).toBe(2);
    expect(outcome.view.kpis.totalFlakyTests).toBe(1);
    expect(outcome.view.reasons.top).toEqual([{ reason: 'timeout', count: 2, share: 1 }]);
    expect(outcome.view.crossTabs.teamByPlatform.cells).toEqual([[{ count: 2, rate: 1 }]]);
    expect(outcome.view.failures.map((row) => row.testId)).toEqual(['T1']);
    expect(outcome.stale).toBeNull();
  });

  it('should rank with the default topN when the parameter is blank', async () => {
    const session = new DashboardSession(async () => cached(), SETTINGS);

    const outcome = await session.select(query({ topN: '' }));

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.view.reasons.top).toEqual([{ reason: 'timeout', count: 3, share: 1 }]);
  });

  it('should abandon a request superseded while waiting for the snapshot', async () => {
    let release: (value: CachedSnapshot) => void = () => undefined;
    const pending = new Promise<CachedSnapshot>((resolve) => {
      release = resolve;
    });
    const session = new DashboardSession(() => pending, SETTINGS);

    const older = session.select(query({ platform: 'ios' }));
    const newer = session.select(query({ platform: 'android' }));
    release(cached());

    expect(await older).toEqual({ status: 'superseded' });
    const outcome = await newer;
    expect(outcome.status).toBe('ok');
    expect(session.lastValidSelection?.platform).toBe('android');
  });

  it('should reject an inverted range and keep the last valid selection', async () => {
    const session = new DashboardSession(async () => cached(), SETTINGS);
    await session.select(query({ platform: 'ios' }));

    const outcome = await session.select(query({ start: '2024-01-03', end: '2024-01-01' }));

    expect(outcome.status).toBe('rejected');
    if (outcome.status !== 'rejected') return;
    expect(outcome.error.field).toBe('dateRange');
    expect(outcome.lastValidSelection?.platform).toBe('ios');
    expect(session.lastValidSelection?.platform).toBe('ios');
  });

  it('should propagate a snapshot failure for the current request', async () => {
    const session = new DashboardSession(async () => {
      throw new Error('source offline');
    }, SETTINGS);

    await expect(session.select(query())).rejects.toThrow('source offline');
  });
});

describe('SessionRegistry', () => {
  it('should reuse sessions by id and evict the least recently used', () => {
    const registry = new SessionRegistry(() => new DashboardSession(async () => cached(), SETTINGS), 2);

    const a = registry.get('a');
    const b = registry.get('b');
    expect(registry.get('a')).toBe(a);

    registry.get('c');

    expect(registry.size).toBe(2);
    expect(registry.get('a')).toBe(a);
    expect(registry.get('b')).not.toBe(b);
  });
});
