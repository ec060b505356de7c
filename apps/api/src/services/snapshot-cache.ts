import type { DatasetSnapshot } from '@flakelens/shared';
import type { Logger } from 'pino';

import { ConfigurationError, StaleCacheWarning } from '../analytics/errors.js';
import { createSnapshot, loadEvents } from '../ingestion/load-events.js';
import type { EventSource } from '../ingestion/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { logger as defaultLogger } from '../utils/logger.js';

export interface CachedSnapshot {
  readonly snapshot: DatasetSnapshot;
  /** Set when an expired snapshot is served because its reload failed */
  readonly warning: StaleCacheWarning | null;
}

export interface SnapshotCacheOptions {
  readonly ttlSeconds: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Process-wide cache of immutable dataset snapshots keyed by source identity.
 *
 * Readers never see a partial snapshot: an entry is swapped with a single map
 * write once the new snapshot is fully built. Callers asking for the same
 * source while a load is running share that load.
 */
export class SnapshotCache {
  private readonly entries = new Map<string, DatasetSnapshot>();
  private readonly inFlight = new Map<string, Promise<DatasetSnapshot>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: SnapshotCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  async get(source: EventSource): Promise<CachedSnapshot> {
    const entry = this.entries.get(source.id);
    if (entry && !this.isExpired(entry)) {
      return { snapshot: entry, warning: null };
    }
    return this.reload(source, entry);
  }

  /**
   * Reload regardless of age. A load already running may have read the source
   * before this call, so the refresh queues a fresh one behind it.
   */
  async refresh(source: EventSource): Promise<CachedSnapshot> {
    return this.reload(source, this.entries.get(source.id), true);
  }

  invalidate(sourceId: string): boolean {
    return this.entries.delete(sourceId);
  }

  peek(sourceId: string): DatasetSnapshot | undefined {
    return this.entries.get(sourceId);
  }

  ageSeconds(snapshot: DatasetSnapshot): number {
    return (this.clock.now().getTime() - snapshot.loadedAt.getTime()) / 1000;
  }

  private isExpired(snapshot: DatasetSnapshot): boolean {
    return this.clock.now().getTime() - snapshot.loadedAt.getTime() >= this.ttlMs;
  }

  private async reload(
    source: EventSource,
    previous: DatasetSnapshot | undefined,
    force = false
  ): Promise<CachedSnapshot> {
    try {
      const snapshot = await this.load(source, force);
      return { snapshot, warning: null };
    } catch (error) {
      if (!previous || error instanceof ConfigurationError) {
        throw error;
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      const warning = new StaleCacheWarning(source.id, previous.loadedAt, this.ageSeconds(previous), cause);
      this.logger.warn(
        { sourceId: source.id, loadedAt: previous.loadedAt.toISOString(), err: cause },
        'Snapshot reload failed, serving stale data'
      );
      return { snapshot: previous, warning };
    }
  }

  private load(source: EventSource, force: boolean): Promise<DatasetSnapshot> {
    const pending = this.inFlight.get(source.id);
    if (pending && !force) {
      return pending;
    }

    const promise: Promise<DatasetSnapshot> = (async () => {
      if (pending) {
        // Its callers receive its outcome; this load only waits its turn
        await Promise.allSettled([pending]);
      }
      const started = Date.now();
      const events = await loadEvents(source, this.logger);
      const snapshot = createSnapshot(events, source.id, this.clock.now());
      this.entries.set(source.id, snapshot);
      this.logger.info(
        { sourceId: source.id, events: events.length, duration: Date.now() - started },
        'Loaded dataset snapshot'
      );
      return snapshot;
    })().finally(() => {
      if (this.inFlight.get(source.id) === promise) {
        this.inFlight.delete(source.id);
      }
    });

    this.inFlight.set(source.id, promise);
    return promise;
  }
}
