import type { DashboardView, FilterQuery, FilterSelection } from '@flakelens/shared';

import { buildDashboardView, type ViewSettings } from '../analytics/dashboard-view.js';
import { ValidationError, type StaleCacheWarning } from '../analytics/errors.js';
import { buildSelection } from '../analytics/filter-resolver.js';

import type { CachedSnapshot } from './snapshot-cache.js';

export type SessionOutcome =
  | { readonly status: 'ok'; readonly view: DashboardView; readonly stale: StaleCacheWarning | null }
  | {
      readonly status: 'rejected';
      readonly error: ValidationError;
      readonly lastValidSelection: FilterSelection | null;
    }
  | { readonly status: 'superseded' };

/**
 * Per-session recomputation. Every call to `select` supersedes the calls
 * before it: an older call that is still waiting for the snapshot gives up
 * instead of computing, and the newer one never waits for it.
 */
export class DashboardSession {
  private generation = 0;
  private lastValid: FilterSelection | null = null;

  constructor(
    private readonly snapshots: () => Promise<CachedSnapshot>,
    private readonly settings: ViewSettings
  ) {}

  get lastValidSelection(): FilterSelection | null {
    return this.lastValid;
  }

  async select(query: FilterQuery): Promise<SessionOutcome> {
    const ticket = ++this.generation;

    let cached: CachedSnapshot;
    try {
      cached = await this.snapshots();
    } catch (error) {
      if (ticket !== this.generation) return { status: 'superseded' };
      throw error;
    }

    if (ticket !== this.generation) {
      return { status: 'superseded' };
    }

    try {
      const selection = buildSelection(query, cached.snapshot);
      const view = buildDashboardView(cached.snapshot, selection, this.settings, query.topN);
      this.lastValid = selection;
      return { status: 'ok', view, stale: cached.warning };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { status: 'rejected', error, lastValidSelection: this.lastValid };
      }
      throw error;
    }
  }
}

/**
 * Sessions by client-supplied id, evicting the least recently used one past
 * `maxSessions`.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, DashboardSession>();

  constructor(
    private readonly createSession: () => DashboardSession,
    private readonly maxSessions: number
  ) {}

  get(sessionId: string): DashboardSession {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const session = this.createSession();
    this.sessions.set(sessionId, session);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }
}
