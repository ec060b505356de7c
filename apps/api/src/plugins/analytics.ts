import type { AnalyticsSettings } from '@flakelens/shared';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

import { AlertingEngine } from '../alerts/alerting-engine.js';
import type { Notifier } from '../alerts/types.js';
import type { Config } from '../config/index.js';
import { createEventSource } from '../ingestion/index.js';
import type { EventSource } from '../ingestion/types.js';
import { DashboardSession, SessionRegistry } from '../services/dashboard-session.js';
import { SnapshotCache, type CachedSnapshot } from '../services/snapshot-cache.js';
import { SlackNotifier } from '../slack/notifier.js';
import type { Clock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';

export interface AnalyticsPluginOptions {
  config: Config;
  /** Overrides the source selected from `config.dataSource` */
  source?: EventSource;
  clock?: Clock;
  /** Overrides the Slack notifier derived from `config.slack` */
  notifiers?: readonly Notifier[];
}

export interface AnalyticsContext {
  readonly source: EventSource;
  readonly snapshots: SnapshotCache;
  readonly sessions: SessionRegistry;
  readonly settings: AnalyticsSettings;
  readonly alerting: AlertingEngine;
  /** Snapshot of the configured source, loading it when missing or expired */
  current(): Promise<CachedSnapshot>;
}

declare module 'fastify' {
  interface FastifyInstance {
    analytics: AnalyticsContext;
  }
}

async function analyticsPlugin(fastify: FastifyInstance, options: AnalyticsPluginOptions) {
  const { config } = options;
  const source = options.source ?? createEventSource(config.dataSource);
  const settings: AnalyticsSettings = { ...config.analytics };

  const snapshots = new SnapshotCache({
    ttlSeconds: settings.cacheTtlSeconds,
    clock: options.clock,
    logger,
  });
  const current = () => snapshots.get(source);

  const sessions = new SessionRegistry(
    () => new DashboardSession(current, settings),
    config.maxSessions
  );

  const notifiers: readonly Notifier[] = options.notifiers ?? (config.slack ? [new SlackNotifier(config.slack)] : []);
  const alerting = new AlertingEngine(notifiers, config.alerts, logger);

  fastify.decorate('analytics', {
    source,
    snapshots,
    sessions,
    settings,
    alerting,
    current,
  });

  logger.info(
    {
      sourceId: source.id,
      dataSource: config.dataSource,
      notifiers: notifiers.map((notifier) => notifier.name),
    },
    'Analytics data source configured'
  );

  fastify.addHook('onClose', async () => {
    await source.close?.();
  });
}

export default fp(analyticsPlugin, {
  name: 'analytics',
});
