import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { API_ROUTES } from '@flakelens/shared';
import Fastify, {
  FastifyBaseLogger,
  FastifyInstance,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { Notifier } from './alerts/types.js';
import { config as defaultConfig, type Config } from './config/index.js';
import type { EventSource } from './ingestion/types.js';
import analyticsPlugin from './plugins/analytics.js';
import errorHandler from './plugins/error-handler.js';
import { alertRoutes } from './routes/alerts.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { exportRoutes } from './routes/exports.js';
import { healthRoutes } from './routes/health.js';
import type { Clock } from './utils/clock.js';
import { logger } from './utils/logger.js';

export interface BuildAppOptions {
  config?: Config;
  source?: EventSource;
  clock?: Clock;
  notifiers?: readonly Notifier[];
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? defaultConfig;

  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression,
    RawReplyDefaultExpression,
    FastifyBaseLogger
  >({
    logger,
    trustProxy: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: config.env === 'production',
  });

  await app.register(cors, {
    origin: config.env === 'production' ? config.corsOrigin : true,
  });

  await app.register(errorHandler);
  await app.register(analyticsPlugin, {
    config,
    source: options.source,
    clock: options.clock,
    notifiers: options.notifiers,
  });

  await app.register(healthRoutes, { prefix: API_ROUTES.HEALTH });
  await app.register(dashboardRoutes, { prefix: API_ROUTES.DASHBOARD });
  await app.register(exportRoutes, { prefix: API_ROUTES.EXPORTS });
  await app.register(alertRoutes, { prefix: API_ROUTES.ALERTS });

  return app;
}
