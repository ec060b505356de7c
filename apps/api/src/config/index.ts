import {
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_ANALYTICS_SETTINGS,
  DEFAULT_ANALYTICS_TABLE,
} from '@flakelens/shared';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val.trim()));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).pipe(z.number().int().min(1).max(65535)).default('3000'),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  // Data source: the CSV export wins over the warehouse when both are set
  ANALYTICS_CSV_PATH: optionalString,
  ANALYTICS_DATABASE_URL: optionalString,
  ANALYTICS_TABLE: z.string().default(DEFAULT_ANALYTICS_TABLE),
  // Analytics core
  DEFAULT_TOP_N: z.string().transform(Number).pipe(z.number().int().min(0).max(100))
    .default(String(DEFAULT_ANALYTICS_SETTINGS.defaultTopN)),
  BUCKET_THRESHOLD_DAYS: z.string().transform(Number).pipe(z.number().int().min(1))
    .default(String(DEFAULT_ANALYTICS_SETTINGS.bucketThresholdDays)),
  CACHE_TTL_SECONDS: z.string().transform(Number).pipe(z.number().int().min(0))
    .default(String(DEFAULT_ANALYTICS_SETTINGS.cacheTtlSeconds)),
  MAX_SESSIONS: z.string().transform(Number).pipe(z.number().int().min(1)).default('1000'),
  // Alerting
  ALERT_MAX_WEEKLY_FAILURES: z.string().transform(Number).pipe(z.number().min(0))
    .default(String(DEFAULT_ALERT_THRESHOLDS.maxWeeklyFailures)),
  ALERT_MAX_WOW_DELTA: z.string().transform(Number).pipe(z.number())
    .default(String(DEFAULT_ALERT_THRESHOLDS.maxWowDelta)),
  ALERT_MAX_Z_SCORE: z.string().transform(Number).pipe(z.number())
    .default(String(DEFAULT_ALERT_THRESHOLDS.maxZScore)),
  SLACK_BOT_TOKEN: optionalString,
  SLACK_ALERT_CHANNEL: optionalString,
});

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = envSchema.parse(source);

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    corsOrigin: env.CORS_ORIGIN,
    dataSource: {
      csvPath: env.ANALYTICS_CSV_PATH,
      databaseUrl: env.ANALYTICS_DATABASE_URL,
      table: env.ANALYTICS_TABLE,
    },
    analytics: {
      defaultTopN: env.DEFAULT_TOP_N,
      bucketThresholdDays: env.BUCKET_THRESHOLD_DAYS,
      cacheTtlSeconds: env.CACHE_TTL_SECONDS,
    },
    maxSessions: env.MAX_SESSIONS,
    alerts: {
      maxWeeklyFailures: env.ALERT_MAX_WEEKLY_FAILURES,
      maxWowDelta: env.ALERT_MAX_WOW_DELTA,
      maxZScore: env.ALERT_MAX_Z_SCORE,
    },
    slack:
      env.SLACK_BOT_TOKEN && env.SLACK_ALERT_CHANNEL
        ? { botToken: env.SLACK_BOT_TOKEN, channel: env.SLACK_ALERT_CHANNEL }
        : null,
  } as const;
}

export const config = loadConfig();

export type Config = ReturnType<typeof loadConfig>;
export type DataSourceConfig = Config['dataSource'];
export type SlackAlertConfig = NonNullable<Config['slack']>;
