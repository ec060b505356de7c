import type { AlertReason, AlertThresholds, TrendAlert, WeeklyInsight } from '@flakelens/shared';
import { DEFAULT_ALERT_THRESHOLDS } from '@flakelens/shared';
import type { Logger } from 'pino';

import { latestAnomalies } from '../analytics/trend-insights.js';
import { logger as defaultLogger } from '../utils/logger.js';

import type { AlertDispatch, Notifier } from './types.js';

/**
 * Checks the most recent week against the thresholds and fans a breach out to
 * every notifier.
 */
export class AlertingEngine {
  private readonly thresholds: AlertThresholds;
  private readonly logger: Logger;

  constructor(
    private readonly notifiers: readonly Notifier[],
    thresholds: Partial<AlertThresholds> = {},
    logger: Logger = defaultLogger
  ) {
    this.thresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...thresholds };
    this.logger = logger;
  }

  evaluate(insights: readonly WeeklyInsight[]): TrendAlert | null {
    const latest = insights[insights.length - 1];
    if (!latest) return null;

    const reasons: AlertReason[] = [];
    if (latest.failures >= this.thresholds.maxWeeklyFailures) {
      reasons.push('failure_volume');
    }
    if (latest.wowDelta !== null && latest.wowDelta >= this.thresholds.maxWowDelta) {
      reasons.push('week_over_week_spike');
    }
    if (latest.zScore !== null && latest.zScore >= this.thresholds.maxZScore) {
      reasons.push('anomalous_spike');
    }

    if (reasons.length === 0) return null;

    return Object.freeze({
      reasons: Object.freeze(reasons),
      latest,
      anomalies: Object.freeze(latestAnomalies(insights)),
      thresholds: this.thresholds,
    });
  }

  async run(insights: readonly WeeklyInsight[]): Promise<AlertDispatch> {
    const alert = this.evaluate(insights);
    if (!alert) {
      return { alert: null, delivered: [], failed: [] };
    }

    const results = await Promise.allSettled(this.notifiers.map((notifier) => notifier.send(alert)));

    const delivered: string[] = [];
    const failed: string[] = [];
    results.forEach((result, i) => {
      const name = this.notifiers[i]?.name ?? `notifier-${i}`;
      if (result.status === 'fulfilled') {
        delivered.push(name);
      } else {
        failed.push(name);
        this.logger.error({ err: result.reason, notifier: name }, 'Failed to deliver trend alert');
      }
    });

    this.logger.info(
      { reasons: alert.reasons, weekStart: alert.latest.weekStart.toISOString(), delivered, failed },
      'Dispatched trend alert'
    );

    return { alert, delivered, failed };
  }
}
