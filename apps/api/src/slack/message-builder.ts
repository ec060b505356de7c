/**
 * Slack Block Kit rendering of trend alerts
 */

import type { AlertReason, TrendAlert, WeeklyInsight } from '@flakelens/shared';
import { formatDay, truncateString } from '@flakelens/shared';
import type { KnownBlock } from '@slack/web-api';

// Slack caps header text at 150 characters
const MAX_HEADER_LENGTH = 150;

export interface SlackMessage {
  readonly text: string;
  readonly blocks: KnownBlock[];
}

const REASON_TITLES: Readonly<Record<AlertReason, string>> = {
  failure_volume: 'High failure volume',
  week_over_week_spike: 'Week-over-week spike',
  anomalous_spike: 'Anomalous spike',
};

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function describeReason(reason: AlertReason, alert: TrendAlert): string {
  const { latest, thresholds } = alert;
  switch (reason) {
    case 'failure_volume':
      return `${latest.failures} failures this week (threshold ${thresholds.maxWeeklyFailures})`;
    case 'week_over_week_spike':
      return `Week-over-week change ${percent(latest.wowDelta ?? 0)} (threshold ${percent(thresholds.maxWowDelta)})`;
    case 'anomalous_spike':
      return `Z-score ${(latest.zScore ?? 0).toFixed(2)} (threshold ${thresholds.maxZScore.toFixed(2)})`;
  }
}

function describeAnomaly(insight: WeeklyInsight): string {
  const z = insight.zScore === null ? 'N/A' : insight.zScore.toFixed(2);
  return `• ${formatDay(insight.weekStart)}: ${insight.failures} failures, z=${z}`;
}

export function buildTrendAlertMessage(alert: TrendAlert): SlackMessage {
  const subject = alert.reasons.map((reason) => REASON_TITLES[reason]).join(' | ');

  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: truncateString(`Flaky test alert: ${subject}`, MAX_HEADER_LENGTH), emoji: true },
    },
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: alert.reasons.map((reason) => `*${REASON_TITLES[reason]}*: ${describeReason(reason, alert)}`).join('\n'),
      },
    },
  ];

  if (alert.anomalies.length > 0) {
    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*Recent anomalies*\n${alert.anomalies.map(describeAnomaly).join('\n')}`,
      },
    });
  }

  blocks.push({
    type: 'context',
    elements: [{ type: 'mrkdwn', text: `Week of ${formatDay(alert.latest.weekStart)}` }],
  });

  return { text: `Flaky test alert: ${subject}`, blocks };
}
