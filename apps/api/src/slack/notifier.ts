import type { TrendAlert } from '@flakelens/shared';
import { LogLevel, WebClient } from '@slack/web-api';

import type { Notifier } from '../alerts/types.js';
import type { SlackAlertConfig } from '../config/index.js';

import { buildTrendAlertMessage } from './message-builder.js';

export class SlackNotifier implements Notifier {
  readonly name = 'slack';
  private readonly client: WebClient;
  private readonly channel: string;

  constructor(config: SlackAlertConfig, client?: WebClient) {
    this.channel = config.channel;
    this.client =
      client ??
      new WebClient(config.botToken, {
        logLevel: LogLevel.WARN,
        retryConfig: { retries: 3, factor: 2.0 },
      });
  }

  async send(alert: TrendAlert): Promise<void> {
    const message = buildTrendAlertMessage(alert);
    const result = await this.client.chat.postMessage({
      channel: this.channel,
      text: message.text,
      blocks: message.blocks,
    });

    if (!result.ok) {
      throw new Error(`Slack rejected trend alert: ${result.error ?? 'unknown error'}`);
    }
  }
}
