import { WebClient } from '@slack/web-api';
import { createLogger, type LogSink } from '../../../utils/logger.js';
import { resolveEnvPlaceholders } from '../../../utils/env.js';
import { REQUEST_TIMEOUT_MS } from '../../../utils/http.js';
import type { ChannelConfig } from '../../config.js';
import type { PushMessage } from '../../models.js';
import type { NotificationChannel } from '../types.js';

export interface SlackPostArgs {
  channel: string;
  text: string;
  mrkdwn: boolean;
}

export interface SlackPoster {
  postMessage(args: SlackPostArgs): Promise<void>;
}

export type SlackClientFactory = (token: string) => SlackPoster;

const defaultClientFactory: SlackClientFactory = (token) => {
  const client = new WebClient(token, { timeout: REQUEST_TIMEOUT_MS, retryConfig: { retries: 0 } });
  return {
    async postMessage({ channel, text, mrkdwn }) {
      await client.chat.postMessage({ channel, text, mrkdwn });
    },
  };
};

/**
 * Slack 推播：收件者設定需要 token（可寫成 ${ENV_VAR}）與 channel
 */
export class SlackChannel implements NotificationChannel {
  readonly type = 'slack' as const;
  private logger: LogSink;
  private env: NodeJS.ProcessEnv;
  private clientFactory: SlackClientFactory;

  constructor(options?: {
    logger?: LogSink;
    env?: NodeJS.ProcessEnv;
    clientFactory?: SlackClientFactory;
  }) {
    this.logger = options?.logger ?? createLogger('Slack');
    this.env = options?.env ?? process.env;
    this.clientFactory = options?.clientFactory ?? defaultClientFactory;
  }

  async send(message: PushMessage, config: ChannelConfig): Promise<void> {
    const token =
      typeof config.token === 'string' ? resolveEnvPlaceholders(config.token, this.env).trim() : '';
    const channel = typeof config.channel === 'string' ? config.channel : '';

    if (!token || !channel) {
      this.logger.error("Slack channel config missing 'token' or 'channel'");
      return;
    }

    try {
      await this.clientFactory(token).postMessage({
        channel,
        text: `*${message.title}*\n${message.body}`,
        mrkdwn: message.format !== 'text',
      });
      this.logger.info(`Sent to Slack: ${message.title}`);
    } catch (error) {
      this.logger.error('Failed to send to Slack:', error);
    }
  }
}
