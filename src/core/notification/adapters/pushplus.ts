import { createLogger, type LogSink } from '../../../utils/logger.js';
import { resolveEnvPlaceholders } from '../../../utils/env.js';
import { bodyPreview, fetchWithTimeout } from '../../../utils/http.js';
import { isRecord, type ChannelConfig } from '../../config.js';
import type { PushMessage } from '../../models.js';
import type { NotificationChannel } from '../types.js';

export const PUSHPLUS_URL = 'https://www.pushplus.plus/send';

export interface PushPlusPayload {
  token: string;
  title: string;
  content: string;
  template: 'txt' | 'markdown' | 'html';
  topic?: string;
}

function toTemplate(format: PushMessage['format']): PushPlusPayload['template'] {
  switch (format) {
    case 'markdown':
      return 'markdown';
    case 'html':
      return 'html';
    default:
      return 'txt';
  }
}

function maskToken(token: string): string {
  return token.length > 4 ? `${token.slice(0, 4)}***` : '***';
}

/**
 * PushPlus 推播：POST JSON 到 PushPlus API
 *
 * 收件者設定需要 token（可寫成 ${ENV_VAR}），topic 可選。
 */
export class PushPlusChannel implements NotificationChannel {
  readonly type = 'pushplus' as const;
  private logger: LogSink;
  private env: NodeJS.ProcessEnv;

  constructor(options?: { logger?: LogSink; env?: NodeJS.ProcessEnv }) {
    this.logger = options?.logger ?? createLogger('PushPlus');
    this.env = options?.env ?? process.env;
  }

  buildPayload(message: PushMessage, token: string, config: ChannelConfig): PushPlusPayload {
    const payload: PushPlusPayload = {
      token,
      title: message.title,
      content: message.body,
      template: toTemplate(message.format),
    };
    if (typeof config.topic === 'string' && config.topic) {
      payload.topic = config.topic;
    }
    return payload;
  }

  async send(message: PushMessage, config: ChannelConfig): Promise<void> {
    if (typeof config.token !== 'string' || !config.token) {
      this.logger.error("PushPlus channel config missing 'token'");
      return;
    }

    const token = resolveEnvPlaceholders(config.token, this.env).trim();
    if (!token) {
      this.logger.error('PushPlus token is empty (env var not set or empty), check .env');
      return;
    }
    this.logger.debug(`PushPlus token: length=${token.length} prefix=${maskToken(token)}`);

    try {
      const response = await fetchWithTimeout(PUSHPLUS_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildPayload(message, token, config)),
      });

      if (!response.ok) {
        this.logger.error(
          `PushPlus send failed: status=${response.status} body=${await bodyPreview(response, 500)}`
        );
        return;
      }

      const data: unknown = await response.json();
      if (isRecord(data) && data.code !== 200) {
        this.logger.error(`PushPlus API error: code=${String(data.code)} msg=${String(data.msg ?? '')}`);
        return;
      }

      this.logger.info(`Sent to PushPlus: ${message.title}`);
    } catch (error) {
      this.logger.error('PushPlus request failed:', error);
    }
  }
}
