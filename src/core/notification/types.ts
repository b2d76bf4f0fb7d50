import type { ChannelConfig } from '../config.js';
import type { PushMessage } from '../models.js';

export type ChannelType = 'pushplus' | 'slack';

/**
 * 通知管道
 *
 * send() 不丟錯誤：發送失敗由 channel 自行記 log，runner 不會得知結果。
 */
export interface NotificationChannel {
  readonly type: string;
  send(message: PushMessage, config: ChannelConfig): Promise<void>;
}
