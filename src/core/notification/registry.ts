import { Registry } from '../registry.js';
import { PushPlusChannel } from './adapters/pushplus.js';
import { SlackChannel } from './adapters/slack.js';
import type { NotificationChannel } from './types.js';

export type ChannelRegistry = Registry<NotificationChannel>;

export function createDefaultChannelRegistry(): ChannelRegistry {
  return new Registry<NotificationChannel>('channel type')
    .register('pushplus', () => new PushPlusChannel())
    .register('slack', () => new SlackChannel());
}
