export { createDefaultChannelRegistry, type ChannelRegistry } from './registry.js';
export { PushPlusChannel, PUSHPLUS_URL, type PushPlusPayload } from './adapters/pushplus.js';
export { SlackChannel, type SlackClientFactory, type SlackPoster } from './adapters/slack.js';
export type { ChannelType, NotificationChannel } from './types.js';
