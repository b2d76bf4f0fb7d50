export { Runner, previewBody, type RunOptions, type RunSummary, type RunnerDeps } from './runner.js';
export {
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG_PATH,
  DEFAULT_CHANNEL_TYPE,
  type AppConfig,
  type ScheduleConfig,
  type JobConfig,
  type RecipientConfig,
  type ChannelConfig,
} from './config.js';
export { selectSchedules, isDue, truncateToMinute } from './schedule-matcher.js';
export { Registry, type Factory } from './registry.js';
export { withTargetRecipient, type PushMessage, type PluginContext, type ContentPlugin, type MessageFormat } from './models.js';
export * from './errors.js';
export * from './notification/index.js';
export { createDefaultPluginRegistry, type PluginRegistry } from '../plugins/index.js';
