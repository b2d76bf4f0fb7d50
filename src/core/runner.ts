import {
  DEFAULT_CHANNEL_TYPE,
  loadConfig,
  lookup,
  validateConfig,
  type AppConfig,
  type JobConfig,
  type ScheduleConfig,
} from './config.js';
import { withTargetRecipient, type ContentPlugin, type PluginContext, type PushMessage } from './models.js';
import type { Registry } from './registry.js';
import { selectSchedules } from './schedule-matcher.js';
import type { ChannelRegistry } from './notification/registry.js';
import { createLogger, type LogSink } from '../utils/logger.js';

/** dry-run 預覽 body 的最大長度 */
export const PREVIEW_LENGTH = 200;

export interface RunOptions {
  configPath: string;
  /** 指定排程 id 時忽略 cron 直接執行 */
  scheduleId?: string;
  /** 執行 plugin 但不呼叫 channel.send() */
  dryRun?: boolean;
  now?: Date;
}

export interface RunSummary {
  schedules: string[];
  jobsSucceeded: number;
  jobsFailed: number;
  messagesDispatched: number;
  messagesPreviewed: number;
  messagesDropped: number;
}

export interface RunnerDeps {
  plugins: Registry<ContentPlugin>;
  channels: ChannelRegistry;
  logger?: LogSink;
  clock?: () => Date;
}

function emptySummary(): RunSummary {
  return {
    schedules: [],
    jobsSucceeded: 0,
    jobsFailed: 0,
    messagesDispatched: 0,
    messagesPreviewed: 0,
    messagesDropped: 0,
  };
}

/**
 * 依 code point 截斷，避免切開 emoji 等代理對
 */
export function previewBody(body: string): string {
  return Array.from(body).slice(0, PREVIEW_LENGTH).join('').replace(/\n/g, ' ');
}

/**
 * 排程執行器
 *
 * 一次 run() 對應一次觸發：載入並驗證設定、選出到期排程、依序執行每個 job，
 * 把 plugin 產生的訊息送到收件者的 channel。單一 job 失敗不影響其他 job。
 * 不保留跨次執行的狀態。
 */
export class Runner {
  private plugins: Registry<ContentPlugin>;
  private channels: ChannelRegistry;
  private logger: LogSink;
  private clock: () => Date;

  constructor(deps: RunnerDeps) {
    this.plugins = deps.plugins;
    this.channels = deps.channels;
    this.logger = deps.logger ?? createLogger('Runner');
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * 載入並驗證設定檔，不執行任何排程
   */
  async loadAndValidate(configPath: string): Promise<AppConfig> {
    return validateConfig(await loadConfig(configPath), this.plugins);
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const config = await this.loadAndValidate(options.configPath);

    const now = options.now ?? this.clock();
    const schedules = selectSchedules(config, now, options.scheduleId, this.logger);
    if (schedules.length === 0) {
      this.logger.info(
        'No schedules to run (current time does not match any cron). Use --schedule <id> to run a schedule anyway.'
      );
      return emptySummary();
    }

    return this.dispatch(config, schedules, now, options.dryRun ?? false);
  }

  /**
   * 依序執行排程中的所有 job
   */
  async dispatch(
    config: AppConfig,
    schedules: ScheduleConfig[],
    now: Date,
    dryRun: boolean
  ): Promise<RunSummary> {
    const summary = emptySummary();
    summary.schedules = schedules.map((s) => s.id);

    if (dryRun) {
      this.logger.info('Dry-run mode enabled: will execute plugins but not send any messages to channels.');
    }
    this.logger.info(`Running ${schedules.length} schedule(s): ${summary.schedules.join(', ')}`);

    for (const schedule of schedules) {
      for (const job of schedule.jobs) {
        try {
          await this.runJob(config, job, now, dryRun, summary);
          summary.jobsSucceeded++;
        } catch (error) {
          summary.jobsFailed++;
          this.logger.error(
            `job failed schedule=${schedule.id} recipient=${job.recipientId} plugin=${job.pluginId}:`,
            error
          );
        }
      }
    }

    this.logger.info(
      `Run finished: jobs ok=${summary.jobsSucceeded} failed=${summary.jobsFailed}, ` +
        `messages sent=${summary.messagesDispatched} previewed=${summary.messagesPreviewed} dropped=${summary.messagesDropped}`
    );
    return summary;
  }

  private async runJob(
    config: AppConfig,
    job: JobConfig,
    now: Date,
    dryRun: boolean,
    summary: RunSummary
  ): Promise<void> {
    const ctx: PluginContext = {
      now,
      recipientId: job.recipientId,
      pluginConfig: lookup(config.pluginConfigs, job.configRef) ?? {},
      globalConfig: config.globalConfig,
    };
    const plugin = this.plugins.create(job.pluginId);
    const messages = await plugin.run(ctx);
    this.logger.debug(`Plugin ${job.pluginId} produced ${messages.length} message(s)`);

    for (const produced of messages) {
      const message = produced.targetRecipient
        ? produced
        : withTargetRecipient(produced, job.recipientId);
      const target = message.targetRecipient ?? job.recipientId;

      const recipient = lookup(config.recipients, target);
      if (!recipient) {
        this.logger.warn(`message target_recipient '${target}' not in recipients, skip`);
        summary.messagesDropped++;
        continue;
      }

      const channelType = recipient.channel.type || DEFAULT_CHANNEL_TYPE;
      const createChannel = this.channels.resolve(channelType);

      if (dryRun) {
        this.logPreview(target, channelType, message);
        summary.messagesPreviewed++;
        continue;
      }

      await createChannel().send(message, recipient.channel);
      summary.messagesDispatched++;
    }
  }

  private logPreview(target: string, channelType: string, message: PushMessage): void {
    this.logger.info(
      `Dry-run: would send to recipient='${target}' via channel='${channelType}' ` +
        `title=${JSON.stringify(message.title)} preview=${JSON.stringify(previewBody(message.body))}`
    );
  }
}
