/**
 * 排程服務 Daemon
 *
 * 常駐背景，每分鐘（UTC 整分）觸發一次 runner，等同外部 cron 每分鐘呼叫 `push-assistant run`。
 * 每次觸發都重新讀取設定檔，修改設定不需重啟。
 *
 * 使用方式：
 *   npm run daemon
 *   或用 PM2: pm2 start dist/index.js --name push-assistant -- daemon
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { Runner, RunSummary } from '../core/runner.js';
import { PushAssistantError } from '../core/errors.js';
import { createLogger, type LogSink } from '../utils/logger.js';
import { VERSION } from '../version.js';

export const EVERY_MINUTE = '* * * * *';

export interface DaemonOptions {
  configPath: string;
  dryRun: boolean;
}

export class SchedulerDaemon {
  private runner: Runner;
  private options: DaemonOptions;
  private logger: LogSink;
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(runner: Runner, options: DaemonOptions, logger?: LogSink) {
    this.runner = runner;
    this.options = options;
    this.logger = logger ?? createLogger('Daemon');
  }

  isBusy(): boolean {
    return this.running;
  }

  /**
   * 執行一次 run；上一次還沒結束時略過這次觸發，避免同時執行
   */
  async tick(now: Date = new Date()): Promise<RunSummary | null> {
    if (this.running) {
      this.logger.warn('Previous run still in progress, skipping this tick');
      return null;
    }

    this.running = true;
    try {
      return await this.runner.run({
        configPath: this.options.configPath,
        dryRun: this.options.dryRun,
        now,
      });
    } catch (error) {
      if (error instanceof PushAssistantError) {
        this.logger.error(`Run aborted: ${error.message}`);
      } else {
        this.logger.error('Run failed:', error);
      }
      return null;
    } finally {
      this.running = false;
    }
  }

  start(): void {
    this.stop();
    this.task = cron.schedule(
      EVERY_MINUTE,
      () => {
        this.tick().catch((error) => this.logger.error('Tick failed:', error));
      },
      { timezone: 'UTC' }
    );
    this.logger.info(`Started (config: ${this.options.configPath}, dry-run: ${this.options.dryRun})`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }
}

/**
 * 驗證設定後啟動 daemon；設定有誤時回傳 1 不啟動
 */
export async function startSchedulerDaemon(
  options: DaemonOptions,
  deps: { runner: Runner; logger?: LogSink }
): Promise<number> {
  const logger = deps.logger ?? createLogger('Daemon');
  logger.info(`Starting scheduler daemon v${VERSION}...`);

  try {
    const config = await deps.runner.loadAndValidate(options.configPath);
    logger.info(`Found ${config.schedules.length} schedule(s)`);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const daemon = new SchedulerDaemon(deps.runner, options, logger);
  daemon.start();
  logger.info('Daemon running. Press Ctrl+C to stop.');

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    daemon.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return 0;
}
