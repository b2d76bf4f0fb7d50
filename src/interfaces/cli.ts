/**
 * 命令列介面
 *
 * push-assistant run [--config <path>] [--schedule <id>] [--dry-run]
 * push-assistant daemon [--config <path>] [--dry-run]
 */

import { Command } from 'commander';
import { Runner } from '../core/runner.js';
import { PushAssistantError } from '../core/errors.js';
import { createDefaultChannelRegistry } from '../core/notification/registry.js';
import { createDefaultPluginRegistry } from '../plugins/index.js';
import { createLogger, type LogSink } from '../utils/logger.js';
import { startSchedulerDaemon } from './scheduler-daemon.js';
import { PACKAGE_INFO, VERSION } from '../version.js';

const logger = createLogger('CLI');

export interface RunCommandOptions {
  config: string;
  schedule?: string;
  dryRun?: boolean;
}

export interface CliDeps {
  runner?: Runner;
  logger?: LogSink;
}

export function createRunner(): Runner {
  return new Runner({
    plugins: createDefaultPluginRegistry(),
    channels: createDefaultChannelRegistry(),
    logger: createLogger('Runner'),
  });
}

/**
 * 執行一次 run，回傳 exit code
 *
 * 設定檔不存在、驗證失敗、找不到排程 id 等啟動錯誤回傳 1；沒有到期排程仍回傳 0。
 */
export async function runCommand(options: RunCommandOptions, deps: CliDeps = {}): Promise<number> {
  const log = deps.logger ?? logger;
  const runner = deps.runner ?? createRunner();

  try {
    await runner.run({
      configPath: options.config,
      scheduleId: options.schedule,
      dryRun: options.dryRun ?? false,
    });
    return 0;
  } catch (error) {
    if (error instanceof PushAssistantError) {
      log.error(error.message);
    } else {
      log.error('Fatal error:', error);
    }
    return 1;
  }
}

export function createProgram(defaultConfigPath: string, deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name(PACKAGE_INFO.name)
    .description('Scheduled push assistant: run content plugins on cron and deliver the results')
    .version(VERSION);

  program
    .command('run')
    .description('Run the schedules due this minute (or one schedule by id)')
    .option('--config <path>', 'config file path', defaultConfigPath)
    .option('--schedule <id>', 'run only this schedule id, ignoring its cron')
    .option('--dry-run', 'execute plugins and log messages without sending them', false)
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runCommand(options, deps);
    });

  program
    .command('daemon')
    .description('Keep running and trigger a run every minute (UTC)')
    .option('--config <path>', 'config file path', defaultConfigPath)
    .option('--dry-run', 'execute plugins and log messages without sending them', false)
    .action(async (options: RunCommandOptions) => {
      const code = await startSchedulerDaemon(
        { configPath: options.config, dryRun: options.dryRun ?? false },
        { runner: deps.runner ?? createRunner(), logger: deps.logger }
      );
      if (code !== 0) {
        process.exitCode = code;
      }
    });

  return program;
}
