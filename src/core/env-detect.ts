/**
 * 環境設定
 *
 * 從環境變數（.env 由 dotenv 在進入點載入）讀取 log 與設定檔路徑。
 */

import { isLogLevel, type LogDestination, type LoggingConfig } from '../utils/logger.js';
import { DEFAULT_CONFIG_PATH } from './config.js';

export const DEFAULT_LOG_FILE = 'logs/push-assistant.log';

export interface EnvironmentInfo {
  logLevel: LoggingConfig['level'];
  /** 空字串代表不寫檔 */
  logFile: string;
  logTimezone: string;
  configPath: string;
}

/**
 * 讀取目前的執行環境設定；無效的 LOG_LEVEL 退回 info
 */
export function detectEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentInfo {
  const level = (env.LOG_LEVEL ?? '').trim().toLowerCase();

  return {
    logLevel: isLogLevel(level) ? level : 'info',
    logFile: env.LOG_FILE ?? DEFAULT_LOG_FILE,
    logTimezone: env.LOG_TIMEZONE || 'UTC',
    configPath: env.PUSH_ASSISTANT_CONFIG || DEFAULT_CONFIG_PATH,
  };
}

/**
 * 依環境設定組出 log 設定：永遠輸出到 stderr，有設定 LOG_FILE 時另外附加寫檔
 */
export function loggingConfigFor(info: EnvironmentInfo): LoggingConfig {
  const destinations: LogDestination[] = ['stderr'];
  if (info.logFile) {
    destinations.push({ file: info.logFile });
  }
  return { destinations, level: info.logLevel, timezone: info.logTimezone };
}
