/**
 * 統一的 Logger 工具
 *
 * 為所有 log 輸出加入時間戳記與等級，方便 debug 時追蹤事件發生順序。
 *
 * 特性：
 * - 時間格式：[YYYY-MM-DD HH:mm:ss]（預設 UTC，可由 LOG_TIMEZONE 調整）
 * - 保留前綴慣例（[Runner]、[PushPlus] 等）
 * - 輸出目的地：stderr 與 append-only 的 log 檔，由 configureLogging() 在程式進入點設定一次
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogDestination = 'stderr' | { file: string };

export interface LoggingConfig {
  destinations: LogDestination[];
  level: LogLevel;
  timezone: string;
}

export interface LoggerOptions {
  /** 指定設定（測試用）；未指定時使用 configureLogging() 的全域設定 */
  config?: LoggingConfig;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

let globalConfig: LoggingConfig = {
  destinations: ['stderr'],
  level: 'info',
  timezone: 'UTC',
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * 設定全域 log 輸出，應在程式進入點呼叫一次
 */
export function configureLogging(config: Partial<LoggingConfig>): LoggingConfig {
  globalConfig = { ...globalConfig, ...config };

  for (const destination of globalConfig.destinations) {
    if (destination !== 'stderr') {
      mkdirSync(dirname(destination.file), { recursive: true });
    }
  }

  return globalConfig;
}

export function getLoggingConfig(): LoggingConfig {
  return globalConfig;
}

/**
 * 格式化時間戳記
 * 格式：YYYY-MM-DD HH:mm:ss
 */
function formatTimestamp(timezone: string): string {
  return new Date().toLocaleString('sv-SE', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

/**
 * Logger 類別
 */
export class Logger {
  private prefix: string;
  private config: LoggingConfig | undefined;

  constructor(prefix: string, options?: LoggerOptions) {
    this.prefix = prefix;
    this.config = options?.config;
  }

  // 每次寫入時才讀取全域設定，模組層級建立的 logger 也會套用之後的 configureLogging()
  private get settings(): LoggingConfig {
    return this.config ?? globalConfig;
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    const settings = this.settings;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) {
      return;
    }

    const line = format(
      `[${formatTimestamp(settings.timezone)}] [${level.toUpperCase()}] [${this.prefix}] ${message}`,
      ...args
    );
    this.emit(line, settings.destinations);
  }

  private emit(line: string, destinations: LogDestination[]): void {
    for (const destination of destinations) {
      if (destination === 'stderr') {
        process.stderr.write(`${line}\n`);
      } else {
        this.appendToFile(destination.file, line, destinations);
      }
    }
  }

  /**
   * 寫檔失敗不往外丟，改寫到 stderr（已輸出到 stderr 時只附上錯誤）
   */
  private appendToFile(file: string, line: string, destinations: LogDestination[]): void {
    try {
      appendFileSync(file, `${line}\n`, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[${this.prefix}] log file write failed (${file}): ${reason}\n`);
      if (!destinations.includes('stderr')) {
        process.stderr.write(`${line}\n`);
      }
    }
  }

  /**
   * 一般資訊
   */
  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  /**
   * 警告訊息
   */
  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  /**
   * 錯誤訊息
   */
  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /**
   * Debug 訊息（LOG_LEVEL=debug 時輸出）
   */
  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }
}

/**
 * 執行期只需要的 log 介面，方便注入測試替身
 */
export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * 建立 Logger 實例
 */
export function createLogger(prefix: string, options?: LoggerOptions): Logger {
  return new Logger(prefix, options);
}

export default Logger;
