/**
 * 設定檔載入與驗證
 *
 * YAML 格式，頂層包含 recipients、schedules、plugin_configs、global_config。
 * 驗證在任何排程執行前一次完成，遇到第一個錯誤就中止整次執行。
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parseDocument, visit } from 'yaml';
import { ConfigNotFoundError, ConfigValidationError } from './errors.js';
import type { Registry } from './registry.js';
import type { ContentPlugin } from './models.js';

export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

/** 沒有指定 channel.type 時使用的 channel */
export const DEFAULT_CHANNEL_TYPE = 'pushplus';

export interface ChannelConfig {
  type?: string;
  [key: string]: unknown;
}

export interface RecipientConfig {
  channel: ChannelConfig;
}

export interface JobConfig {
  recipientId: string;
  pluginId: string;
  configRef: string;
}

export interface ScheduleConfig {
  id: string;
  cron?: string;
  jobs: JobConfig[];
}

export interface AppConfig {
  recipients: Record<string, RecipientConfig>;
  schedules: ScheduleConfig[];
  pluginConfigs: Record<string, Record<string, unknown>>;
  globalConfig: Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * null、空字串、空陣列、空物件等都視為「沒有設定」
 */
function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

function hasKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * 只查物件自身的 key（避免 'toString' 之類的原型屬性被當成設定）
 */
export function lookup<T>(record: Record<string, T>, key: string): T | undefined {
  return hasKey(record, key) ? record[key] : undefined;
}

/**
 * YAML 裡 id 可能寫成數字，統一轉成字串；空值回傳 undefined
 */
function asIdentifier(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function describe(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

/** 000858 之類以 0 開頭的整數（股票代碼），保留原文 */
const LEADING_ZERO = /^[-+]?0\d+$/;

/**
 * 讀取並解析設定檔（尚未驗證）
 */
export async function loadConfig(path: string): Promise<unknown> {
  if (!existsSync(path)) {
    throw new ConfigNotFoundError(path);
  }

  const text = await readFile(path, 'utf-8');
  const doc = parseDocument(text, { keepSourceTokens: true });
  if (doc.errors.length > 0) {
    throw new ConfigValidationError(`config: failed to parse YAML (${doc.errors[0].message})`);
  }

  visit(doc, {
    Scalar(_key, node) {
      const token = node.srcToken;
      if (typeof node.value === 'number' && token?.type === 'scalar' && LEADING_ZERO.test(token.source)) {
        node.value = token.source;
      }
    },
  });
  return doc.toJS();
}

function validateRecipients(raw: Record<string, unknown>): Record<string, RecipientConfig> {
  const recipients = raw.recipients;
  if (isBlank(recipients)) {
    throw new ConfigValidationError('config: recipients is empty');
  }
  if (!isRecord(recipients)) {
    throw new ConfigValidationError('config: recipients must be a mapping');
  }

  const result: Record<string, RecipientConfig> = {};
  for (const [id, entry] of Object.entries(recipients)) {
    if (entry !== null && entry !== undefined && !isRecord(entry)) {
      throw new ConfigValidationError(`config: recipients.${id} must be a mapping`);
    }
    const channel = isRecord(entry) ? entry.channel : undefined;
    if (channel !== null && channel !== undefined && !isRecord(channel)) {
      throw new ConfigValidationError(`config: recipients.${id}.channel must be a mapping`);
    }
    if (!isRecord(channel)) {
      result[id] = { channel: {} };
      continue;
    }
    const type = typeof channel.type === 'string' ? channel.type : undefined;
    if (channel.type !== undefined && channel.type !== null && type === undefined) {
      throw new ConfigValidationError(`config: recipients.${id}.channel.type must be a string`);
    }
    result[id] = { channel: { ...channel, type: type || undefined } };
  }
  return result;
}

function validateMapping(
  raw: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError(`config: ${key} must be a mapping`);
  }
  return value;
}

function validatePluginConfigs(
  raw: Record<string, unknown>
): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [ref, blob] of Object.entries(validateMapping(raw, 'plugin_configs'))) {
    if (blob === null || blob === undefined) {
      result[ref] = {};
    } else if (isRecord(blob)) {
      result[ref] = blob;
    } else {
      throw new ConfigValidationError(`config: plugin_configs.${ref} must be a mapping`);
    }
  }
  return result;
}

function validateJob(
  job: unknown,
  location: string,
  recipients: Record<string, RecipientConfig>,
  pluginConfigs: Record<string, Record<string, unknown>>,
  plugins: Registry<ContentPlugin>
): JobConfig {
  if (!isRecord(job)) {
    throw new ConfigValidationError(`config: ${location} must be a mapping`);
  }

  const recipientId = asIdentifier(job.recipient_id);
  if (recipientId === undefined || !hasKey(recipients, recipientId)) {
    throw new ConfigValidationError(
      `config: job recipient_id '${describe(job.recipient_id)}' not in recipients`
    );
  }

  const pluginId = asIdentifier(job.plugin_id);
  if (pluginId === undefined) {
    throw new ConfigValidationError(`config: ${location} missing 'plugin_id'`);
  }
  if (!plugins.has(pluginId)) {
    throw new ConfigValidationError(`config: plugin_id '${pluginId}' not in plugin registry`);
  }

  const configRef = asIdentifier(job.config_ref);
  if (configRef === undefined) {
    throw new ConfigValidationError(`config: ${location} missing 'config_ref'`);
  }
  if (!hasKey(pluginConfigs, configRef)) {
    throw new ConfigValidationError(`config: config_ref '${configRef}' not in plugin_configs`);
  }

  return { recipientId, pluginId, configRef };
}

/**
 * 驗證設定並回傳正規化後的 AppConfig
 *
 * 檢查順序：recipients 非空且為 mapping；依宣告順序檢查每個 schedule 的 id、
 * id 是否重複，以及每個 job 的 recipient_id、plugin_id、config_ref 是否能對應。
 */
export function validateConfig(raw: unknown, plugins: Registry<ContentPlugin>): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigValidationError('config: recipients is empty');
  }

  const recipients = validateRecipients(raw);
  const pluginConfigs = validatePluginConfigs(raw);
  const globalConfig = validateMapping(raw, 'global_config');

  const rawSchedules = raw.schedules ?? [];
  if (!Array.isArray(rawSchedules)) {
    throw new ConfigValidationError('config: schedules must be a list');
  }

  const seenIds = new Set<string>();
  const schedules: ScheduleConfig[] = rawSchedules.map((schedule: unknown, i) => {
    if (!isRecord(schedule)) {
      throw new ConfigValidationError(`config: schedules[${i}] must be a mapping`);
    }

    const id = asIdentifier(schedule.id);
    if (id === undefined) {
      throw new ConfigValidationError(`config: schedules[${i}] missing 'id'`);
    }
    if (seenIds.has(id)) {
      throw new ConfigValidationError(`config: duplicate schedule id '${id}'`);
    }
    seenIds.add(id);

    const rawJobs = schedule.jobs ?? [];
    if (!Array.isArray(rawJobs)) {
      throw new ConfigValidationError(`config: schedules[${i}].jobs must be a list`);
    }

    const jobs = rawJobs.map((job: unknown, j) =>
      validateJob(job, `schedules[${i}].jobs[${j}]`, recipients, pluginConfigs, plugins)
    );

    const cron = schedule.cron;
    return {
      id,
      cron: cron === undefined || cron === null || cron === '' ? undefined : String(cron),
      jobs,
    };
  });

  return { recipients, schedules, pluginConfigs, globalConfig };
}
