import { z } from 'zod';
import { PluginConfigError } from '../core/errors.js';

/**
 * 字串清單：數字會轉成字串、去除空白、過濾空項目，至少要有一項
 */
export function symbolList(field: string, options?: { upperCase?: boolean }) {
  return z
    .array(z.union([z.string(), z.number()]), {
      required_error: `must have '${field}' (list)`,
      invalid_type_error: `'${field}' must be a list`,
    })
    .transform((items) =>
      items
        .map((item) => String(item).trim())
        .map((item) => (options?.upperCase ? item.toUpperCase() : item))
        .filter((item) => item.length > 0)
    )
    .refine((items) => items.length > 0, { message: `'${field}' is empty` });
}

/**
 * 名稱對照表，key 可選擇轉大寫；非 mapping 的值視為空表
 */
export function nameMap(options?: { upperCaseKeys?: boolean }) {
  return z
    .unknown()
    .transform((value) => {
      const result: Record<string, string> = {};
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return result;
      }
      for (const [key, name] of Object.entries(value)) {
        const normalized = key.trim();
        result[options?.upperCaseKeys ? normalized.toUpperCase() : normalized] = String(name);
      }
      return result;
    });
}

/**
 * 字串設定：空值使用預設值，其他型別轉成字串，可選擇轉大寫或小寫
 */
export function textOr(fallback: string, options?: { case?: 'upper' | 'lower' }) {
  return z.unknown().transform((value) => {
    const text = String(value || fallback).trim();
    if (options?.case === 'upper') {
      return text.toUpperCase();
    }
    return options?.case === 'lower' ? text.toLowerCase() : text;
  });
}

/**
 * 寬鬆整數：接受數字或數字字串並取整，無法解析時使用預設值
 */
export function looseInt(fallback: number) {
  return z.unknown().transform((value) => {
    const num =
      typeof value === 'number'
        ? value
        : typeof value === 'string' && value.trim() !== ''
          ? Number(value)
          : Number.NaN;
    return Number.isFinite(num) ? Math.trunc(num) : fallback;
  });
}

/**
 * 小於 min 時退回預設值
 */
export function intAtLeast(min: number, fallback: number) {
  return looseInt(fallback).transform((value) => (value < min ? fallback : value));
}

/**
 * 用 schema 驗證 plugin 自己的設定，失敗時丟出列出所有欄位問題的 PluginConfigError
 */
export function parsePluginConfig<T extends z.ZodTypeAny>(
  pluginId: string,
  schema: T,
  raw: unknown
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PluginConfigError(
      pluginId,
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}
