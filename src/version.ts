/**
 * 套件資訊（CLI 名稱與 --version、daemon 啟動訊息）
 */

import { readFileSync } from 'fs';

export interface PackageInfo {
  name: string;
  version: string;
}

const FALLBACK: PackageInfo = { name: 'push-assistant', version: '0.0.0' };

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function stringField(record: object, key: string): string | undefined {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * 讀取 package.json 的 name 與 version
 *
 * 檔案不存在或欄位不是字串時使用預設值；JSON 格式錯誤照常丟出。
 */
export function readPackageInfo(location: URL | string): PackageInfo {
  let text: string;
  try {
    text = readFileSync(location, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return FALLBACK;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null) {
    return FALLBACK;
  }
  return {
    name: stringField(parsed, 'name') ?? FALLBACK.name,
    version: stringField(parsed, 'version') ?? FALLBACK.version,
  };
}

// src/ 與 dist/ 都在專案根目錄下一層
export const PACKAGE_INFO: PackageInfo = readPackageInfo(new URL('../package.json', import.meta.url));

export const VERSION: string = PACKAGE_INFO.version;
