/**
 * 簡報類 plugin 共用的 HTML 片段
 *
 * 樣式以手機閱讀為主；漲紅跌綠。
 */

const RISE_COLOR = '#e53935';
const FALL_COLOR = '#1b5e20';
const EMPTY = '—';

export interface FailedItem {
  symbol: string;
  errorMsg: string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * 轉成有限數字；空字串、null、非數字都回傳 undefined
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** YYYY-MM-DD（UTC） */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatOptional(value: unknown, precision: number): string {
  const num = toNumber(value);
  return num === undefined ? EMPTY : num.toFixed(precision);
}

export function formatSigned(value: number, precision = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(precision)}`;
}

/**
 * 漲跌幅字串，正數紅色、負數綠色
 */
export function colorChange(pct: number): string {
  const raw = `${formatSigned(pct)}%`;
  if (pct > 0) {
    return `<span style="color:${RISE_COLOR};">${raw}</span>`;
  }
  if (pct < 0) {
    return `<span style="color:${FALL_COLOR};">${raw}</span>`;
  }
  return raw;
}

export function heading(text: string): string {
  return `<h2 style="margin:0 0 8px;font-size:15px;font-weight:600;">${escapeHtml(text)}</h2>`;
}

export function failureBlocks(items: FailedItem[]): string[] {
  if (items.length === 0) {
    return [];
  }
  return [
    `<div style="margin-top:8px;color:${RISE_COLOR};">获取失败：</div>`,
    ...items.map(
      (item) =>
        `<div style="margin-bottom:4px;color:${RISE_COLOR};">` +
        `${escapeHtml(item.symbol)}：获取失败（${escapeHtml(item.errorMsg)}）</div>`
    ),
  ];
}

export function wrapBody(blocks: string[]): string {
  return (
    `<div style="font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',sans-serif;font-size:14px;line-height:1.6;">` +
    blocks.join('') +
    '</div>'
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
