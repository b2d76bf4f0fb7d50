import { z } from 'zod';
import { isRecord, lookup } from '../core/config.js';
import type { ContentPlugin, PluginContext, PushMessage } from '../core/models.js';
import { readApiKey } from '../utils/env.js';
import { bodyPreview, fetchWithTimeout, withQuery } from '../utils/http.js';
import { intAtLeast, nameMap, parsePluginConfig, symbolList, textOr } from './schema.js';
import {
  colorChange,
  errorMessage,
  escapeHtml,
  failureBlocks,
  formatDate,
  formatOptional,
  formatSigned,
  heading,
  toNumber,
  wrapBody,
} from './render.js';

export const METALPRICE_LATEST_URL = 'https://api.metalpriceapi.com/v1/latest';
export const METALPRICE_HISTORY_URL = 'https://api.metalpriceapi.com/v1';
export const FREEGOLDPRICE_URL = 'https://freegoldprice.org/api/v2';
export const BANKGOLD2_URL = 'https://api.tanshuapi.com/api/gold/v1/bankgold2';

const OUNCE_TO_GRAM = 31.1034768;
const DAY_MS = 24 * 60 * 60 * 1000;

const SYMBOL_CURRENCIES: Record<string, string> = {
  XAUUSD: 'USD',
  XAUCNY: 'CNY',
  XAUUSD_CNY: 'CNY',
};

const codeList = z
  .array(z.union([z.string(), z.number()]))
  .catch([])
  .transform((items) =>
    items.map((item) => String(item).trim().toUpperCase()).filter((item) => item.length > 0)
  );

const providerSchema = z
  .object({
    type: textOr('metalpriceapi', { case: 'lower' }),
    api_key_env: z.string().trim().min(1).optional(),
    endpoint: z.string().url().optional(),
    base_currency: textOr('XAU', { case: 'upper' }),
    action: textOr('GSJ'),
    unit: textOr('ounce', { case: 'lower' }),
    history_days: intAtLeast(1, 1),
  })
  .default({});

const fxSchema = z.object({
  currencies: codeList,
  base: textOr('CNY', { case: 'upper' }),
  labels: nameMap({ upperCaseKeys: true }),
});

const configSchema = z.object({
  symbols: symbolList('symbols', { upperCase: true }),
  symbol_names: nameMap({ upperCaseKeys: true }),
  provider: providerSchema,
  display: z
    .object({
      price_precision: intAtLeast(0, 2),
    })
    .default({}),
  // 非 mapping 時視為未設定
  fx: fxSchema.optional().catch(undefined),
});

export type GoldConfig = z.output<typeof configSchema>;
export type GoldProviderConfig = GoldConfig['provider'];
export type GoldFxConfig = z.output<typeof fxSchema>;

export interface GoldQuote {
  symbol: string;
  name: string;
  current: number;
  prevClose?: number;
  openToday?: number;
  changeAbs?: number;
  changePct?: number;
  failed: boolean;
  errorMsg: string;
}

/** tanshuapi bankgold2 的單一品種資料 */
export type BankGoldItem = Record<string, unknown>;

function failedQuote(symbol: string, name: string, errorMsg: string): GoldQuote {
  return { symbol, name, current: 0, failed: true, errorMsg };
}

function symbolToCurrency(symbol: string): string | undefined {
  return lookup(SYMBOL_CURRENCIES, symbol.trim().toUpperCase());
}

function requireApiKey(envName: string, env: NodeJS.ProcessEnv): string {
  const apiKey = readApiKey(envName, env);
  if (!apiKey) {
    throw new Error(`缺少 API key 环境变量: ${envName}`);
  }
  return apiKey;
}

/**
 * 從 rates、data.rates 或 result.rates 取出報價，key 轉大寫
 */
export function extractRates(payload: unknown): Record<string, number> {
  if (!isRecord(payload)) {
    return {};
  }
  const candidates = [
    payload.rates,
    isRecord(payload.data) ? payload.data.rates : undefined,
    isRecord(payload.result) ? payload.result.rates : undefined,
  ];
  for (const raw of candidates) {
    if (!isRecord(raw)) {
      continue;
    }
    const rates: Record<string, number> = {};
    for (const [key, value] of Object.entries(raw)) {
      const num = toNumber(value);
      if (num !== undefined) {
        rates[key.toUpperCase()] = num;
      }
    }
    if (Object.keys(rates).length > 0) {
      return rates;
    }
  }
  return {};
}

/**
 * 呼叫 metalpriceapi 並取出 rates；label 用來區分錯誤訊息（金价、历史金价、汇率）
 */
async function requestMetalpriceRates(
  url: string,
  query: { apiKey: string; base: string; currencies: string[] },
  label: string
): Promise<Record<string, number>> {
  const response = await fetchWithTimeout(
    withQuery(url, { api_key: query.apiKey, base: query.base, currencies: query.currencies.join(',') })
  );
  if (!response.ok) {
    throw new Error(`${label}接口请求失败: status=${response.status}`);
  }

  const data: unknown = await response.json();
  if (isRecord(data) && data.success === false) {
    const info = isRecord(data.error) ? data.error.info ?? data.error.message : undefined;
    throw new Error(typeof info === 'string' && info ? info : `${label}接口返回失败`);
  }

  const rates = extractRates(data);
  if (Object.keys(rates).length === 0) {
    throw new Error(`${label}接口未返回可用 rates`);
  }
  return rates;
}

function toUnit(rates: Record<string, number>, unit: string): Record<string, number> {
  if (unit !== 'gram') {
    return rates;
  }
  const converted: Record<string, number> = {};
  for (const [key, value] of Object.entries(rates)) {
    converted[key] = value / OUNCE_TO_GRAM;
  }
  return converted;
}

interface SpotRates {
  current: Record<string, number>;
  previous?: Record<string, number>;
}

/** 最新價與 history_days 天前的價格（XAU 為基準） */
async function fetchMetalpriceRates(
  provider: GoldProviderConfig,
  currencies: string[],
  now: Date,
  env: NodeJS.ProcessEnv
): Promise<SpotRates> {
  const apiKey = requireApiKey(provider.api_key_env ?? 'METALPRICE_API_KEY', env);
  if (provider.base_currency !== 'XAU') {
    throw new Error('provider.base_currency 仅支持 XAU');
  }

  const query = { apiKey, base: 'XAU', currencies };
  const current = await requestMetalpriceRates(
    provider.endpoint ?? METALPRICE_LATEST_URL,
    query,
    '金价'
  );
  const historyDate = formatDate(new Date(now.getTime() - provider.history_days * DAY_MS));
  const previous = await requestMetalpriceRates(
    `${METALPRICE_HISTORY_URL}/${historyDate}`,
    query,
    '历史金价'
  );
  return { current: toUnit(current, provider.unit), previous: toUnit(previous, provider.unit) };
}

function snippet(data: unknown): string {
  const text = JSON.stringify(data);
  return text.length > 200 ? `${text.slice(0, 200)}...（截断）` : text;
}

function freeGoldPriceError(data: Record<string, unknown>): string {
  const error = data.error;
  if (isRecord(error)) {
    const detail = error.info || error.message || error.detail;
    return detail ? String(detail) : '';
  }
  return typeof error === 'string' ? error : '';
}

/**
 * freegoldprice.org：只有即時價（ask，沒有時用 bid），不提供昨收
 */
async function fetchFreeGoldPriceRates(
  provider: GoldProviderConfig,
  currencies: string[],
  env: NodeJS.ProcessEnv
): Promise<SpotRates> {
  const apiKey = requireApiKey(provider.api_key_env ?? 'FREEGOLDPRICE_API_KEY', env);
  const response = await fetchWithTimeout(
    withQuery(provider.endpoint ?? FREEGOLDPRICE_URL, { key: apiKey, action: provider.action })
  );
  if (response.status !== 200) {
    throw new Error(
      `金价接口请求失败: status=${response.status}, body=${await bodyPreview(response)}`
    );
  }

  const data: unknown = await response.json();
  if (!isRecord(data)) {
    throw new Error('金价接口返回格式异常');
  }

  const actionBlock = lookup(data, provider.action);
  const payload = isRecord(actionBlock) ? actionBlock : data;
  const gold = payload.gold || payload.Gold;
  if (!isRecord(gold)) {
    const errorMsg = freeGoldPriceError(data);
    throw new Error(
      errorMsg
        ? `金价接口未返回 gold 数据（${errorMsg}）`
        : `金价接口未返回 gold 数据（响应片段: ${snippet(data)}）`
    );
  }

  const current: Record<string, number> = {};
  for (const currency of currencies) {
    const entry = lookup(gold, currency);
    if (!isRecord(entry)) {
      continue;
    }
    const price = toNumber(entry.ask || entry.bid);
    if (price !== undefined) {
      current[currency] = price;
    }
  }
  if (Object.keys(current).length === 0) {
    throw new Error('金价接口未返回所需币种的报价');
  }
  return { current };
}

function fetchSpotRates(
  provider: GoldProviderConfig,
  currencies: string[],
  now: Date,
  env: NodeJS.ProcessEnv
): Promise<SpotRates> {
  switch (provider.type) {
    case 'metalpriceapi':
      return fetchMetalpriceRates(provider, currencies, now, env);
    case 'freegoldprice':
      return fetchFreeGoldPriceRates(provider, currencies, env);
    default:
      return Promise.reject(new Error(`暂不支持 provider.type=${provider.type}`));
  }
}

async function fetchSpotQuotes(
  symbols: string[],
  symbolNames: Record<string, string>,
  provider: GoldProviderConfig,
  now: Date,
  env: NodeJS.ProcessEnv
): Promise<GoldQuote[]> {
  const nameOf = (symbol: string) => lookup(symbolNames, symbol) || symbol;

  const currencies = [
    ...new Set(symbols.map(symbolToCurrency).filter((c): c is string => c !== undefined)),
  ];
  if (currencies.length === 0) {
    return symbols.map((s) => failedQuote(s, nameOf(s), '无可用 symbol，请使用 XAUUSD/XAUCNY'));
  }

  let rates: SpotRates;
  try {
    rates = await fetchSpotRates(provider, currencies, now, env);
  } catch (error) {
    return symbols.map((s) => failedQuote(s, nameOf(s), errorMessage(error)));
  }

  return symbols.map((symbol) => {
    const currency = symbolToCurrency(symbol);
    if (currency === undefined) {
      return failedQuote(symbol, nameOf(symbol), '不支持的 symbol');
    }
    const price = lookup(rates.current, currency);
    if (price === undefined) {
      return failedQuote(symbol, nameOf(symbol), `缺少 ${currency} 报价`);
    }
    if (!rates.previous) {
      return { symbol, name: nameOf(symbol), current: price, failed: false, errorMsg: '' };
    }
    const prevClose = lookup(rates.previous, currency);
    if (prevClose === undefined) {
      return failedQuote(symbol, nameOf(symbol), `缺少 ${currency} 报价`);
    }
    const changeAbs = price - prevClose;
    return {
      symbol,
      name: nameOf(symbol),
      current: price,
      prevClose,
      changeAbs,
      changePct: prevClose ? (changeAbs / prevClose) * 100 : 0,
      failed: false,
      errorMsg: '',
    };
  });
}

/**
 * 探數「銀行帳戶黃金」接口，回傳以品種代碼（大寫）為 key 的行情
 */
async function fetchBankGold(
  provider: GoldProviderConfig,
  env: NodeJS.ProcessEnv
): Promise<Record<string, BankGoldItem>> {
  const apiKey = requireApiKey(provider.api_key_env ?? 'TANSHUAPI_KEY', env);
  const response = await fetchWithTimeout(withQuery(provider.endpoint ?? BANKGOLD2_URL, { key: apiKey }));
  if (!response.ok) {
    throw new Error(
      `金价接口请求失败: status=${response.status}, body=${await bodyPreview(response)}`
    );
  }

  const data: unknown = await response.json();
  if (!isRecord(data)) {
    throw new Error('金价接口返回格式异常');
  }
  if (data.code !== 1) {
    throw new Error(`金价接口返回错误: ${String(data.msg ?? data.message ?? '未知错误')}`);
  }
  if (!isRecord(data.data)) {
    throw new Error('金价接口未返回 data');
  }
  const list = data.data.list;
  if (!isRecord(list)) {
    throw new Error('金价接口未返回 data.list');
  }

  const items: Record<string, BankGoldItem> = {};
  for (const [key, value] of Object.entries(list)) {
    if (isRecord(value)) {
      items[key.trim().toUpperCase()] = value;
    }
  }
  return items;
}

function parsePercent(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return toNumber(String(value).replace('%', ''));
}

export function bankGoldQuote(symbol: string, name: string, item: BankGoldItem | undefined): GoldQuote {
  if (!item) {
    return failedQuote(symbol, name, '接口未返回该品种');
  }
  const price = toNumber(item.price);
  if (price === undefined) {
    return failedQuote(symbol, name, '缺少价格');
  }
  return {
    symbol,
    name,
    current: price,
    prevClose: toNumber(item.lastclosingprice),
    openToday: toNumber(item.openingprice),
    changeAbs: toNumber(item.changequantity),
    changePct: parsePercent(item.changepercent),
    failed: false,
    errorMsg: '',
  };
}

function changeCells(q: GoldQuote): { pct: string; abs: string } {
  return {
    pct: q.changePct === undefined ? '--' : colorChange(q.changePct),
    abs: q.changeAbs === undefined ? '--' : formatSigned(q.changeAbs),
  };
}

function text(value: unknown): string {
  return typeof value === 'string' && value.trim() ? value.trim() : '—';
}

export function renderBankGoldCards(
  quotes: GoldQuote[],
  items: Record<string, BankGoldItem>,
  precision: number
): string[] {
  return quotes
    .filter((q) => !q.failed)
    .map((q) => {
      const item = lookup(items, q.symbol) ?? {};
      const change = changeCells(q);
      return (
        '<div style="margin-bottom:12px;padding:10px;border:1px solid #eee;border-radius:6px;background:#fafafa;">' +
        '<div style="display:flex;justify-content:space-between;align-items:baseline;margin-bottom:6px;">' +
        `<span style="font-size:14px;font-weight:600;">${escapeHtml(q.name)}</span>` +
        `<span style="font-size:16px;font-weight:600;">${q.current.toFixed(precision)} ` +
        `<span style="font-size:11px;color:#666;font-weight:400;">${escapeHtml(text(item.unit))}</span></span>` +
        '</div>' +
        `<div style="font-size:12px;color:#666;margin-bottom:4px;">买入 ${formatOptional(item.buyprice, precision)} / ` +
        `卖出 ${formatOptional(item.sellprice, precision)} · 昨收 ${formatOptional(q.prevClose, precision)} / ` +
        `今开 ${formatOptional(q.openToday, precision)}</div>` +
        `<div style="font-size:12px;">涨跌 ${change.pct}（${change.abs}） ` +
        `<span style="color:#999;font-size:11px;">${escapeHtml(text(item.updatetime))}</span></div>` +
        '</div>'
      );
    });
}

export function renderMetalpriceTable(
  quotes: GoldQuote[],
  precision: number,
  historyLabel: string
): string[] {
  const cell = 'padding:3px 4px;border-top:1px solid #eee;';
  const blocks = [
    '<table style="width:100%;border-collapse:collapse;font-size:12px;table-layout:fixed;">' +
      '<thead><tr>' +
      '<th style="text-align:left;padding:3px 4px;width:40%;">品种</th>' +
      '<th style="text-align:right;padding:3px 4px;width:20%;">现价</th>' +
      `<th style="text-align:right;padding:3px 4px;width:20%;">基准价<br><span style="font-size:11px;color:#666;">${historyLabel}</span></th>` +
      '<th style="text-align:right;padding:3px 4px;width:20%;">涨跌</th>' +
      '</tr></thead><tbody>',
  ];
  for (const q of quotes.filter((quote) => !quote.failed)) {
    const change = changeCells(q);
    const prev = q.prevClose === undefined ? '--' : q.prevClose.toFixed(precision);
    blocks.push(
      '<tr>' +
        `<td style="${cell}">${escapeHtml(q.name)}</td>` +
        `<td style="${cell}text-align:right;white-space:nowrap;">${q.current.toFixed(precision)}</td>` +
        `<td style="${cell}text-align:right;white-space:nowrap;">${prev}</td>` +
        `<td style="${cell}text-align:right;white-space:nowrap;">${change.pct} / ${change.abs}</td>` +
        '</tr>'
    );
  }
  blocks.push('</tbody></table>');
  return blocks;
}

/**
 * 匯率參考：以 fx.base 為基準查詢 fx.currencies（不做單位換算）
 */
async function fetchFxRates(
  provider: GoldProviderConfig,
  fx: GoldFxConfig,
  env: NodeJS.ProcessEnv
): Promise<Record<string, number>> {
  const apiKey = requireApiKey(provider.api_key_env ?? 'METALPRICE_API_KEY', env);
  return requestMetalpriceRates(
    provider.endpoint ?? METALPRICE_LATEST_URL,
    { apiKey, base: fx.base, currencies: fx.currencies },
    '汇率'
  );
}

export function renderFxTable(
  base: string,
  currencies: string[],
  labels: Record<string, string>,
  rates: Record<string, number>
): string[] {
  const cell = 'padding:3px 4px;border-top:1px solid #eee;';
  const rows: string[] = [];
  for (const code of currencies) {
    const rate = lookup(rates, code);
    if (rate === undefined) {
      continue;
    }
    rows.push(
      '<tr>' +
        `<td style="${cell}">${escapeHtml(lookup(labels, code) ?? code)} (${escapeHtml(code)})</td>` +
        `<td style="${cell}text-align:right;white-space:nowrap;">${rate.toFixed(4)}</td>` +
        '</tr>'
    );
  }
  if (rows.length === 0) {
    return [];
  }
  return [
    `<div style="margin-top:10px;font-size:13px;font-weight:600;">汇率参考（1 ${escapeHtml(base)}）</div>`,
    '<table style="width:100%;border-collapse:collapse;font-size:12px;table-layout:fixed;">' +
      '<thead><tr>' +
      '<th style="text-align:left;padding:3px 4px;width:40%;">货币</th>' +
      '<th style="text-align:right;padding:3px 4px;width:60%;">1 基础货币 =</th>' +
      '</tr></thead><tbody>',
    ...rows,
    '</tbody></table>',
  ];
}

/**
 * gold.daily-brief：金價簡報
 *
 * provider.type：
 * - metalpriceapi：最新價與 history_days 天前價格比較，可附 fx 匯率參考
 * - freegoldprice：只有即時價
 * - tanshuapi_bankgold2：銀行帳戶黃金
 */
export class GoldDailyBriefPlugin implements ContentPlugin {
  readonly id = 'gold.daily-brief';
  private env: NodeJS.ProcessEnv;

  constructor(options?: { env?: NodeJS.ProcessEnv }) {
    this.env = options?.env ?? process.env;
  }

  async run(ctx: PluginContext): Promise<PushMessage[]> {
    const config = parsePluginConfig(this.id, configSchema, ctx.pluginConfig);
    const { symbols, symbol_names: symbolNames, provider, fx } = config;
    const precision = config.display.price_precision;
    const dateStr = formatDate(ctx.now);

    const blocks = [heading(`今日金价简报（${dateStr}）`)];
    let quotes: GoldQuote[];

    if (provider.type === 'tanshuapi_bankgold2') {
      let items: Record<string, BankGoldItem> = {};
      try {
        items = await fetchBankGold(provider, this.env);
        quotes = symbols.map((s) => bankGoldQuote(s, lookup(symbolNames, s) || s, lookup(items, s)));
      } catch (error) {
        quotes = symbols.map((s) => failedQuote(s, lookup(symbolNames, s) || s, errorMessage(error)));
      }
      blocks.push(...renderBankGoldCards(quotes, items, precision));
    } else {
      quotes = await fetchSpotQuotes(symbols, symbolNames, provider, ctx.now, this.env);
      const historyLabel = formatDate(
        new Date(ctx.now.getTime() - provider.history_days * DAY_MS)
      ).slice(5);
      blocks.push(...renderMetalpriceTable(quotes, precision, historyLabel));
    }

    if (fx && provider.type === 'metalpriceapi' && fx.currencies.length > 0) {
      try {
        const rates = await fetchFxRates(provider, fx, this.env);
        blocks.push(...renderFxTable(fx.base, fx.currencies, fx.labels, rates));
      } catch (error) {
        blocks.push(
          `<div style="margin-top:8px;color:#e53935;">汇率获取失败：${escapeHtml(errorMessage(error))}</div>`
        );
      }
    }

    blocks.push(...failureBlocks(quotes.filter((q) => q.failed)));

    return [
      {
        title: `金价简报 ${dateStr}`,
        body: wrapBody(blocks),
        format: 'html',
        targetRecipient: null,
      },
    ];
  }
}
