import { z } from 'zod';
import * as cheerio from 'cheerio';
import { lookup } from '../core/config.js';
import type { ContentPlugin, PluginContext, PushMessage } from '../core/models.js';
import { createLogger } from '../utils/logger.js';
import { fetchWithTimeout, withQuery } from '../utils/http.js';
import { looseInt, nameMap, parsePluginConfig, symbolList } from './schema.js';
import {
  colorChange,
  errorMessage,
  escapeHtml,
  failureBlocks,
  formatDate,
  formatSigned,
  heading,
  toNumber,
  wrapBody,
} from './render.js';

const logger = createLogger('StocksDaily');

export const SINA_QUOTE_URL = 'http://hq.sinajs.cn/list=';
export const EASTMONEY_NEWS_URL = 'https://so.eastmoney.com/news/s';

const NEWS_LINK_SELECTOR = "div.news_item_t a, .newslist a, a[href*='eastmoney.com']";
const NEWS_TITLE_MAX = 80;

const configSchema = z.object({
  symbols: symbolList('symbols'),
  symbol_names: nameMap(),
  with_news: z.unknown().transform((value) => Boolean(value)),
  news_per_symbol: looseInt(3).transform((value) => Math.max(0, value)),
});

export type StocksConfig = z.output<typeof configSchema>;

export interface StockQuote {
  symbol: string;
  name: string;
  prevClose: number;
  openToday: number;
  current: number;
  changePct: number;
  failed: boolean;
  errorMsg: string;
}

export interface NewsItem {
  title: string;
  url: string;
}

function failedQuote(symbol: string, errorMsg: string, name = ''): StockQuote {
  return {
    symbol,
    name,
    prevClose: 0,
    openToday: 0,
    current: 0,
    changePct: 0,
    failed: true,
    errorMsg,
  };
}

function isHongKong(symbol: string): boolean {
  return symbol.trim().toUpperCase().endsWith('.HK');
}

/**
 * 轉成新浪行情代碼
 *
 * - 600519.SH → sh600519
 * - 000858.SZ → sz000858
 * - 1024.HK   → hk01024（港股補到 5 位）
 * - 沒有後綴時 6 開頭視為上海，其餘視為深圳
 */
export function toSinaCode(symbol: string): string {
  const s = symbol.trim().toUpperCase();
  if (!s) {
    return '';
  }
  if (s.endsWith('.SH')) {
    return `sh${s.slice(0, -3)}`;
  }
  if (s.endsWith('.SZ')) {
    return `sz${s.slice(0, -3)}`;
  }
  if (s.endsWith('.HK')) {
    const digits = s.slice(0, -3).replace(/\D/g, '');
    return digits ? `hk${digits.padStart(5, '0')}` : '';
  }
  if (s.startsWith('6')) {
    return `sh${s}`;
  }
  return `sz${s}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseFields(symbol: string, parts: string[]): StockQuote {
  // A 股：0=名稱 1=今開 2=昨收 3=現價
  // 港股：0=英文名 1=中文名 2=今開 3=昨收 6=現價
  const hk = isHongKong(symbol);
  const minLength = hk ? 7 : 4;
  if (parts.length < minLength) {
    const name = parts[hk && parts.length > 1 ? 1 : 0] ?? '';
    return failedQuote(symbol, '字段不足', name);
  }

  const [open, prev, current] = hk
    ? [parts[2], parts[3], parts[6]].map(toNumber)
    : [parts[1], parts[2], parts[3]].map(toNumber);
  if (open === undefined || prev === undefined || current === undefined) {
    return failedQuote(symbol, '价格格式错误');
  }

  let name = parts[0].trim();
  if (hk) {
    const cnName = parts[1].trim();
    // 中文名含漢字才採用，否則用英文名避免亂碼
    name = /[\u4e00-\u9fff]/.test(cnName) ? cnName : name;
  }

  return {
    symbol,
    name,
    prevClose: prev,
    openToday: open,
    current,
    changePct: prev ? ((current - prev) / prev) * 100 : 0,
    failed: false,
    errorMsg: '',
  };
}

/**
 * 解析新浪行情回應，每個 symbol 對應一行 var hq_str_<code>="...";
 */
export function parseSinaQuotes(symbols: string[], text: string): StockQuote[] {
  return symbols.map((symbol) => {
    const code = toSinaCode(symbol);
    const match = code
      ? new RegExp(`var\\s+hq_str_${escapeRegExp(code)}="([^"]*)"`).exec(text)
      : null;
    if (!match) {
      return failedQuote(symbol, '无数据');
    }
    return parseFields(symbol, match[1].split(','));
  });
}

async function fetchQuotes(symbols: string[]): Promise<StockQuote[]> {
  const codes = symbols.map(toSinaCode);
  try {
    const response = await fetchWithTimeout(`${SINA_QUOTE_URL}${codes.join(',')}`, {
      headers: { Referer: 'https://finance.sina.com.cn/' },
    });
    // 新浪行情回應為 GBK 編碼
    const text = new TextDecoder('gbk').decode(await response.arrayBuffer());
    return parseSinaQuotes(symbols, text);
  } catch (error) {
    logger.warn(`Sina quote request failed: ${errorMessage(error)}`);
    return symbols.map((symbol) => failedQuote(symbol, errorMessage(error)));
  }
}

function isNewsLink(title: string, url: string): boolean {
  if (title.length <= 4 || !/[\u4e00-\u9fff]/.test(title)) {
    return false;
  }
  // 過濾廣告與推廣連結
  if (title.includes('东方财富') || title.includes('免费版') || title.toLowerCase().includes('level-2')) {
    return false;
  }
  return !url.includes('acttg.eastmoney.com');
}

/**
 * 從東方財富搜尋結果頁取出新聞標題與連結，最多 limit 則
 */
export function parseEastmoneyNews(html: string, limit: number): NewsItem[] {
  if (limit <= 0) {
    return [];
  }
  const $ = cheerio.load(html);
  const items: NewsItem[] = [];
  for (const link of $(NEWS_LINK_SELECTOR).slice(0, limit * 5).toArray()) {
    let url = $(link).attr('href') ?? '';
    if (!url.includes('eastmoney.com') && !url.startsWith('http')) {
      continue;
    }
    if (!url.startsWith('http')) {
      url = url.startsWith('/') ? `https://so.eastmoney.com${url}` : `https://${url}`;
    }
    const title = $(link).text().trim();
    if (!isNewsLink(title, url)) {
      continue;
    }
    items.push({ title: title.slice(0, NEWS_TITLE_MAX), url });
    if (items.length >= limit) {
      break;
    }
  }
  return items;
}

/**
 * 以關鍵字搜尋新聞；失敗時記錄警告並回傳空清單
 */
export async function fetchNews(keyword: string, limit: number): Promise<NewsItem[]> {
  if (limit <= 0) {
    return [];
  }
  try {
    const response = await fetchWithTimeout(withQuery(EASTMONEY_NEWS_URL, { keyword }));
    return parseEastmoneyNews(await response.text(), limit);
  } catch (error) {
    logger.warn(`News fetch failed for ${keyword}: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * 顯示名稱：優先使用 symbol_names，其次 A 股介面名稱；港股不採用介面名稱，直接顯示代碼
 */
function displayName(quote: StockQuote, symbolNames: Record<string, string>): string {
  const custom = lookup(symbolNames, quote.symbol);
  if (custom) {
    return custom;
  }
  return (!isHongKong(quote.symbol) && quote.name) || quote.symbol;
}

function renderNews(
  quotes: StockQuote[],
  symbolNames: Record<string, string>,
  news: Map<string, NewsItem[]>
): string[] {
  const blocks = ['<h3 style="margin:8px 0 4px;">新闻</h3>'];
  for (const q of quotes) {
    const items = news.get(q.symbol);
    if (!items) {
      continue;
    }
    const custom = lookup(symbolNames, q.symbol);
    const title = isHongKong(q.symbol) && custom === undefined ? q.symbol : `${q.symbol} ${custom || q.name}`;
    blocks.push(`<div style="margin-top:6px;font-weight:600;">${escapeHtml(title)}</div>`);
    if (items.length === 0) {
      blocks.push('<div style="color:#757575;">暂无相关新闻。</div>');
      continue;
    }
    blocks.push(
      '<ul style="padding-left:18px;margin:4px 0 8px;">' +
        items
          .map((item) => `<li><a href="${escapeHtml(item.url)}" target="_blank">${escapeHtml(item.title)}</a></li>`)
          .join('') +
        '</ul>'
    );
  }
  return blocks;
}

/**
 * news 以 symbol 為 key；沒有傳入時不輸出新聞區塊
 */
export function renderStocksBrief(
  dateStr: string,
  quotes: StockQuote[],
  symbolNames: Record<string, string>,
  news?: Map<string, NewsItem[]>
): string {
  const cell = 'padding:4px 6px;border-top:1px solid #eee;';
  const blocks: string[] = [
    heading(`今日股票简报（${dateStr}）`),
    '<table style="width:100%;border-collapse:collapse;font-size:13px;">' +
      '<thead><tr>' +
      '<th style="text-align:left;padding:4px 6px;">名称</th>' +
      '<th style="text-align:right;padding:4px 6px;">现价</th>' +
      '<th style="text-align:right;padding:4px 6px;">涨跌</th>' +
      '<th style="text-align:right;padding:4px 6px;">昨/今</th>' +
      '</tr></thead><tbody>',
  ];

  for (const q of quotes.filter((quote) => !quote.failed)) {
    blocks.push(
      '<tr>' +
        `<td style="${cell}">${escapeHtml(displayName(q, symbolNames))}</td>` +
        `<td style="${cell}text-align:right;">${q.current.toFixed(2)}</td>` +
        `<td style="${cell}text-align:right;">${colorChange(q.changePct)} / ${formatSigned(q.current - q.prevClose)}</td>` +
        `<td style="${cell}text-align:right;">${q.prevClose.toFixed(2)} / ${q.openToday.toFixed(2)}</td>` +
        '</tr>'
    );
  }
  blocks.push('</tbody></table>');
  blocks.push(...failureBlocks(quotes.filter((quote) => quote.failed)));
  if (news) {
    blocks.push(...renderNews(quotes, symbolNames, news));
  }

  return wrapBody(blocks);
}

/**
 * stocks.daily-brief：股票行情簡報（A 股、港股）
 *
 * with_news 開啟時，以介面回傳的名稱搜尋每個成功 symbol 的新聞（news_per_symbol 則）。
 */
export class StocksDailyBriefPlugin implements ContentPlugin {
  readonly id = 'stocks.daily-brief';

  async run(ctx: PluginContext): Promise<PushMessage[]> {
    const config = parsePluginConfig(this.id, configSchema, ctx.pluginConfig);
    const dateStr = formatDate(ctx.now);
    const quotes = await fetchQuotes(config.symbols);

    let news: Map<string, NewsItem[]> | undefined;
    if (config.with_news && config.news_per_symbol > 0) {
      news = new Map();
      for (const q of quotes.filter((quote) => !quote.failed && quote.name)) {
        news.set(q.symbol, await fetchNews(q.name, config.news_per_symbol));
      }
    }

    return [
      {
        title: `股票简报 ${dateStr}`,
        body: renderStocksBrief(dateStr, quotes, config.symbol_names, news),
        format: 'html',
        targetRecipient: null,
      },
    ];
  }
}
