import { z } from 'zod';
import { isRecord, lookup } from '../core/config.js';
import type { ContentPlugin, PluginContext, PushMessage } from '../core/models.js';
import { readApiKey } from '../utils/env.js';
import { bodyPreview, fetchWithTimeout, withQuery } from '../utils/http.js';
import { intAtLeast, nameMap, parsePluginConfig, symbolList } from './schema.js';
import { errorMessage, escapeHtml, formatDate, formatOptional, heading, wrapBody } from './render.js';

export const BANK_EXCHANGE_URL = 'https://api.tanshuapi.com/api/bank_exchange/v1/index';

export const BANK_NAMES: Record<string, string> = {
  ICBC: '工商银行',
  BOC: '中国银行',
  ABCHINA: '农业银行',
  BANKCOMM: '交通银行',
  CCB: '建设银行',
  CMBCHINA: '招商银行',
  CEBBANK: '光大银行',
  SPDB: '浦发银行',
  CIB: '兴业银行',
  ECITIC: '中信银行',
};

const configSchema = z.object({
  banks: symbolList('banks', { upperCase: true }),
  currencies: symbolList('currencies', { upperCase: true }),
  currency_names: nameMap({ upperCaseKeys: true }),
  provider: z
    .object({
      api_key_env: z.string().trim().min(1).default('TANSHUAPI_KEY'),
      endpoint: z.string().url().default(BANK_EXCHANGE_URL),
    })
    .default({}),
  display: z
    .object({
      price_precision: intAtLeast(0, 4),
    })
    .default({}),
});

export type ExchangeConfig = z.output<typeof configSchema>;

export interface BankResult {
  bankCode: string;
  updateTime: string;
  rates: Record<string, unknown>[];
  failed: boolean;
  errorMsg: string;
}

function failedBank(bankCode: string, errorMsg: string, updateTime = ''): BankResult {
  return { bankCode, updateTime, rates: [], failed: true, errorMsg };
}

/**
 * 探數銀行匯率接口；任何錯誤都轉成 failed 結果，不影響其他銀行
 */
export async function fetchBankExchange(
  bankCode: string,
  provider: ExchangeConfig['provider'],
  env: NodeJS.ProcessEnv
): Promise<BankResult> {
  const apiKey = readApiKey(provider.api_key_env, env);
  if (!apiKey) {
    return failedBank(bankCode, `缺少 API key 环境变量: ${provider.api_key_env}`);
  }

  let response: Response;
  try {
    response = await fetchWithTimeout(withQuery(provider.endpoint, { key: apiKey, bank_code: bankCode }));
  } catch (error) {
    return failedBank(bankCode, errorMessage(error));
  }

  if (response.status !== 200) {
    return failedBank(
      bankCode,
      `请求失败: status=${response.status}, body=${JSON.stringify(await bodyPreview(response))}`
    );
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    return failedBank(bankCode, `解析响应失败: ${errorMessage(error)}`);
  }

  if (!isRecord(data)) {
    return failedBank(bankCode, '接口返回格式异常');
  }
  if (data.code !== 1) {
    return failedBank(bankCode, String(data.msg || data.message || '未知错误'));
  }
  const inner = data.data;
  if (!isRecord(inner)) {
    return failedBank(bankCode, '接口未返回 data');
  }

  const updateTime = typeof inner.time === 'string' ? inner.time.trim() : '';
  if (!Array.isArray(inner.code_list)) {
    return failedBank(bankCode, '接口未返回 code_list', updateTime);
  }

  return {
    bankCode,
    updateTime,
    rates: inner.code_list.filter(isRecord),
    failed: false,
    errorMsg: '',
  };
}

export function renderBank(
  result: BankResult,
  currencies: string[],
  currencyNames: Record<string, string>,
  precision: number
): string[] {
  const bankName = lookup(BANK_NAMES, result.bankCode) ?? result.bankCode;
  const blocks = [
    `<h3 style="margin:16px 0 8px;font-size:14px;font-weight:600;">${escapeHtml(bankName)} (${escapeHtml(result.bankCode)})</h3>`,
  ];

  if (result.failed) {
    blocks.push(
      `<div style="margin-bottom:12px;color:#e53935;">获取失败：${escapeHtml(result.errorMsg)}</div>`
    );
    return blocks;
  }

  if (result.updateTime) {
    blocks.push(
      `<p style="margin:0 0 8px;font-size:12px;color:#666;">数据更新时间：${escapeHtml(result.updateTime)}</p>`
    );
  }

  const byCode = new Map<string, Record<string, unknown>>();
  for (const rate of result.rates) {
    byCode.set(String(rate.code ?? '').trim().toUpperCase(), rate);
  }

  const cell = 'padding:8px 12px;font-size:12px;';
  const rows = [
    '<tr style="background:#f5f5f5;">' +
      `<th style="${cell}text-align:left;">币种</th>` +
      `<th style="${cell}text-align:right;">中间价</th>` +
      `<th style="${cell}text-align:right;">现汇买入</th>` +
      `<th style="${cell}text-align:right;">现汇卖出</th>` +
      '</tr>',
  ];
  for (const code of currencies) {
    const item = byCode.get(code);
    const apiName = typeof item?.name === 'string' ? item.name : '';
    const name = lookup(currencyNames, code) || apiName || code;
    rows.push(
      '<tr style="border-bottom:1px solid #eee;">' +
        `<td style="${cell}">${escapeHtml(name)}</td>` +
        `<td style="${cell}text-align:right;">${formatOptional(item?.zhesuan, precision)}</td>` +
        `<td style="${cell}text-align:right;">${formatOptional(item?.hui_in, precision)}</td>` +
        `<td style="${cell}text-align:right;">${formatOptional(item?.hui_out, precision)}</td>` +
        '</tr>'
    );
  }

  blocks.push(
    '<table style="width:100%;border-collapse:collapse;border:1px solid #eee;border-radius:6px;background:#fafafa;margin-bottom:12px;">' +
      rows.join('') +
      '</table>'
  );
  return blocks;
}

/**
 * exchange.daily-brief：各銀行外匯牌價簡報
 */
export class ExchangeDailyBriefPlugin implements ContentPlugin {
  readonly id = 'exchange.daily-brief';
  private env: NodeJS.ProcessEnv;

  constructor(options?: { env?: NodeJS.ProcessEnv }) {
    this.env = options?.env ?? process.env;
  }

  async run(ctx: PluginContext): Promise<PushMessage[]> {
    const config = parsePluginConfig(this.id, configSchema, ctx.pluginConfig);
    const dateStr = formatDate(ctx.now);

    const blocks = [heading(`银行汇率简报（${dateStr}）`)];
    for (const bankCode of config.banks) {
      const result = await fetchBankExchange(bankCode, config.provider, this.env);
      blocks.push(
        ...renderBank(result, config.currencies, config.currency_names, config.display.price_precision)
      );
    }

    return [
      {
        title: `银行汇率简报 ${dateStr}`,
        body: wrapBody(blocks),
        format: 'html',
        targetRecipient: null,
      },
    ];
  }
}
