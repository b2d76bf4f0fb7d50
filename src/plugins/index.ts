import { Registry } from '../core/registry.js';
import type { ContentPlugin } from '../core/models.js';
import { PlaceholderPlugin } from './placeholder.js';
import { StocksDailyBriefPlugin } from './stocks-daily.js';
import { GoldDailyBriefPlugin } from './gold-daily.js';
import { ExchangeDailyBriefPlugin } from './exchange-daily.js';

export type PluginRegistry = Registry<ContentPlugin>;

export function createDefaultPluginRegistry(): PluginRegistry {
  return new Registry<ContentPlugin>('plugin')
    .register('placeholder', () => new PlaceholderPlugin())
    .register('stocks.daily-brief', () => new StocksDailyBriefPlugin())
    .register('gold.daily-brief', () => new GoldDailyBriefPlugin())
    .register('exchange.daily-brief', () => new ExchangeDailyBriefPlugin());
}

export { PlaceholderPlugin, StocksDailyBriefPlugin, GoldDailyBriefPlugin, ExchangeDailyBriefPlugin };
