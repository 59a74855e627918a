import type { ToolImpl } from '../tool.types.js';
import { optionalNumber, requireString } from '../tool.params.js';
import { isoDate, pct, percentChange, usd } from '../tools.format.js';

const DAY_MS = 86_400_000;

export const getCryptoPriceTool: ToolImpl = {
  definition: {
    name: 'get_crypto_price',
    description: 'Current mid price of a perpetual market on Hyperliquid (e.g. BTC, ETH, HYPE).',
    parameters: {
      symbol: { type: 'string', description: 'Asset symbol, e.g. BTC', required: true },
    },
  },

  async execute(params, ctx) {
    const symbol = requireString('get_crypto_price', params, 'symbol').toUpperCase();
    const mids = await ctx.sources.hyperliquid.allMids();
    const price = mids[symbol];
    if (price === undefined) {
      return `${symbol} is not listed on Hyperliquid`;
    }
    return `Hyperliquid mid price for ${symbol}: ${usd(price, price < 1 ? 6 : 2)}`;
  },
};

export const getKlinesHistoryTool: ToolImpl = {
  definition: {
    name: 'get_klines_history',
    description: 'Daily candles (OHLCV) for an asset on Hyperliquid over the last N days.',
    parameters: {
      symbol: { type: 'string', description: 'Asset symbol, e.g. ETH', required: true },
      days: { type: 'number', description: 'Days of history (default 7)', required: false },
    },
  },

  async execute(params, ctx) {
    const symbol = requireString('get_klines_history', params, 'symbol').toUpperCase();
    const days = optionalNumber('get_klines_history', params, 'days', 7, { min: 1, max: 365 });
    const end = Date.now();
    const candles = await ctx.sources.hyperliquid.candleSnapshot(symbol, '1d', end - days * DAY_MS, end);
    const first = candles[0];
    const last = candles[candles.length - 1];
    if (!first || !last) {
      return `No candles for ${symbol} over the last ${days} days`;
    }

    let result = `=== ${symbol} daily candles, last ${days} days ===\n\n`;
    for (const candle of candles) {
      result += `${isoDate(candle.t)}  O ${candle.o}  H ${candle.h}  L ${candle.l}  C ${candle.c}  V ${candle.v}\n`;
    }
    const high = Math.max(...candles.map((candle) => candle.h));
    const low = Math.min(...candles.map((candle) => candle.l));
    result += `\nPeriod high: ${high}, low: ${low}\n`;
    result += `Close-to-close change: ${pct(percentChange(first.o, last.c))}\n`;
    return result;
  },
};

export const getMarketInfoTool: ToolImpl = {
  definition: {
    name: 'get_market_info',
    description: 'Mark price, funding rate, open interest and 24h volume for a Hyperliquid perpetual.',
    parameters: {
      symbol: { type: 'string', description: 'Asset symbol, e.g. SOL', required: true },
    },
  },

  async execute(params, ctx) {
    const symbol = requireString('get_market_info', params, 'symbol').toUpperCase();
    const market = await ctx.sources.hyperliquid.market(symbol);
    if (!market) {
      return `${symbol} is not listed on Hyperliquid`;
    }
    let result = `=== Hyperliquid ${market.name}-PERP ===\n\n`;
    result += `Mark price: ${market.markPx}\n`;
    result += `24h change: ${pct(percentChange(market.prevDayPx, market.markPx))}\n`;
    result += `Funding (hourly): ${(market.funding * 100).toFixed(4)}%\n`;
    result += `Open interest: ${market.openInterest} ${market.name}\n`;
    result += `24h notional volume: ${usd(market.dayNtlVlm)}\n`;
    if (market.maxLeverage !== null) {
      result += `Max leverage: ${market.maxLeverage}x\n`;
    }
    return result;
  },
};
