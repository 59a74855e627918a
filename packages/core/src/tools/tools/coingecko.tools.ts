import type { ToolImpl } from '../tool.types.js';
import { optionalBoolean, optionalNumber, optionalString, requireString } from '../tool.params.js';
import { isoDate, pct, percentChange, usd } from '../tools.format.js';

export const getTokenPriceTool: ToolImpl = {
  definition: {
    name: 'get_token_price',
    description: 'Current USD price of a token by ticker symbol (e.g. BTC, ETH) from CoinGecko.',
    parameters: {
      symbol: { type: 'string', description: 'Token ticker, e.g. BTC', required: true },
    },
  },

  async execute(params, ctx) {
    const symbol = requireString('get_token_price', params, 'symbol').toUpperCase();
    const id = await ctx.sources.coingecko.resolveId(symbol);
    if (!id) {
      return `Could not find a token with symbol ${symbol}`;
    }
    const price = await ctx.sources.coingecko.simplePrice(id);
    if (price === null) {
      return `Could not fetch a price for ${symbol}`;
    }
    return `Current price of ${symbol}: ${price} USD`;
  },
};

export const getTrendingCoinsTool: ToolImpl = {
  definition: {
    name: 'get_trending_coins',
    description: 'Coins currently trending on CoinGecko.',
    parameters: {
      limit: { type: 'number', description: 'Maximum number of coins to list', required: false },
      include_platform: {
        type: 'boolean',
        description: 'Include contract addresses per platform',
        required: false,
      },
    },
  },

  async execute(params, ctx) {
    const limit = optionalNumber('get_trending_coins', params, 'limit', 0, { min: 0, max: 100 });
    const includePlatform = optionalBoolean(params, 'include_platform', false);

    const trending = await ctx.sources.coingecko.trending();
    const coins = limit > 0 ? trending.slice(0, limit) : trending;
    if (coins.length === 0) {
      return 'No trending coins found.';
    }

    let result = 'Trending coins on CoinGecko:\n\n';
    coins.forEach((coin, idx) => {
      const rank = coin.market_cap_rank ?? 'N/A';
      const score = coin.score ?? 'N/A';
      result += `${idx + 1}. ${coin.name} (${coin.symbol.toUpperCase()}) - Rank: ${rank}, Score: ${score}\n`;
      if (includePlatform && coin.platforms) {
        const entries = Object.entries(coin.platforms).filter(([, address]) => address);
        if (entries.length > 0) {
          result += '   Platforms:\n';
          for (const [platform, address] of entries) {
            result += `   - ${platform}: ${address}\n`;
          }
        }
      }
    });
    return result;
  },
};

export const searchCryptocurrenciesTool: ToolImpl = {
  definition: {
    name: 'search_cryptocurrencies',
    description: 'Search CoinGecko by name or symbol. Returns names, symbols, ranks and CoinGecko ids.',
    parameters: {
      query: { type: 'string', description: 'Search text, e.g. "bitcoin" or "btc"', required: true },
      exact_match: {
        type: 'boolean',
        description: 'Only return coins whose symbol or name equals the query',
        required: false,
      },
    },
  },

  async execute(params, ctx) {
    const query = requireString('search_cryptocurrencies', params, 'query');
    const exact = optionalBoolean(params, 'exact_match', false);

    const needle = query.toLowerCase();
    const hits = await ctx.sources.coingecko.searchCoins(query);
    const coins = exact
      ? hits.filter((coin) => coin.symbol.toLowerCase() === needle || coin.name.toLowerCase() === needle)
      : hits;
    if (coins.length === 0) {
      return `No cryptocurrencies found for '${query}'.`;
    }

    let result = `Search results for '${query}':\n\n`;
    coins.slice(0, 10).forEach((coin, idx) => {
      result += `${idx + 1}. ${coin.name} (${coin.symbol.toUpperCase()})`;
      if (coin.market_cap_rank != null) {
        result += ` - Market cap rank: ${coin.market_cap_rank}`;
      }
      result += ` - ID: ${coin.id}\n`;
    });
    if (coins.length > 10) {
      result += `\n...and ${coins.length - 10} more results.`;
    }
    return result;
  },
};

export const getTokenHistoricalDataTool: ToolImpl = {
  definition: {
    name: 'get_token_historical_data',
    description:
      'Price, market cap and volume history for a CoinGecko token id, summarised over the period.',
    parameters: {
      token_id: { type: 'string', description: 'CoinGecko id, e.g. "bitcoin"', required: true },
      token_label: { type: 'string', description: 'Display name for the report', required: true },
      vs_currency: { type: 'string', description: 'Quote currency (default usd)', required: false },
      days: { type: 'string', description: 'Period in days (default 90)', required: false },
    },
  },

  async execute(params, ctx) {
    const tokenId = requireString('get_token_historical_data', params, 'token_id').toLowerCase();
    const label = optionalString(params, 'token_label', tokenId);
    const vsCurrency = optionalString(params, 'vs_currency', 'usd').toLowerCase();
    const days = String(optionalNumber('get_token_historical_data', params, 'days', 90, { min: 1, max: 3650 }));

    const chart = await ctx.sources.coingecko.marketChart(tokenId, vsCurrency, days);
    const prices = chart.prices;
    const first = prices[0];
    const last = prices[prices.length - 1];
    if (!first || !last) {
      return `No historical data for ${label}.`;
    }

    let low = first;
    let high = first;
    for (const point of prices) {
      if (point[1] < low[1]) low = point;
      if (point[1] > high[1]) high = point;
    }

    let result = `=== ${label}: last ${days} days ===\n\n`;
    result += `Current price: ${usd(last[1], 6)}\n`;
    result += `Price change over period: ${pct(percentChange(first[1], last[1]))}\n`;
    result += `Low: ${usd(low[1], 6)} (${isoDate(low[0])})\n`;
    result += `High: ${usd(high[1], 6)} (${isoDate(high[0])})\n\n`;

    const capFirst = chart.market_caps[0];
    const capLast = chart.market_caps[chart.market_caps.length - 1];
    if (capFirst && capLast) {
      result += `Current market cap: ${usd(capLast[1])}\n`;
      result += `Market cap change over period: ${pct(percentChange(capFirst[1], capLast[1]))}\n\n`;
    }

    const volumes = chart.total_volumes;
    const volLast = volumes[volumes.length - 1];
    if (volLast) {
      const average = volumes.reduce((sum, point) => sum + point[1], 0) / volumes.length;
      result += `Current volume: ${usd(volLast[1])}\n`;
      result += `Average volume over period: ${usd(average)}\n`;
    }
    return result;
  },
};
