import { describe, it, expect } from 'vitest';
import type { ToolContext } from '../tool.types.js';
import { ToolArgumentError } from '../tool.types.js';
import { makeSources, type FakeRoute } from '../../testing/fake.fetch.js';
import {
  getTokenPriceTool,
  getTrendingCoinsTool,
  searchCryptocurrenciesTool,
  getTokenHistoricalDataTool,
} from './coingecko.tools.js';

function setup(routes: FakeRoute[], coingeckoKey?: string) {
  const { sources, requests } = makeSources(routes, { coingecko: coingeckoKey });
  const ctx: ToolContext = { agentId: 'market_analyst', role: 'market_analyst', sources };
  return { ctx, requests };
}

const SEARCH_ETH: FakeRoute = {
  match: '/search?query=',
  body: {
    coins: [
      { id: 'wrapped-eth', name: 'Wrapped ETH', symbol: 'weth', market_cap_rank: 40 },
      { id: 'ethereum', name: 'Ethereum', symbol: 'eth', market_cap_rank: 2 },
    ],
  },
};

describe('get_token_price', () => {
  it('resolves the symbol to an exact match and quotes the price', async () => {
    const { ctx, requests } = setup(
      [SEARCH_ETH, { match: '/simple/price', body: { ethereum: { usd: 3150.5 } } }],
      'test-secret',
    );

    const output = await getTokenPriceTool.execute({ symbol: 'eth' }, ctx);

    expect(output).toBe('Current price of ETH: 3150.5 USD');
    expect(requests[1]?.url).toBe(
      'https://api.coingecko.com/api/v3/simple/price?ids=ethereum&vs_currencies=usd',
    );
    expect(requests[0]?.headers['x-cg-demo-api-key']).toBe('test-secret');
  });

  it('reports an unknown symbol without throwing', async () => {
    const { ctx } = setup([{ match: '/search?query=', body: { coins: [] } }]);
    expect(await getTokenPriceTool.execute({ symbol: 'xyz' }, ctx)).toBe(
      'Could not find a token with symbol XYZ',
    );
  });

  it('rejects a missing symbol', async () => {
    const { ctx } = setup([]);
    await expect(getTokenPriceTool.execute({}, ctx)).rejects.toBeInstanceOf(ToolArgumentError);
  });

  it('surfaces HTTP failures as errors', async () => {
    const { ctx } = setup([{ match: '/search', status: 429, body: { status: 'rate limited' } }]);
    await expect(getTokenPriceTool.execute({ symbol: 'btc' }, ctx)).rejects.toThrow('CoinGecko: HTTP 429');
  });
});

describe('get_trending_coins', () => {
  it('lists coins up to the limit with their platforms', async () => {
    const { ctx } = setup([
      {
        match: '/search/trending',
        body: {
          coins: [
            {
              item: {
                id: 'pepe',
                name: 'Pepe',
                symbol: 'pepe',
                market_cap_rank: 30,
                score: 0,
                platforms: { ethereum: '0xabc', solana: '' },
              },
            },
            { item: { id: 'sui', name: 'Sui', symbol: 'sui', market_cap_rank: null, score: 1 } },
            { item: { id: 'x', name: 'X', symbol: 'x', score: 2 } },
          ],
        },
      },
    ]);

    const output = await getTrendingCoinsTool.execute({ limit: 2, include_platform: true }, ctx);

    expect(output).toBe(
      'Trending coins on CoinGecko:\n\n' +
        '1. Pepe (PEPE) - Rank: 30, Score: 0\n' +
        '   Platforms:\n' +
        '   - ethereum: 0xabc\n' +
        '2. Sui (SUI) - Rank: N/A, Score: 1\n',
    );
  });
});

describe('search_cryptocurrencies', () => {
  it('filters to exact matches when asked', async () => {
    const { ctx } = setup([SEARCH_ETH]);
    const output = await searchCryptocurrenciesTool.execute({ query: 'ETH', exact_match: true }, ctx);
    expect(output).toBe("Search results for 'ETH':\n\n1. Ethereum (ETH) - Market cap rank: 2 - ID: ethereum\n");
  });
});

describe('get_token_historical_data', () => {
  it('summarises price, market cap and volume over the period', async () => {
    const day = (d: number) => Date.UTC(2024, 0, d);
    const { ctx, requests } = setup([
      {
        match: '/market_chart',
        body: {
          prices: [
            [day(1), 100],
            [day(2), 80],
            [day(3), 150],
          ],
          market_caps: [
            [day(1), 1000],
            [day(3), 1500],
          ],
          total_volumes: [
            [day(1), 10],
            [day(3), 30],
          ],
        },
      },
    ]);

    const output = await getTokenHistoricalDataTool.execute(
      { token_id: 'bitcoin', token_label: 'Bitcoin' },
      ctx,
    );

    expect(requests[0]?.url).toBe(
      'https://api.coingecko.com/api/v3/coins/bitcoin/market_chart?vs_currency=usd&days=90',
    );
    expect(output).toBe(
      '=== Bitcoin: last 90 days ===\n\n' +
        'Current price: $150.000000\n' +
        'Price change over period: 50.00%\n' +
        'Low: $80.000000 (2024-01-02)\n' +
        'High: $150.000000 (2024-01-03)\n\n' +
        'Current market cap: $1,500.00\n' +
        'Market cap change over period: 50.00%\n\n' +
        'Current volume: $30.00\n' +
        'Average volume over period: $20.00\n',
    );
  });
});
