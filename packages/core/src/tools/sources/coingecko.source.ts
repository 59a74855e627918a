import { z } from 'zod';
import { HttpSource, type SourceOptions } from './http.source.js';

const COINGECKO_URL = 'https://api.coingecko.com/api/v3';

const searchSchema = z.object({
  coins: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      symbol: z.string(),
      market_cap_rank: z.number().nullable().optional(),
    }),
  ),
});

const trendingSchema = z.object({
  coins: z.array(
    z.object({
      item: z.object({
        id: z.string(),
        name: z.string(),
        symbol: z.string(),
        market_cap_rank: z.number().nullable().optional(),
        score: z.number().optional(),
        platforms: z.record(z.string().nullable()).optional(),
      }),
    }),
  ),
});

const simplePriceSchema = z.record(z.record(z.number()));

const point = z.tuple([z.number(), z.number()]);
const marketChartSchema = z.object({
  prices: z.array(point),
  market_caps: z.array(point),
  total_volumes: z.array(point),
});

export type CoinSearchHit = z.infer<typeof searchSchema>['coins'][number];
export type TrendingCoin = z.infer<typeof trendingSchema>['coins'][number]['item'];
export type MarketChart = z.infer<typeof marketChartSchema>;

export class CoinGeckoSource extends HttpSource {
  protected readonly name = 'CoinGecko';
  private readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(options: SourceOptions) {
    super(options);
    this.baseUrl = options.baseUrl ?? COINGECKO_URL;
    this.apiKey = options.apiKey;
  }

  async searchCoins(query: string): Promise<CoinSearchHit[]> {
    const result = await this.get(`/search?query=${encodeURIComponent(query)}`, searchSchema);
    return result.coins;
  }

  /** Resolve a ticker to a CoinGecko id, preferring exact symbol matches. */
  async resolveId(symbol: string): Promise<string | null> {
    const coins = await this.searchCoins(symbol);
    const exact = coins.find((coin) => coin.symbol.toLowerCase() === symbol.toLowerCase());
    return exact?.id ?? null;
  }

  async simplePrice(id: string, vsCurrency = 'usd'): Promise<number | null> {
    const prices = await this.get(
      `/simple/price?ids=${encodeURIComponent(id)}&vs_currencies=${encodeURIComponent(vsCurrency)}`,
      simplePriceSchema,
    );
    return prices[id]?.[vsCurrency] ?? null;
  }

  async trending(): Promise<TrendingCoin[]> {
    const result = await this.get('/search/trending', trendingSchema);
    return result.coins.map((coin) => coin.item);
  }

  marketChart(id: string, vsCurrency: string, days: string): Promise<MarketChart> {
    return this.get(
      `/coins/${encodeURIComponent(id)}/market_chart?vs_currency=${encodeURIComponent(vsCurrency)}&days=${encodeURIComponent(days)}`,
      marketChartSchema,
    );
  }

  private get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const headers: Record<string, string> = this.apiKey ? { 'x-cg-demo-api-key': this.apiKey } : {};
    return this.requestJson(`${this.baseUrl}${path}`, schema, { headers });
  }
}
