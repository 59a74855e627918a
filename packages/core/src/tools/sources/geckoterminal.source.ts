import { z } from 'zod';
import { HttpSource, type SourceOptions } from './http.source.js';

const GECKOTERMINAL_URL = 'https://api.geckoterminal.com/api/v2';

const NETWORK_ALIASES: Record<string, string> = {
  ethereum: 'eth',
  arbitrum: 'arbitrum_one',
  binance: 'bsc',
  polygon: 'polygon_pos',
  optimism: 'optimism',
  base: 'base',
};

const DEX_ALIASES: Record<string, string> = {
  uniswap: 'uniswap_v3',
  sushi: 'sushiswap',
  pancake: 'pancakeswap_v2',
  pancakeswap: 'pancakeswap_v2',
  balancer: 'balancer_ethereum',
};

const numeric = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => (value == null ? 0 : Number(value) || 0));

const poolsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({
        name: z.string(),
        volume_usd: z.object({ h24: numeric }),
        reserve_in_usd: numeric,
        price_change_percentage: z.object({ h24: numeric }),
        transactions: z.object({
          h24: z.object({ buys: numeric, sells: numeric }),
        }),
      }),
    }),
  ),
});

export interface PoolSummary {
  address: string;
  pair: string;
  volume24h: number;
  liquidityUsd: number;
  priceChange24h: number;
  transactions: number;
}

export function normalizeNetwork(network: string): string {
  const key = network.trim().toLowerCase();
  return NETWORK_ALIASES[key] ?? key;
}

export function normalizeDex(dex: string): string {
  const key = dex.trim().toLowerCase();
  return DEX_ALIASES[key] ?? key;
}

export class GeckoTerminalSource extends HttpSource {
  protected readonly name = 'GeckoTerminal';
  private readonly baseUrl: string;

  constructor(options: SourceOptions) {
    super(options);
    this.baseUrl = options.baseUrl ?? GECKOTERMINAL_URL;
  }

  /** Network and dex ids must already be normalised. */
  async pools(network: string, dex: string): Promise<PoolSummary[]> {
    const url = `${this.baseUrl}/networks/${encodeURIComponent(network)}/dexes/${encodeURIComponent(dex)}/pools`;
    const result = await this.requestJson(url, poolsSchema);
    return result.data.map((pool) => {
      const [base = '', quote = ''] = pool.attributes.name.split(' / ');
      const { h24 } = pool.attributes.transactions;
      return {
        address: pool.id,
        pair: `${base}/${quote.split(' ')[0] ?? ''}`,
        volume24h: pool.attributes.volume_usd.h24,
        liquidityUsd: pool.attributes.reserve_in_usd,
        priceChange24h: pool.attributes.price_change_percentage.h24,
        transactions: h24.buys + h24.sells,
      };
    });
  }
}
