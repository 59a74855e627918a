import type { ToolImpl } from '../tool.types.js';
import { optionalString, requireString, stringList } from '../tool.params.js';
import { SourceRequestError } from '../sources/http.source.js';
import { normalizeDex, normalizeNetwork, type PoolSummary } from '../sources/geckoterminal.source.js';
import { pct, percentChange, shortAddress, usd } from '../tools.format.js';

export const analyzeProtocolTool: ToolImpl = {
  definition: {
    name: 'analyze_protocol',
    description: 'TVL, 30-day TVL change, market cap and per-chain TVL for a DefiLlama protocol.',
    parameters: {
      protocol_id: { type: 'string', description: 'DefiLlama slug, e.g. "aave"', required: true },
      protocol_label: { type: 'string', description: 'Display name for the report', required: true },
      chains_to_show: {
        type: 'array',
        items: { type: 'string' },
        description: 'Chains to break TVL down by, e.g. ["Ethereum", "Arbitrum"]',
        required: true,
      },
    },
  },

  async execute(params, ctx) {
    const protocolId = requireString('analyze_protocol', params, 'protocol_id').toLowerCase();
    const label = optionalString(params, 'protocol_label', protocolId);
    const chains = stringList('analyze_protocol', params, 'chains_to_show');

    const data = await ctx.sources.defillama.protocol(protocolId);
    let result = `=== ${label} Summary ===\n\n`;

    if (data.mcap != null) {
      result += `Market Cap: ${usd(data.mcap)}\n`;
    }

    const tvl = [...data.tvl].sort((a, b) => a.date - b.date);
    const current = tvl[tvl.length - 1];
    if (current) {
      result += `Current TVL: ${usd(current.totalLiquidityUSD)}\n`;
      const monthAgo = tvl.length > 30 ? tvl[tvl.length - 31] : undefined;
      if (monthAgo) {
        result += `30-day TVL change: ${pct(percentChange(monthAgo.totalLiquidityUSD, current.totalLiquidityUSD))}\n`;
      }
    }

    const wanted = new Set(chains.map((chain) => chain.toLowerCase()));
    const perChain: Array<[string, number]> = [];
    for (const [chain, info] of Object.entries(data.chainTvls)) {
      const latest = info.tvl[info.tvl.length - 1];
      if (wanted.has(chain.toLowerCase()) && latest) {
        perChain.push([chain, latest.totalLiquidityUSD]);
      }
    }
    if (perChain.length > 0) {
      result += '\nTVL by chain:\n';
      for (const [chain, value] of perChain.sort((a, b) => b[1] - a[1])) {
        result += `- ${chain}: ${usd(value)}\n`;
      }
    }
    return result;
  },
};

export const analyzePoolsTool: ToolImpl = {
  definition: {
    name: 'analyze_pools_geckoterminal',
    description: 'Most active pools of a DEX on one network, with 24h volume and liquidity, via GeckoTerminal.',
    parameters: {
      network: { type: 'string', description: 'Network, e.g. "ethereum", "arbitrum", "base"', required: true },
      protocol_id: { type: 'string', description: 'DEX id, e.g. "uniswap", "sushiswap"', required: true },
      protocol_label: { type: 'string', description: 'Display name for the report', required: true },
    },
  },

  async execute(params, ctx) {
    const rawNetwork = requireString('analyze_pools_geckoterminal', params, 'network');
    const rawDex = requireString('analyze_pools_geckoterminal', params, 'protocol_id');
    const label = optionalString(params, 'protocol_label', rawDex);
    const network = normalizeNetwork(rawNetwork);
    const dex = normalizeDex(rawDex);

    let pools: PoolSummary[];
    try {
      pools = await ctx.sources.geckoterminal.pools(network, dex);
    } catch (err: unknown) {
      if (err instanceof SourceRequestError && err.status === 404) {
        return (
          `No pools found for ${label}: resource not found (404).\n` +
          `Check the identifiers:\n` +
          `- Network: ${network} (requested: ${rawNetwork})\n` +
          `- DEX: ${dex} (requested: ${rawDex})\n\n` +
          `Common networks: eth, arbitrum_one, bsc, polygon_pos, optimism, base\n` +
          `Common DEXes: uniswap_v3, uniswap_v2, sushiswap, pancakeswap_v2, curve`
        );
      }
      throw err;
    }

    if (pools.length === 0) {
      return `No pool data for ${label} (network: ${network}, dex: ${dex})`;
    }

    let result = `=== Pool analysis for ${label} ===\n`;
    result += `Network: ${network}, DEX: ${dex}\n\n`;
    result += `Pools in sample: ${pools.length}\n\n`;

    const top = [...pools].sort((a, b) => b.transactions - a.transactions).slice(0, 3);
    result += 'Top 3 pools by transactions:\n';
    top.forEach((pool, idx) => {
      result += `${idx + 1}. ${pool.pair} - ${pool.transactions} transactions\n`;
      result += `   24h volume: ${usd(pool.volume24h)}\n`;
      result += `   Liquidity: ${usd(pool.liquidityUsd)}\n`;
      result += `   24h price change: ${pct(pool.priceChange24h)}\n\n`;
    });
    result += `Transactions across top 3: ${top.reduce((sum, pool) => sum + pool.transactions, 0)}\n`;

    const totalVolume = pools.reduce((sum, pool) => sum + pool.volume24h, 0);
    result += `\nTotal 24h volume: ${usd(totalVolume)}\n`;
    result += `Average 24h volume per pool: ${usd(totalVolume / pools.length)}\n`;
    return result;
  },
};

export function concentrationBand(top10Share: number): string {
  if (top10Share > 90) return 'Very high';
  if (top10Share > 70) return 'High';
  if (top10Share > 50) return 'Medium';
  return 'Low';
}

export const analyzeTokenHoldersTool: ToolImpl = {
  definition: {
    name: 'analyze_token_holders',
    description: 'Holder distribution and concentration for an EVM token contract, via Bitquery.',
    parameters: {
      token_address: { type: 'string', description: 'Token contract address (0x...)', required: true },
      token_label: { type: 'string', description: 'Display name for the report', required: true },
      chain: { type: 'string', description: 'Network id (default "ethereum")', required: false },
    },
  },

  async execute(params, ctx) {
    const address = requireString('analyze_token_holders', params, 'token_address');
    const label = optionalString(params, 'token_label', address);
    const chain = optionalString(params, 'chain', 'ethereum').toLowerCase();

    if (!ctx.sources.bitquery.hasApiKey) {
      return (
        `Holder analysis for ${label} (${address}) on ${chain} is unavailable: ` +
        `no Bitquery API key is configured (set BITQUERY_API_KEY).`
      );
    }

    const holders = await ctx.sources.bitquery.tokenHolders(address, chain);
    if (holders.length === 0) {
      return 'No holder data for this token.';
    }

    const total = holders.reduce((sum, holder) => sum + holder.balance, 0);
    const share = (balance: number) => (total > 0 ? (balance / total) * 100 : 0);
    const top10 = holders.slice(0, 10);

    let result = `=== Holder analysis for ${label} ===\n\nTop 10 holders:\n`;
    top10.forEach((holder, idx) => {
      result += `${idx + 1}. ${shortAddress(holder.address)} - ${pct(share(holder.balance))}\n`;
    });

    const top10Share = top10.reduce((sum, holder) => sum + share(holder.balance), 0);
    const top50Share = holders.slice(0, 50).reduce((sum, holder) => sum + share(holder.balance), 0);
    result += `\nTop 10 holders own ${pct(top10Share)} of supply\n`;
    result += `Top 50 holders own ${pct(top50Share)} of supply\n`;
    result += `\nConcentration: ${concentrationBand(top10Share)}`;
    return result;
  },
};
