import { describe, it, expect } from 'vitest';
import type { ToolContext } from '../tool.types.js';
import { SourceRequestError } from '../sources/http.source.js';
import { makeSources, type FakeRoute } from '../../testing/fake.fetch.js';
import {
  analyzeProtocolTool,
  analyzePoolsTool,
  analyzeTokenHoldersTool,
  concentrationBand,
} from './protocol.tools.js';

function setup(routes: FakeRoute[], bitqueryKey?: string) {
  const { sources, requests } = makeSources(routes, { bitquery: bitqueryKey });
  const ctx: ToolContext = { agentId: 'protocol_analyst', role: 'protocol_analyst', sources };
  return { ctx, requests };
}

const addr = (c: string) => `0x${c.repeat(40)}`;

describe('analyze_protocol', () => {
  it('reports TVL, its 30-day change and the requested chains', async () => {
    const tvl = Array.from({ length: 31 }, (_, i) => ({
      date: 1_700_000_000 + i * 86_400,
      totalLiquidityUSD: i === 30 ? 150 : 100,
    }));
    const { ctx, requests } = setup([
      {
        match: 'api.llama.fi/protocol/aave',
        body: {
          name: 'Aave',
          mcap: 5_000_000,
          tvl: [...tvl].reverse(),
          chainTvls: {
            Ethereum: { tvl: [{ date: 1, totalLiquidityUSD: 90 }] },
            Arbitrum: { tvl: [{ date: 1, totalLiquidityUSD: 60 }] },
            Base: { tvl: [{ date: 1, totalLiquidityUSD: 5 }] },
          },
        },
      },
    ]);

    const output = await analyzeProtocolTool.execute(
      { protocol_id: 'AAVE', protocol_label: 'Aave', chains_to_show: 'arbitrum, Ethereum' },
      ctx,
    );

    expect(requests[0]?.url).toBe('https://api.llama.fi/protocol/aave');
    expect(output).toBe(
      '=== Aave Summary ===\n\n' +
        'Market Cap: $5,000,000.00\n' +
        'Current TVL: $150.00\n' +
        '30-day TVL change: 50.00%\n' +
        '\nTVL by chain:\n' +
        '- Ethereum: $90.00\n' +
        '- Arbitrum: $60.00\n',
    );
  });
});

describe('analyze_pools_geckoterminal', () => {
  it('normalises identifiers and ranks pools by activity', async () => {
    const pool = (id: string, name: string, volume: string, buys: number, sells: number) => ({
      id,
      attributes: {
        name,
        volume_usd: { h24: volume },
        reserve_in_usd: '5000',
        price_change_percentage: { h24: '1.5' },
        transactions: { h24: { buys, sells } },
      },
    });
    const { ctx, requests } = setup([
      {
        match: '/networks/eth/dexes/uniswap_v3/pools',
        body: {
          data: [
            pool('eth_0x1', 'WETH / USDC 0.05%', '1000', 10, 5),
            pool('eth_0x2', 'PEPE / WETH', '3000', 40, 20),
          ],
        },
      },
    ]);

    const output = await analyzePoolsTool.execute(
      { network: 'Ethereum', protocol_id: 'uniswap', protocol_label: 'Uniswap' },
      ctx,
    );

    expect(requests[0]?.url).toBe(
      'https://api.geckoterminal.com/api/v2/networks/eth/dexes/uniswap_v3/pools',
    );
    const lines = output.split('\n');
    expect(lines).toContain('1. PEPE/WETH - 60 transactions');
    expect(lines).toContain('2. WETH/USDC - 15 transactions');
    expect(lines).toContain('Total 24h volume: $4,000.00');
    expect(lines).toContain('Average 24h volume per pool: $2,000.00');
  });

  it('reads a null price change as zero', async () => {
    const { ctx } = setup([
      {
        match: '/networks/base/dexes/aerodrome/pools',
        body: {
          data: [
            {
              id: 'base_0x9',
              attributes: {
                name: 'AERO / USDC',
                volume_usd: { h24: '250' },
                reserve_in_usd: null,
                price_change_percentage: { h24: null },
                transactions: { h24: { buys: 3, sells: 1 } },
              },
            },
          ],
        },
      },
    ]);

    const output = await analyzePoolsTool.execute(
      { network: 'base', protocol_id: 'aerodrome', protocol_label: 'Aerodrome' },
      ctx,
    );

    const lines = output.split('\n');
    expect(lines).toContain('1. AERO/USDC - 4 transactions');
    expect(lines).toContain('   Liquidity: $0.00');
    expect(lines).toContain('   24h price change: 0.00%');
  });

  it('explains a 404 instead of failing', async () => {
    const { ctx } = setup([]);
    const output = await analyzePoolsTool.execute(
      { network: 'ethereum', protocol_id: 'nodex', protocol_label: 'NoDex' },
      ctx,
    );
    const lines = output.split('\n');
    expect(lines[0]).toBe('No pools found for NoDex: resource not found (404).');
    expect(lines).toContain('- Network: eth (requested: ethereum)');
  });
});

describe('analyze_token_holders', () => {
  it('says plainly when no API key is configured', async () => {
    const { ctx, requests } = setup([]);
    const output = await analyzeTokenHoldersTool.execute(
      { token_address: addr('a'), token_label: 'TKN' },
      ctx,
    );
    expect(output).toBe(
      `Holder analysis for TKN (${addr('a')}) on ethereum is unavailable: ` +
        'no Bitquery API key is configured (set BITQUERY_API_KEY).',
    );
    expect(requests).toHaveLength(0);
  });

  it('computes shares and the concentration band', async () => {
    const { ctx, requests } = setup(
      [
        {
          match: 'streaming.bitquery.io',
          body: {
            data: {
              EVM: {
                TokenHolders: [
                  { Holder: { Address: addr('b') }, Balance: { Amount: '30' } },
                  { Holder: { Address: addr('a') }, Balance: { Amount: '50' } },
                  { Holder: { Address: addr('c') }, Balance: { Amount: 15 } },
                  { Holder: { Address: addr('d') }, Balance: { Amount: '5' } },
                  { Holder: { Address: addr('e') }, Balance: { Amount: null } },
                ],
              },
            },
          },
        },
      ],
      'test-secret',
    );

    const output = await analyzeTokenHoldersTool.execute(
      { token_address: addr('f'), token_label: 'TKN', chain: 'ethereum' },
      ctx,
    );

    expect(output).toBe(
      '=== Holder analysis for TKN ===\n\n' +
        'Top 10 holders:\n' +
        '1. 0xaaaa...aaaa - 50.00%\n' +
        '2. 0xbbbb...bbbb - 30.00%\n' +
        '3. 0xcccc...cccc - 15.00%\n' +
        '4. 0xdddd...dddd - 5.00%\n' +
        '\nTop 10 holders own 100.00% of supply\n' +
        'Top 50 holders own 100.00% of supply\n' +
        '\nConcentration: Very high',
    );
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.headers['authorization']).toBe('Bearer test-secret');
    expect(requests[0]?.body).toContain(`tokenSmartContract: \\"${addr('f')}\\"`);
  });

  it('refuses addresses that are not contract addresses', async () => {
    const { ctx } = setup([], 'test-secret');
    await expect(
      analyzeTokenHoldersTool.execute({ token_address: '0x12"}', token_label: 'BAD' }, ctx),
    ).rejects.toBeInstanceOf(SourceRequestError);
  });
});

describe('concentrationBand', () => {
  it('bands the top-10 share', () => {
    expect([95, 90, 71, 51, 50].map(concentrationBand)).toEqual([
      'Very high',
      'High',
      'High',
      'Medium',
      'Low',
    ]);
  });
});
