import { z } from 'zod';
import { HttpSource, type SourceOptions } from './http.source.js';

const HYPERLIQUID_INFO_URL = 'https://api.hyperliquid.xyz/info';

const decimal = z.union([z.string(), z.number()]).transform((value) => Number(value));

const allMidsSchema = z.record(decimal);

const candleSchema = z.array(
  z.object({
    t: z.number(),
    o: decimal,
    h: decimal,
    l: decimal,
    c: decimal,
    v: decimal,
  }),
);

const metaAndCtxSchema = z.tuple([
  z.object({ universe: z.array(z.object({ name: z.string(), maxLeverage: z.number().optional() })) }),
  z.array(
    z.object({
      markPx: decimal,
      funding: decimal,
      openInterest: decimal,
      dayNtlVlm: decimal,
      prevDayPx: decimal,
    }),
  ),
]);

export type Candle = z.infer<typeof candleSchema>[number];

export interface PerpMarket {
  name: string;
  maxLeverage: number | null;
  markPx: number;
  funding: number;
  openInterest: number;
  dayNtlVlm: number;
  prevDayPx: number;
}

export class HyperliquidSource extends HttpSource {
  protected readonly name = 'Hyperliquid';
  private readonly infoUrl: string;

  constructor(options: SourceOptions) {
    super(options);
    this.infoUrl = options.baseUrl ?? HYPERLIQUID_INFO_URL;
  }

  allMids(): Promise<Record<string, number>> {
    return this.postJson(this.infoUrl, { type: 'allMids' }, allMidsSchema);
  }

  candleSnapshot(coin: string, interval: string, startTime: number, endTime: number): Promise<Candle[]> {
    return this.postJson(
      this.infoUrl,
      { type: 'candleSnapshot', req: { coin, interval, startTime, endTime } },
      candleSchema,
    );
  }

  async market(coin: string): Promise<PerpMarket | null> {
    const [meta, contexts] = await this.postJson(this.infoUrl, { type: 'metaAndAssetCtxs' }, metaAndCtxSchema);
    const index = meta.universe.findIndex((asset) => asset.name.toUpperCase() === coin.toUpperCase());
    const asset = meta.universe[index];
    const ctx = contexts[index];
    if (!asset || !ctx) return null;
    return { name: asset.name, maxLeverage: asset.maxLeverage ?? null, ...ctx };
  }
}
