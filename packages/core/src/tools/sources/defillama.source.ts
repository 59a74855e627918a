import { z } from 'zod';
import { HttpSource, type SourceOptions } from './http.source.js';

const DEFILLAMA_URL = 'https://api.llama.fi';

const tvlPoint = z.object({ date: z.number(), totalLiquidityUSD: z.number() });

const protocolSchema = z.object({
  name: z.string().optional(),
  mcap: z.number().nullable().optional(),
  tvl: z.array(tvlPoint).default([]),
  chainTvls: z.record(z.object({ tvl: z.array(tvlPoint).default([]) })).default({}),
});

export type TvlPoint = z.infer<typeof tvlPoint>;
export type ProtocolData = z.infer<typeof protocolSchema>;

export class DefiLlamaSource extends HttpSource {
  protected readonly name = 'DefiLlama';
  private readonly baseUrl: string;

  constructor(options: SourceOptions) {
    super(options);
    this.baseUrl = options.baseUrl ?? DEFILLAMA_URL;
  }

  protocol(id: string): Promise<ProtocolData> {
    return this.requestJson(`${this.baseUrl}/protocol/${encodeURIComponent(id)}`, protocolSchema);
  }
}
