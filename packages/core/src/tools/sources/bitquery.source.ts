import { z } from 'zod';
import { HttpSource, SourceRequestError, type SourceOptions } from './http.source.js';

const BITQUERY_URL = 'https://streaming.bitquery.io/graphql';

const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const NETWORK_ID = /^[a-z_]+$/;

const holdersSchema = z.object({
  data: z.object({
    EVM: z.object({
      TokenHolders: z.array(
        z.object({
          Holder: z.object({ Address: z.string() }).optional(),
          Balance: z.object({ Amount: z.union([z.string(), z.number()]).nullable() }).optional(),
        }),
      ),
    }),
  }),
});

export interface HolderBalance {
  address: string;
  balance: number;
}

export class BitquerySource extends HttpSource {
  protected readonly name = 'Bitquery';
  private readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(options: SourceOptions) {
    super(options);
    this.baseUrl = options.baseUrl ?? BITQUERY_URL;
    this.apiKey = options.apiKey;
  }

  get hasApiKey(): boolean {
    return Boolean(this.apiKey);
  }

  /** Largest holders first. */
  async tokenHolders(address: string, network: string, limit = 1000): Promise<HolderBalance[]> {
    if (!this.apiKey) {
      throw new SourceRequestError(this.name, 'no API key configured');
    }
    if (!EVM_ADDRESS.test(address)) {
      throw new SourceRequestError(this.name, `"${address}" is not an EVM contract address`);
    }
    if (!NETWORK_ID.test(network)) {
      throw new SourceRequestError(this.name, `"${network}" is not a valid network id`);
    }

    const query = `{
  EVM(dataset: archive, network: ${network}) {
    TokenHolders(
      tokenSmartContract: "${address}"
      limit: {count: ${limit}}
      orderBy: {descending: Balance_Amount}
    ) {
      Holder { Address }
      Balance { Amount }
    }
  }
}`;
    const result = await this.postJson(this.baseUrl, { query }, holdersSchema, {
      Authorization: `Bearer ${this.apiKey}`,
    });

    const holders: HolderBalance[] = [];
    for (const row of result.data.EVM.TokenHolders) {
      const amount = row.Balance?.Amount;
      if (amount === null || amount === undefined) continue;
      holders.push({
        address: row.Holder?.Address ?? 'unknown',
        balance: Number(amount) || 0,
      });
    }
    return holders.sort((a, b) => b.balance - a.balance);
  }
}
