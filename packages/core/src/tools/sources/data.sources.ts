import type { SourcesConfig } from '@tickertape/shared';
import type { FetchLike } from './http.source.js';
import { CoinGeckoSource } from './coingecko.source.js';
import { DefiLlamaSource } from './defillama.source.js';
import { GeckoTerminalSource } from './geckoterminal.source.js';
import { BitquerySource } from './bitquery.source.js';
import { HyperliquidSource } from './hyperliquid.source.js';
import { LlamaFeedSource } from './llamafeed.source.js';

/** Every external data client, built once and handed to tools through their context. */
export interface DataSources {
  coingecko: CoinGeckoSource;
  defillama: DefiLlamaSource;
  geckoterminal: GeckoTerminalSource;
  bitquery: BitquerySource;
  hyperliquid: HyperliquidSource;
  llamafeed: LlamaFeedSource;
}

export function createDataSources(config: SourcesConfig, fetchImpl: FetchLike = fetch): DataSources {
  const common = { fetch: fetchImpl, timeoutMs: config.request_timeout_ms };
  return {
    coingecko: new CoinGeckoSource({ ...common, apiKey: config.coingecko_api_key }),
    defillama: new DefiLlamaSource(common),
    geckoterminal: new GeckoTerminalSource(common),
    bitquery: new BitquerySource({ ...common, apiKey: config.bitquery_api_key }),
    hyperliquid: new HyperliquidSource(common),
    llamafeed: new LlamaFeedSource({ ...common, baseUrl: config.llamafeed_base_url }),
  };
}
