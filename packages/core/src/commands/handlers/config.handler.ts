import type { TickertapeConfig } from '@tickertape/shared';
import type { CommandDispatcherContext } from '../command.dispatcher.js';

function mask(secret: string | undefined): string | undefined {
  return secret ? `${secret.slice(0, 3)}***` : undefined;
}

export function configHandler(ctx: CommandDispatcherContext): string {
  const shown: TickertapeConfig = {
    ...ctx.config,
    sources: {
      ...ctx.config.sources,
      coingecko_api_key: mask(ctx.config.sources.coingecko_api_key),
      bitquery_api_key: mask(ctx.config.sources.bitquery_api_key),
    },
  };
  return JSON.stringify(shown, null, 2);
}
