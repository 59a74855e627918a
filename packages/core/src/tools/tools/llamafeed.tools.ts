import type { ToolImpl, ToolDefinition } from '../tool.types.js';
import { optionalNumber } from '../tool.params.js';
import { daysAgo } from '../tools.format.js';

function daysDefinition(name: string, description: string, fallback: number): ToolDefinition {
  return {
    name,
    description,
    parameters: {
      days: { type: 'number', description: `Lookback in days (default ${fallback})`, required: false },
    },
  };
}

function lookback(tool: string, params: Record<string, unknown>, fallback: number): Date {
  return daysAgo(optionalNumber(tool, params, 'days', fallback, { min: 1, max: 365 }));
}

export const getCryptoNewsTool: ToolImpl = {
  definition: daysDefinition('get_crypto_news', 'Latest crypto news headlines with sentiment.', 3),

  async execute(params, ctx) {
    const news = await ctx.sources.llamafeed.news(lookback('get_crypto_news', params, 3));
    let result = 'LATEST CRYPTO NEWS\n\n';
    for (const item of news.slice(0, 10)) {
      result += `* ${item.title ?? 'Untitled'}\n`;
      result += `  Date: ${item.pub_date ?? 'unknown'}\n`;
      result += `  Sentiment: ${item.sentiment ?? 'neutral'}\n`;
      result += `  Link: ${item.link ?? '-'}\n\n`;
    }
    if (news.length === 0) {
      result += 'No news in this period.\n';
    }
    return result;
  },
};

export const getCryptoTweetsTool: ToolImpl = {
  definition: daysDefinition('get_crypto_tweets', 'Notable tweets from influential crypto accounts.', 3),

  async execute(params, ctx) {
    const tweets = await ctx.sources.llamafeed.tweets(lookback('get_crypto_tweets', params, 3));
    let result = 'NOTABLE CRYPTO TWEETS\n\n';
    for (const item of tweets.slice(0, 10)) {
      result += `@${item.user_name ?? 'anonymous'}\n`;
      result += `  ${item.tweet ?? ''}\n`;
      result += `  Date: ${item.tweet_created_at ?? 'unknown'}\n`;
      result += `  Sentiment: ${item.sentiment ?? 'neutral'}\n\n`;
    }
    if (tweets.length === 0) {
      result += 'No tweets in this period.\n';
    }
    return result;
  },
};

export const getCryptoHacksTool: ToolImpl = {
  definition: daysDefinition('get_crypto_hacks', 'Recent hacks and exploits with amounts lost.', 30),

  async execute(params, ctx) {
    const hacks = await ctx.sources.llamafeed.hacks(lookback('get_crypto_hacks', params, 30));
    let result = 'RECENT CRYPTO HACKS\n\n';
    for (const item of hacks) {
      result += `* ${item.name ?? 'Unknown project'}\n`;
      result += `  Date: ${item.timestamp ?? 'unknown'}\n`;
      result += `  Stolen: ${item.amount ?? 'unknown'}\n`;
      result += `  Technique: ${item.technique ?? 'not specified'}\n`;
      result += `  Source: ${item.source_url ?? '-'}\n\n`;
    }
    if (hacks.length === 0) {
      result += 'No hacks reported in this period.\n';
    }
    return result;
  },
};

export const getTokenUnlocksTool: ToolImpl = {
  definition: daysDefinition('get_token_unlocks', 'Upcoming token unlocks.', 30),

  async execute(params, ctx) {
    const unlocks = await ctx.sources.llamafeed.unlocks(lookback('get_token_unlocks', params, 30));
    let result = 'UPCOMING TOKEN UNLOCKS\n\n';
    for (const item of unlocks) {
      result += `* ${item.project ?? 'Unknown project'}\n`;
      result += `  Date: ${item.date ?? 'unknown'}\n`;
      result += `  Amount: ${item.amount ?? 'unknown'}\n`;
      if (item.percentage) {
        result += `  Share of supply: ${item.percentage}\n`;
      }
      result += '\n';
    }
    if (unlocks.length === 0) {
      result += 'No unlocks in this period.\n';
    }
    return result;
  },
};

export const getProjectRaisesTool: ToolImpl = {
  definition: daysDefinition('get_project_raises', 'Recent fundraising rounds by crypto projects.', 30),

  async execute(params, ctx) {
    const raises = await ctx.sources.llamafeed.raises(lookback('get_project_raises', params, 30));
    let result = 'RECENT FUNDRAISING\n\n';
    for (const item of raises) {
      const investors = Array.isArray(item.investors) ? item.investors.join(', ') : item.investors;
      result += `* ${item.project ?? 'Unknown project'}\n`;
      result += `  Date: ${item.date ?? 'unknown'}\n`;
      result += `  Amount: ${item.amount ?? 'unknown'}\n`;
      result += `  Investors: ${investors || 'not disclosed'}\n\n`;
    }
    if (raises.length === 0) {
      result += 'No raises in this period.\n';
    }
    return result;
  },
};

export const getPolymarketDataTool: ToolImpl = {
  definition: daysDefinition('get_polymarket_data', 'Crypto-related prediction markets on Polymarket.', 7),

  async execute(params, ctx) {
    const markets = await ctx.sources.llamafeed.polymarket(lookback('get_polymarket_data', params, 7));
    let result = 'POLYMARKET PREDICTION MARKETS\n\n';
    for (const item of markets) {
      result += `? ${item.question ?? 'Untitled market'}\n`;
      result += `  Ends: ${item.end_date ?? 'unknown'}\n`;
      result += `  Probability: ${item.probability ?? 'unknown'}\n`;
      result += `  Volume: ${item.volume ?? 'unknown'}\n\n`;
    }
    if (markets.length === 0) {
      result += 'No markets in this period.\n';
    }
    return result;
  },
};

export const getMarketSummaryTool: ToolImpl = {
  definition: daysDefinition(
    'get_market_summary',
    'Overview of the market mood: key headlines and the most notable tweets.',
    3,
  ),

  async execute(params, ctx) {
    const since = lookback('get_market_summary', params, 3);
    const [news, tweets] = await Promise.all([
      ctx.sources.llamafeed.news(since),
      ctx.sources.llamafeed.tweets(since),
    ]);

    let result = 'CRYPTO MARKET OVERVIEW\n\n';
    if (news.length > 0) {
      result += 'Key news:\n';
      for (const item of news.slice(0, 5)) {
        result += `- ${item.title ?? 'Untitled'}\n`;
      }
      result += '\n';
    }
    if (tweets.length > 0) {
      result += 'Notable tweets:\n';
      for (const item of tweets.slice(0, 3)) {
        result += `- @${item.user_name ?? 'anonymous'}: ${item.tweet ?? ''}\n`;
      }
      result += '\n';
    }
    if (news.length === 0 && tweets.length === 0) {
      result += 'Nothing reported in this period.\n';
    }
    return result;
  },
};
