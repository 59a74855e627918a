import { describe, it, expect } from 'vitest';
import type { ToolContext } from '../tool.types.js';
import { makeSources, type FakeRoute } from '../../testing/fake.fetch.js';
import {
  getCryptoNewsTool,
  getCryptoTweetsTool,
  getCryptoHacksTool,
  getProjectRaisesTool,
  getMarketSummaryTool,
} from './llamafeed.tools.js';

function setup(routes: FakeRoute[]) {
  const { sources, requests } = makeSources(routes);
  const ctx: ToolContext = { agentId: 'news_researcher', role: 'news_researcher', sources };
  return { ctx, requests };
}

const NEWS: FakeRoute = {
  match: 'feed.test/news',
  body: [{ title: 'ETF approved', pub_date: '2024-05-01', sentiment: 'positive', link: 'https://news.test/1' }],
};

const TWEETS: FakeRoute = {
  match: 'feed.test/tweets',
  body: {
    data: [{ tweet: 'gm', tweet_created_at: '2024-05-02', user_name: 'trader' }],
  },
};

describe('llamafeed tools', () => {
  it('formats news and passes the lookback as since', async () => {
    const { ctx, requests } = setup([NEWS]);
    const output = await getCryptoNewsTool.execute({ days: 3 }, ctx);

    expect(output).toBe(
      'LATEST CRYPTO NEWS\n\n' +
        '* ETF approved\n' +
        '  Date: 2024-05-01\n' +
        '  Sentiment: positive\n' +
        '  Link: https://news.test/1\n\n',
    );
    expect(requests[0]?.url).toMatch(/^http:\/\/feed\.test\/news\?since=\d{4}-\d{2}-\d{2}T/);
  });

  it('accepts a data envelope and fills missing fields', async () => {
    const { ctx } = setup([TWEETS]);
    expect(await getCryptoTweetsTool.execute({}, ctx)).toBe(
      'NOTABLE CRYPTO TWEETS\n\n@trader\n  gm\n  Date: 2024-05-02\n  Sentiment: neutral\n\n',
    );
  });

  it('says so when a period is empty', async () => {
    const { ctx } = setup([{ match: 'feed.test/hacks', body: [] }]);
    expect(await getCryptoHacksTool.execute({ days: 30 }, ctx)).toBe(
      'RECENT CRYPTO HACKS\n\nNo hacks reported in this period.\n',
    );
  });

  it('joins investor lists', async () => {
    const { ctx } = setup([
      {
        match: 'feed.test/raises',
        body: [{ project: 'Acme', date: '2024-05-03', amount: 12, investors: ['Fund A', 'Fund B'] }],
      },
    ]);
    expect(await getProjectRaisesTool.execute({}, ctx)).toBe(
      'RECENT FUNDRAISING\n\n* Acme\n  Date: 2024-05-03\n  Amount: 12\n  Investors: Fund A, Fund B\n\n',
    );
  });

  it('reads null fields as missing', async () => {
    const { ctx } = setup([
      {
        match: 'feed.test/news',
        body: [{ title: 'ETF approved', pub_date: '2024-05-01', sentiment: null, link: null }],
      },
    ]);
    expect(await getCryptoNewsTool.execute({ days: 3 }, ctx)).toBe(
      'LATEST CRYPTO NEWS\n\n' +
        '* ETF approved\n' +
        '  Date: 2024-05-01\n' +
        '  Sentiment: neutral\n' +
        '  Link: -\n\n',
    );
  });

  it('treats null investors as not disclosed', async () => {
    const { ctx } = setup([
      { match: 'feed.test/raises', body: [{ project: 'Acme', date: null, amount: 5, investors: null }] },
    ]);
    expect(await getProjectRaisesTool.execute({}, ctx)).toBe(
      'RECENT FUNDRAISING\n\n* Acme\n  Date: unknown\n  Amount: 5\n  Investors: not disclosed\n\n',
    );
  });

  it('rejects an out-of-range lookback', async () => {
    const { ctx } = setup([NEWS]);
    await expect(getCryptoNewsTool.execute({ days: 0 }, ctx)).rejects.toThrow('"days" must be a number');
  });

  it('builds the market summary from news and tweets', async () => {
    const { ctx } = setup([NEWS, TWEETS]);
    expect(await getMarketSummaryTool.execute({ days: 1 }, ctx)).toBe(
      'CRYPTO MARKET OVERVIEW\n\nKey news:\n- ETF approved\n\nNotable tweets:\n- @trader: gm\n\n',
    );
  });
});
