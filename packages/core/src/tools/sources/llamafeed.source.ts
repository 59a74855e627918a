import { z } from 'zod';
import { HttpSource, type SourceOptions } from './http.source.js';

/** Feeds send `null` for blank fields; those read as absent. */
const text = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => (value == null ? undefined : String(value)));

const newsSchema = z.object({ title: text, pub_date: text, sentiment: text, link: text });
const tweetSchema = z.object({ tweet: text, tweet_created_at: text, user_name: text, sentiment: text });
const hackSchema = z.object({ name: text, timestamp: text, amount: text, source_url: text, technique: text });
const unlockSchema = z.object({ project: text, date: text, amount: text, percentage: text });
const raiseSchema = z.object({
  project: text,
  date: text,
  amount: text,
  investors: z
    .union([z.string(), z.array(z.string())])
    .nullable()
    .optional()
    .transform((value) => value ?? undefined),
});
const polymarketSchema = z.object({ question: text, end_date: text, probability: text, volume: text });

export type NewsItem = z.infer<typeof newsSchema>;
export type TweetItem = z.infer<typeof tweetSchema>;
export type HackItem = z.infer<typeof hackSchema>;
export type UnlockItem = z.infer<typeof unlockSchema>;
export type RaiseItem = z.infer<typeof raiseSchema>;
export type PolymarketItem = z.infer<typeof polymarketSchema>;

/** Accepts both a bare array and a `{ data: [...] }` envelope. */
function feed<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), z.object({ data: z.array(item) }).transform((body) => body.data)]);
}

export class LlamaFeedSource extends HttpSource {
  protected readonly name = 'LlamaFeed';
  private readonly baseUrl: string;

  constructor(options: SourceOptions & { baseUrl: string }) {
    super(options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  news(since: Date): Promise<NewsItem[]> {
    return this.get('news', since, feed(newsSchema));
  }

  tweets(since: Date): Promise<TweetItem[]> {
    return this.get('tweets', since, feed(tweetSchema));
  }

  hacks(since: Date): Promise<HackItem[]> {
    return this.get('hacks', since, feed(hackSchema));
  }

  unlocks(since: Date): Promise<UnlockItem[]> {
    return this.get('unlocks', since, feed(unlockSchema));
  }

  raises(since: Date): Promise<RaiseItem[]> {
    return this.get('raises', since, feed(raiseSchema));
  }

  polymarket(since: Date): Promise<PolymarketItem[]> {
    return this.get('polymarket', since, feed(polymarketSchema));
  }

  private get<T>(path: string, since: Date, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}/${path}?since=${encodeURIComponent(since.toISOString())}`;
    return this.requestJson(url, schema);
  }
}
