import type { z } from 'zod';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SourceOptions {
  fetch: FetchLike;
  timeoutMs: number;
  apiKey?: string;
  baseUrl?: string;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export class SourceRequestError extends Error {
  constructor(
    readonly source: string,
    message: string,
    readonly status: number | null = null,
  ) {
    super(`${source}: ${message}`);
    this.name = 'SourceRequestError';
  }
}

/** Shared plumbing for the JSON APIs behind the data tools. */
export abstract class HttpSource {
  protected abstract readonly name: string;
  protected readonly fetchImpl: FetchLike;
  protected readonly timeoutMs: number;

  constructor(options: SourceOptions) {
    this.fetchImpl = options.fetch;
    this.timeoutMs = options.timeoutMs;
  }

  protected async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestOptions = {},
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        headers: { Accept: 'application/json', ...init.headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SourceRequestError(this.name, `request failed: ${message}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new SourceRequestError(
        this.name,
        `HTTP ${response.status}${detail ? ` ${detail.slice(0, 200)}` : ''}`,
        response.status,
      );
    }

    const body: unknown = await response.json().catch(() => {
      throw new SourceRequestError(this.name, 'response was not valid JSON', response.status);
    });
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown';
      throw new SourceRequestError(this.name, `unexpected response shape (${where})`, response.status);
    }
    return parsed.data;
  }

  protected postJson<T>(
    url: string,
    payload: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    headers: Record<string, string> = {},
  ): Promise<T> {
    return this.requestJson(url, schema, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(payload),
    });
  }
}
