import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import http from 'node:http';
import type { ChatMessage, FunctionSchema } from '@tickertape/shared';
import { OpenAIAdapter } from './openai.adapter.js';
import { createProvider } from '../provider.factory.js';
import { makeConfig } from '../../testing/test.config.js';

// ---------------------------------------------------------------------------
// Mock OpenAI-compatible server
// ---------------------------------------------------------------------------

let server: http.Server;
let serverPort: number;
let requests: Array<Record<string, unknown>> = [];
/** Status codes to answer with before a normal reply, consumed in order. */
let failuresBeforeSuccess: number[] = [];
let nextReply: Record<string, unknown> = {};

function completion(message: Record<string, unknown>) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'test-model',
    choices: [{ index: 0, message, finish_reason: 'stop' }],
    usage: { prompt_tokens: 11, completion_tokens: 7, total_tokens: 18 },
  };
}

function startMockServer(): Promise<void> {
  return new Promise((resolve) => {
    server = http.createServer((req, res) => {
      if (req.url === '/chat/completions' && req.method === 'POST') {
        let body = '';
        req.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        req.on('end', () => {
          requests.push(JSON.parse(body) as Record<string, unknown>);
          const status = failuresBeforeSuccess.shift();
          if (status !== undefined) {
            res.writeHead(status, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ error: { message: 'upstream unavailable' } }));
            return;
          }
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(completion(nextReply)));
        });
        return;
      }

      res.writeHead(404);
      res.end();
    });

    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      serverPort = typeof addr === 'object' && addr !== null ? addr.port : 0;
      resolve();
    });
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const noSleep = async (): Promise<void> => {};

function makeAdapter(): OpenAIAdapter {
  return new OpenAIAdapter(makeConfig(), {
    apiKey: 'test-secret',
    baseURL: `http://127.0.0.1:${serverPort}`,
    sleep: noSleep,
  });
}

const PRICE_TOOL: FunctionSchema = {
  name: 'get_token_price',
  description: 'Current USD price for a symbol',
  parameters: {
    type: 'object',
    properties: { symbol: { type: 'string', description: 'Ticker, e.g. BTC' } },
    required: ['symbol'],
  },
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

beforeAll(async () => {
  await startMockServer();
});

afterAll(() => {
  server.close();
});

describe('OpenAIAdapter', () => {
  beforeEach(() => {
    requests = [];
    failuresBeforeSuccess = [];
    nextReply = { role: 'assistant', content: 'Hello there' };
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('throws when no API key is available', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    expect(() => new OpenAIAdapter(makeConfig())).toThrow('OPENAI_API_KEY');
  });

  it('rejects a config for another provider', () => {
    const config = makeConfig({ name: 'ollama', model: 'm', host: 'localhost', port: 11434 });
    expect(() => new OpenAIAdapter(config, { apiKey: 'test-secret' })).toThrow('provider.name');
  });

  it('returns plain text with the usage of that call', async () => {
    const reply = await makeAdapter().chat([{ role: 'user', content: 'hi' }]);
    expect(reply).toEqual({
      content: 'Hello there',
      toolCalls: [],
      usage: { promptTokens: 11, completionTokens: 7, totalTokens: 18 },
    });
    expect(requests[0]?.['tools']).toBeUndefined();
  });

  it('maps tool calls in both directions', async () => {
    nextReply = {
      role: 'assistant',
      content: null,
      tool_calls: [
        {
          id: 'call_1',
          type: 'function',
          function: { name: 'get_token_price', arguments: '{"symbol":"ETH"}' },
        },
      ],
    };
    const history: ChatMessage[] = [
      { role: 'system', content: 'You are a market analyst.' },
      { role: 'user', content: 'price of BTC?' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call_0', name: 'get_token_price', arguments: { symbol: 'BTC' } }],
      },
      { role: 'tool', content: 'BTC: 1 USD', toolCallId: 'call_0' },
    ];

    const reply = await makeAdapter().chat(history, [PRICE_TOOL]);

    expect(reply.content).toBe('');
    expect(reply.toolCalls).toEqual([
      { id: 'call_1', name: 'get_token_price', arguments: { symbol: 'ETH' } },
    ]);
    const sent = requests[0];
    expect(sent?.['messages']).toEqual([
      { role: 'system', content: 'You are a market analyst.' },
      { role: 'user', content: 'price of BTC?' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          {
            id: 'call_0',
            type: 'function',
            function: { name: 'get_token_price', arguments: '{"symbol":"BTC"}' },
          },
        ],
      },
      { role: 'tool', content: 'BTC: 1 USD', tool_call_id: 'call_0' },
    ]);
    expect(sent?.['tools']).toEqual([
      {
        type: 'function',
        function: {
          name: 'get_token_price',
          description: 'Current USD price for a symbol',
          parameters: PRICE_TOOL.parameters,
        },
      },
    ]);
  });

  it('hands malformed tool arguments over as an empty object', async () => {
    nextReply = {
      role: 'assistant',
      content: null,
      tool_calls: [
        { id: 'call_9', type: 'function', function: { name: 'get_token_price', arguments: '{oops' } },
      ],
    };
    const reply = await makeAdapter().chat([{ role: 'user', content: 'x' }], [PRICE_TOOL]);
    expect(reply.toolCalls[0]?.arguments).toEqual({});
  });

  it('retries server errors and then succeeds', async () => {
    failuresBeforeSuccess = [503];
    const reply = await makeAdapter().chat([{ role: 'user', content: 'hi' }]);
    expect(reply.content).toBe('Hello there');
    expect(requests).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    failuresBeforeSuccess = [400];
    await expect(makeAdapter().chat([{ role: 'user', content: 'hi' }])).rejects.toThrow();
    expect(requests).toHaveLength(1);
  });

  it('requests a JSON schema response for structured output', async () => {
    nextReply = { role: 'assistant', content: '{"token_symbol":"SOL"}' };
    const schema = { type: 'object', properties: { token_symbol: { type: 'string' } } };
    const raw = await makeAdapter().structured([{ role: 'user', content: 'SOL please' }], 'research_params', schema);
    expect(raw).toBe('{"token_symbol":"SOL"}');
    expect(requests[0]?.['response_format']).toEqual({
      type: 'json_schema',
      json_schema: { name: 'research_params', schema },
    });
  });
});

describe('createProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds an OpenAIAdapter for the openai provider', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    expect(createProvider(makeConfig())).toBeInstanceOf(OpenAIAdapter);
  });
});
