import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import http from 'node:http';
import type { FunctionSchema } from '@tickertape/shared';
import { OllamaAdapter } from './ollama.adapter.js';
import { createProvider } from '../provider.factory.js';
import { makeConfig } from '../../testing/test.config.js';

// ---------------------------------------------------------------------------
// Mock Ollama server
// ---------------------------------------------------------------------------

let server: http.Server;
let serverPort: number;
let requests: Array<Record<string, unknown>> = [];
let nextMessage: Record<string, unknown> = {};

function startMockServer(): Promise<void> {
  return new Promise((resolve) => {
    server = http.createServer((req, res) => {
      // Chat endpoint: /api/chat
      if (req.url === '/api/chat' && req.method === 'POST') {
        let body = '';
        req.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        req.on('end', () => {
          requests.push(JSON.parse(body) as Record<string, unknown>);
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(
            JSON.stringify({
              model: 'test-model',
              created_at: new Date().toISOString(),
              message: nextMessage,
              done: true,
              done_reason: 'stop',
              prompt_eval_count: 5,
              eval_count: 3,
            }),
          );
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

function makeAdapter(): OllamaAdapter {
  return new OllamaAdapter(
    makeConfig({ name: 'ollama', model: 'test-model', host: '127.0.0.1', port: serverPort }),
  );
}

const NEWS_TOOL: FunctionSchema = {
  name: 'get_crypto_news',
  description: 'Recent crypto headlines',
  parameters: {
    type: 'object',
    properties: { days: { type: 'number', description: 'Lookback in days' } },
    required: [],
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

describe('OllamaAdapter', () => {
  beforeEach(() => {
    requests = [];
    nextMessage = { role: 'assistant', content: 'All quiet on the market.' };
  });

  it('rejects a config for another provider', () => {
    expect(() => new OllamaAdapter(makeConfig())).toThrow('provider.name');
  });

  it('returns text and token usage', async () => {
    const adapter = makeAdapter();
    const reply = await adapter.chat([{ role: 'user', content: 'anything new?' }]);
    expect(reply).toEqual({
      content: 'All quiet on the market.',
      toolCalls: [],
      usage: { promptTokens: 5, completionTokens: 3, totalTokens: 8 },
    });
    expect(requests[0]?.['stream']).toBe(false);
  });

  it('mints ids for tool calls and forwards tool declarations', async () => {
    nextMessage = {
      role: 'assistant',
      content: '',
      tool_calls: [{ function: { name: 'get_crypto_news', arguments: { days: 2 } } }],
    };
    const reply = await makeAdapter().chat([{ role: 'user', content: 'news?' }], [NEWS_TOOL]);

    expect(reply.toolCalls).toHaveLength(1);
    expect(reply.toolCalls[0]?.name).toBe('get_crypto_news');
    expect(reply.toolCalls[0]?.arguments).toEqual({ days: 2 });
    expect(reply.toolCalls[0]?.id).toMatch(/^call_/);
    expect(requests[0]?.['tools']).toEqual([
      {
        type: 'function',
        function: {
          name: 'get_crypto_news',
          description: 'Recent crypto headlines',
          parameters: {
            type: 'object',
            required: [],
            properties: { days: { type: 'number', description: 'Lookback in days' } },
          },
        },
      },
    ]);
  });

  it('asks for JSON output when a structured reply is needed', async () => {
    nextMessage = { role: 'assistant', content: '{"token_symbol":"ARB"}' };
    const raw = await makeAdapter().structured([{ role: 'user', content: 'ARB' }], 'research_params', {
      type: 'object',
    });
    expect(raw).toBe('{"token_symbol":"ARB"}');
    expect(requests[0]?.['format']).toBe('json');
  });
});

describe('createProvider', () => {
  it('builds an OllamaAdapter for the ollama provider', () => {
    const provider = createProvider(
      makeConfig({ name: 'ollama', model: 'test-model', host: '127.0.0.1', port: 11434 }),
    );
    expect(provider).toBeInstanceOf(OllamaAdapter);
  });
});
