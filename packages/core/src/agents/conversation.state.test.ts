import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationState } from './conversation.state.js';

let state: ConversationState;

beforeEach(() => {
  state = new ConversationState();
});

// ─── append / history ──────────────────────────────────────────

describe('append', () => {
  it('keeps messages in chronological order with fresh ids', () => {
    const a = state.append('system', 'be terse');
    const b = state.append('user', 'price of ETH?');
    const c = state.append('assistant', 'About 3000 USD.');

    const history = state.getHistory();
    expect(history.map((m) => m.content)).toEqual(['be terse', 'price of ETH?', 'About 3000 USD.']);
    expect(new Set([a.id, b.id, c.id]).size).toBe(3);
  });

  it('stores tool linkage only when given', () => {
    const plain = state.append('user', 'hi');
    const tool = state.append('tool', '42', { toolCallId: 'call_1' });
    const withCalls = state.append('assistant', '', {
      toolCalls: [{ id: 'call_1', name: 'get_crypto_price', arguments: { symbol: 'BTC' } }],
    });

    expect(plain).not.toHaveProperty('toolCallId');
    expect(plain).not.toHaveProperty('toolCalls');
    expect(tool.toolCallId).toBe('call_1');
    expect(withCalls.toolCalls).toHaveLength(1);
  });

  it('returns a copy from getHistory', () => {
    state.append('user', 'one');
    const history = state.getHistory();
    history.push({ id: 'x', role: 'user', content: 'injected', timestamp: 0 });
    expect(state.getHistory()).toHaveLength(1);
  });

  it('reads back what was written', () => {
    state.append('user', 'first');
    state.append('assistant', 'second');
    const [first, second] = state.getHistory();
    expect(first?.role).toBe('user');
    expect(first?.content).toBe('first');
    expect(second?.role).toBe('assistant');
    expect(second?.content).toBe('second');
  });
});

describe('getLastN', () => {
  it('returns the newest n messages', () => {
    for (const word of ['a', 'b', 'c', 'd']) state.append('user', word);
    expect(state.getLastN(2).map((m) => m.content)).toEqual(['c', 'd']);
  });

  it('returns nothing for n <= 0', () => {
    state.append('user', 'a');
    expect(state.getLastN(0)).toEqual([]);
  });
});

// ─── tool records ──────────────────────────────────────────────

describe('tool records', () => {
  it('records calls and results separately from messages', () => {
    state.recordToolCall({ id: 'call_1', name: 'get_crypto_news', arguments: { days: 3 } });
    state.recordToolResult({
      callId: 'call_1',
      toolName: 'get_crypto_news',
      success: false,
      error: 'boom',
      executionMs: 12,
    });

    expect(state.getToolCalls()).toEqual([
      expect.objectContaining({ id: 'call_1', name: 'get_crypto_news', arguments: { days: 3 } }),
    ]);
    expect(state.getToolResults()[0]?.error).toBe('boom');
    expect(state.length).toBe(0);
  });
});

// ─── clear ─────────────────────────────────────────────────────

describe('clear', () => {
  it('wipes messages, calls and results', () => {
    state.append('user', 'hello');
    state.recordToolCall({ id: 'c', name: 't', arguments: {} });
    state.recordToolResult({ callId: 'c', toolName: 't', success: true, error: null, executionMs: 1 });

    state.clear();

    expect(state.getHistory()).toEqual([]);
    expect(state.getToolCalls()).toEqual([]);
    expect(state.getToolResults()).toEqual([]);
  });

  it('does not touch another conversation', () => {
    const other = new ConversationState();
    other.append('user', 'keep me');
    state.append('user', 'drop me');

    state.clear();

    expect(other.getHistory().map((m) => m.content)).toEqual(['keep me']);
  });
});

// ─── toPrompt ──────────────────────────────────────────────────

describe('toPrompt', () => {
  it('keeps the system message and the newest messages', () => {
    state.append('system', 'sys');
    for (const word of ['u1', 'a1', 'u2', 'a2']) {
      state.append(word.startsWith('u') ? 'user' : 'assistant', word);
    }

    expect(state.toPrompt(2)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'a2' },
    ]);
  });

  it('never opens the window on a tool message', () => {
    state.append('user', 'q');
    state.append('assistant', '', {
      toolCalls: [{ id: 'call_1', name: 'get_crypto_price', arguments: { symbol: 'BTC' } }],
    });
    state.append('tool', '64000', { toolCallId: 'call_1' });
    state.append('assistant', 'BTC is 64000');
    state.append('user', 'and ETH?');

    expect(state.toPrompt(3)).toEqual([
      { role: 'assistant', content: 'BTC is 64000' },
      { role: 'user', content: 'and ETH?' },
    ]);
  });

  it('keeps the whole current turn even past the limit', () => {
    state.append('system', 'sys');
    state.append('user', 'old question');
    state.append('assistant', 'old answer');
    state.append('user', 'price of BTC?');
    const calls = ['c1', 'c2', 'c3'].map((id) => ({ id, name: 'get_crypto_price', arguments: { symbol: 'BTC' } }));
    state.append('assistant', '', { toolCalls: calls });
    for (const call of calls) state.append('tool', `out ${call.id}`, { toolCallId: call.id });

    const prompt = state.toPrompt(3);
    expect(prompt.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'tool', 'tool']);
    expect(prompt[1]).toEqual({ role: 'user', content: 'price of BTC?' });
  });

  it('leaves the stored history alone', () => {
    for (const word of ['a', 'b', 'c']) state.append('user', word);
    state.toPrompt(1);
    expect(state.getHistory()).toHaveLength(3);
  });
});
