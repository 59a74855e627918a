import { describe, it, expect } from 'vitest';
import type { AgentState, Task } from '@tickertape/shared';
import { appReducer, initialAppState, TRANSCRIPT_LIMIT, type AppState } from './app.store.js';

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'BTC price',
    description: 'Fetch the BTC price',
    assignedAgentId: 'market_analyst',
    status: 'pending',
    priority: 1,
    createdAt: 0,
    updatedAt: 0,
    result: null,
    parentTaskId: null,
    subTaskIds: [],
    metadata: {},
    ...overrides,
  };
}

function makeAgent(id: string): AgentState {
  return { id, role: 'market_analyst', status: 'thinking', currentAction: null, log: [] };
}

// ---------------------------------------------------------------------------
// Server events
// ---------------------------------------------------------------------------

describe('appReducer: server events', () => {
  it('tracks the phase', () => {
    expect(appReducer(initialAppState, { type: 'PHASE', phase: 'executing' }).phase).toBe('executing');
  });

  it('appends new tasks and replaces known ones in place', () => {
    let state = appReducer(initialAppState, { type: 'TASK_UPDATE', task: makeTask() });
    state = appReducer(state, { type: 'TASK_UPDATE', task: makeTask({ id: 'task-2', title: 'ETH news' }) });
    state = appReducer(state, { type: 'TASK_UPDATE', task: makeTask({ status: 'completed' }) });

    expect(state.tasks.map((t) => [t.id, t.status])).toEqual([
      ['task-1', 'completed'],
      ['task-2', 'pending'],
    ]);
  });

  it('keys agent states by id', () => {
    const state = appReducer(initialAppState, { type: 'AGENT_STATE', state: makeAgent('news_researcher') });
    expect(Object.keys(state.agentStates)).toEqual(['news_researcher']);
  });

  it('clears tasks, agents, locks and open research on reset', () => {
    const busy: AppState = {
      ...initialAppState,
      tasks: [makeTask()],
      agentStates: { market_analyst: makeAgent('market_analyst') },
      locks: [{ agentId: 'market_analyst', holder: 'task-1', acquiredAt: 0, waiting: 1 }],
      researchSymbol: 'ETH',
    };
    const state = appReducer(busy, { type: 'SYSTEM_RESET' });
    expect(state.tasks).toEqual([]);
    expect(state.agentStates).toEqual({});
    expect(state.locks).toEqual([]);
    expect(state.researchSymbol).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Round trips
// ---------------------------------------------------------------------------

describe('appReducer: requests and replies', () => {
  it('echoes a request and clears stale agent panels', () => {
    const before = { ...initialAppState, agentStates: { market_analyst: makeAgent('market_analyst') } };
    const state = appReducer(before, { type: 'SENT', pending: 'request', echo: 'How is BTC?' });

    expect(state.pending).toBe('request');
    expect(state.agentStates).toEqual({});
    expect(state.transcript).toEqual([{ id: 1, kind: 'user', text: 'How is BTC?' }]);
    expect(state.nextEntryId).toBe(2);
  });

  it('keeps agent panels for slash commands', () => {
    const before = { ...initialAppState, agentStates: { market_analyst: makeAgent('market_analyst') } };
    const state = appReducer(before, { type: 'SENT', pending: 'slash', echo: '/tasks' });
    expect(Object.keys(state.agentStates)).toEqual(['market_analyst']);
  });

  it('adds the formatted outcome and clears pending', () => {
    let state = appReducer(initialAppState, { type: 'SENT', pending: 'request', echo: 'BTC?' });
    state = appReducer(state, {
      type: 'REQUEST_COMPLETE',
      outcome: { text: 'BTC is flat.', taskIds: ['task-1'], durationMs: 500 },
    });

    expect(state.pending).toBeNull();
    expect(state.transcript[1]).toEqual({ id: 2, kind: 'answer', text: 'BTC is flat.\n\n(1 task, 500ms)' });
  });

  it('opens research on questions and closes it on the report', () => {
    let state = appReducer(initialAppState, {
      type: 'RESEARCH_QUESTIONS',
      symbol: 'ETH',
      questions: ['Risk appetite?'],
    });
    expect(state.researchSymbol).toBe('ETH');
    expect(state.transcript[0]?.kind).toBe('questions');

    state = appReducer(state, {
      type: 'RESEARCH_COMPLETE',
      report: {
        params: {
          token_symbol: 'ETH',
          token_name: 'Ethereum',
          token_id: null,
          token_address: null,
          chain: 'ethereum',
          days_lookback: 30,
          risk_profile: 'low',
        },
        degraded: false,
        data: {},
        fullReport: 'Report body',
        recommendation: 'BUY',
        summary: '',
        timestamp: 0,
      },
    });
    expect(state.researchSymbol).toBeNull();
    expect(state.transcript[1]?.kind).toBe('research');
  });

  it('shows slash output as its own entry', () => {
    const state = appReducer(initialAppState, { type: 'SLASH_RESULT', command: '/tasks', output: 'No tasks yet.' });
    expect(state.transcript).toEqual([{ id: 1, kind: 'slash', text: 'No tasks yet.' }]);
  });

  it('prefixes errors and clears pending', () => {
    let state = appReducer(initialAppState, { type: 'SENT', pending: 'request', echo: 'BTC?' });
    state = appReducer(state, { type: 'ERROR', message: 'model down' });

    expect(state.pending).toBeNull();
    expect(state.transcript[1]).toEqual({ id: 2, kind: 'error', text: 'Error: model down' });
  });

  it('drops the open research when answering it fails', () => {
    let state: AppState = { ...initialAppState, researchSymbol: 'ETH' };
    state = appReducer(state, { type: 'SENT', pending: 'research_answer', echo: 'low risk' });
    state = appReducer(state, { type: 'ERROR', message: 'model down' });
    expect(state.researchSymbol).toBeNull();
  });

  it('keeps the open research when an unrelated command fails', () => {
    let state: AppState = { ...initialAppState, researchSymbol: 'ETH' };
    state = appReducer(state, { type: 'SENT', pending: 'slash', echo: '/task nope' });
    state = appReducer(state, { type: 'ERROR', message: 'Task nope not found' });
    expect(state.researchSymbol).toBe('ETH');
  });
});

describe('appReducer: transcript', () => {
  it(`keeps only the last ${TRANSCRIPT_LIMIT} entries`, () => {
    let state = initialAppState;
    for (let i = 0; i < TRANSCRIPT_LIMIT + 5; i++) {
      state = appReducer(state, { type: 'SLASH_RESULT', command: '/status', output: `line ${i}` });
    }
    expect(state.transcript).toHaveLength(TRANSCRIPT_LIMIT);
    expect(state.transcript[0]).toEqual({ id: 6, kind: 'slash', text: 'line 5' });
  });
});
