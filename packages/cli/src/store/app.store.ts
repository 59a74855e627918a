import { useReducer, type Dispatch } from 'react';
import type { AgentLock, AgentState, SystemPhase, Task } from '@tickertape/shared';
import type { AppAction } from './app.actions.js';
import { formatOutcome, formatQuestions, formatResearchReport } from '../report.format.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export type TranscriptKind =
  | 'user' // echoed input
  | 'answer' // merged report or supervisor reply
  | 'questions' // research clarification questions
  | 'research' // deep research report
  | 'slash' // slash command output
  | 'error';

export interface TranscriptEntry {
  id: number;
  kind: TranscriptKind;
  text: string;
}

/** The reply the UI is waiting for, if any. */
export type Pending = 'request' | 'research_start' | 'research_answer' | 'slash';

export interface AppState {
  phase: SystemPhase;
  pending: Pending | null;
  /** Ledger order. */
  tasks: Task[];
  agentStates: Record<string, AgentState>;
  locks: AgentLock[];
  transcript: TranscriptEntry[];
  /** Symbol whose clarifying questions are on screen. */
  researchSymbol: string | null;
  nextEntryId: number;
}

export const TRANSCRIPT_LIMIT = 30;

export const initialAppState: AppState = {
  phase: 'idle',
  pending: null,
  tasks: [],
  agentStates: {},
  locks: [],
  transcript: [],
  researchSymbol: null,
  nextEntryId: 1,
};

function addEntry(state: AppState, kind: TranscriptKind, text: string): AppState {
  const entry: TranscriptEntry = { id: state.nextEntryId, kind, text };
  return {
    ...state,
    transcript: [...state.transcript, entry].slice(-TRANSCRIPT_LIMIT),
    nextEntryId: state.nextEntryId + 1,
  };
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'PHASE':
      return { ...state, phase: action.phase };

    case 'TASK_UPDATE': {
      const index = state.tasks.findIndex((task) => task.id === action.task.id);
      const tasks =
        index === -1
          ? [...state.tasks, action.task]
          : state.tasks.map((task, i) => (i === index ? action.task : task));
      return { ...state, tasks };
    }

    case 'SYSTEM_RESET':
      return { ...state, tasks: [], agentStates: {}, locks: [], researchSymbol: null };

    case 'AGENT_STATE':
      return {
        ...state,
        agentStates: { ...state.agentStates, [action.state.id]: action.state },
      };

    case 'LOCK_UPDATE':
      return { ...state, locks: action.locks };

    case 'SENT': {
      const next = addEntry(state, 'user', action.echo);
      // A fresh request starts with a clean agent panel.
      return action.pending === 'request'
        ? { ...next, pending: action.pending, agentStates: {} }
        : { ...next, pending: action.pending };
    }

    case 'REQUEST_COMPLETE':
      return { ...addEntry(state, 'answer', formatOutcome(action.outcome)), pending: null };

    case 'RESEARCH_QUESTIONS':
      return {
        ...addEntry(state, 'questions', formatQuestions(action.symbol, action.questions)),
        pending: null,
        researchSymbol: action.symbol,
      };

    case 'RESEARCH_COMPLETE':
      return {
        ...addEntry(state, 'research', formatResearchReport(action.report)),
        pending: null,
        researchSymbol: null,
      };

    case 'SLASH_RESULT':
      return { ...addEntry(state, 'slash', action.output), pending: null };

    case 'ERROR': {
      const next = { ...addEntry(state, 'error', `Error: ${action.message}`), pending: null };
      // The server drops a research session once answering has started.
      return state.pending === 'research_answer' ? { ...next, researchSymbol: null } : next;
    }

    default:
      return state;
  }
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useAppStore(): [AppState, Dispatch<AppAction>] {
  return useReducer(appReducer, initialAppState);
}
