import type {
  AgentLock,
  AgentState,
  RequestOutcome,
  ResearchReport,
  SystemPhase,
  Task,
} from '@tickertape/shared';
import type { Pending } from './app.store.js';

// ---------------------------------------------------------------------------
// Action Types
// ---------------------------------------------------------------------------

export type AppAction =
  | { type: 'PHASE'; phase: SystemPhase }
  | { type: 'TASK_UPDATE'; task: Task }
  | { type: 'SYSTEM_RESET' }
  | { type: 'AGENT_STATE'; state: AgentState }
  | { type: 'LOCK_UPDATE'; locks: AgentLock[] }
  | { type: 'SENT'; pending: Pending; echo: string }
  | { type: 'REQUEST_COMPLETE'; outcome: RequestOutcome }
  | { type: 'RESEARCH_QUESTIONS'; symbol: string; questions: string[] }
  | { type: 'RESEARCH_COMPLETE'; report: ResearchReport }
  | { type: 'SLASH_RESULT'; command: string; output: string }
  | { type: 'ERROR'; message: string };
