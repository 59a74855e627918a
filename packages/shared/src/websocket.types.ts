import type { AgentState } from './agent.types.js';
import type { RequestOutcome, Task } from './task.types.js';
import type { AgentLock } from './lock.types.js';
import type { ResearchReport } from './research.types.js';

export type SystemPhase =
  | 'idle'
  | 'planning'
  | 'executing'
  | 'merging'
  | 'questioning'
  | 'gathering'
  | 'analyzing';

// ---- Client → Server messages ----

export type ClientMessage =
  | { type: 'SUBMIT_REQUEST'; payload: { prompt: string } }
  | { type: 'RESEARCH_START'; payload: { symbol: string } }
  | { type: 'RESEARCH_ANSWER'; payload: { answers: string } }
  | { type: 'SLASH_COMMAND'; payload: { command: string; args: string } };

// ---- Server → Client messages ----

export type ServerMessage =
  | { type: 'PHASE'; payload: { phase: SystemPhase } }
  | { type: 'TASK_UPDATE'; payload: Task }
  | { type: 'SYSTEM_RESET'; payload: { at: number } }
  | { type: 'AGENT_UPDATE'; payload: AgentState }
  | { type: 'LOCK_UPDATE'; payload: AgentLock[] }
  | { type: 'REQUEST_COMPLETE'; payload: RequestOutcome }
  | { type: 'RESEARCH_QUESTIONS'; payload: { symbol: string; questions: string[] } }
  | { type: 'RESEARCH_COMPLETE'; payload: ResearchReport }
  | { type: 'SLASH_RESULT'; payload: { command: string; output: string } }
  | { type: 'ERROR'; payload: { message: string } };
