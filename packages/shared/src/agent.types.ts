import type { TaskStats } from './task.types.js';
import type { TokenUsage } from './provider.types.js';

export type WorkerRole =
  | 'market_analyst'
  | 'technical_analyst'
  | 'news_researcher'
  | 'protocol_analyst'
  | 'custom';

export type AgentRole = 'supervisor' | WorkerRole;

export type AgentStatus = 'idle' | 'thinking' | 'acting' | 'done' | 'error';

export interface AgentState {
  id: string; // e.g. "market_analyst"
  role: AgentRole;
  status: AgentStatus;
  currentAction: string | null;
  log: AgentLogEntry[];
  /** Last answer produced by the agent, populated when status becomes 'done'. */
  summary?: string;
}

export interface AgentLogEntry {
  timestamp: number;
  type: 'thought' | 'tool_call' | 'tool_result' | 'message';
  content: string;
}

/** Row shown by `/agents`. */
export interface AgentInfo {
  id: string;
  role: AgentRole;
  description: string;
  tools: string[];
  messageCount: number;
}

export interface SystemStats {
  tasks: TaskStats;
  agents: number;
  activeLocks: number;
  researchPending: string | null;
  tokenUsage: TokenUsage;
}
