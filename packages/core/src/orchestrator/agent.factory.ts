import type { AgentRole, TickertapeConfig, WorkerRole } from '@tickertape/shared';
import { WorkerAgent, type AgentDeps, type WorkerAgentConfig } from '../agents/worker.agent.js';
import { SUPERVISOR_PROMPT, WORKER_PROMPTS } from '../agents/agent.prompts.js';

// ---------------------------------------------------------------------------
// Roster
// ---------------------------------------------------------------------------

export const WORKER_DESCRIPTIONS: Record<Exclude<WorkerRole, 'custom'>, string> = {
  market_analyst: 'Current prices, trending coins, coin search',
  technical_analyst: 'Historical prices, candles, perp market data',
  news_researcher: 'News, tweets, hacks, unlocks, raises, prediction markets',
  protocol_analyst: 'DeFi TVL, liquidity pools, holder concentration',
};

const WORKER_ROLES: Array<Exclude<WorkerRole, 'custom'>> = [
  'market_analyst',
  'technical_analyst',
  'news_researcher',
  'protocol_analyst',
];

function agentConfig(
  config: TickertapeConfig,
  id: string,
  role: AgentRole,
  description: string,
  systemPrompt: string,
): WorkerAgentConfig {
  return {
    id,
    role,
    description,
    systemPrompt,
    maxIterations: config.agents.max_iterations,
    maxHistoryMessages: config.agents.max_history_messages,
  };
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createSupervisorAgent(config: TickertapeConfig, deps: AgentDeps): WorkerAgent {
  return new WorkerAgent(
    agentConfig(config, 'supervisor', 'supervisor', 'Splits requests into tasks for the analysts', SUPERVISOR_PROMPT),
    deps,
  );
}

/** The four built-in analysts, in roster order. */
export function createWorkerAgents(config: TickertapeConfig, deps: AgentDeps): WorkerAgent[] {
  return WORKER_ROLES.map(
    (role) => new WorkerAgent(agentConfig(config, role, role, WORKER_DESCRIPTIONS[role], WORKER_PROMPTS[role]), deps),
  );
}

export function createCustomWorker(
  config: TickertapeConfig,
  deps: AgentDeps,
  id: string,
  systemPrompt: string,
): WorkerAgent {
  return new WorkerAgent(agentConfig(config, id, 'custom', 'Custom agent', systemPrompt), deps);
}
