import type { AgentInfo } from '@tickertape/shared';
import type { WorkerAgent } from './worker.agent.js';

export class DuplicateAgentError extends Error {
  constructor(agentId: string) {
    super(`Agent '${agentId}' already exists`);
    this.name = 'DuplicateAgentError';
  }
}

/** Agents by id. Lookups ignore case; ids keep the case they were added with. */
export class AgentRegistry {
  private agents: Map<string, WorkerAgent> = new Map();

  add(agent: WorkerAgent): void {
    if (this.resolveId(agent.id)) {
      throw new DuplicateAgentError(agent.id);
    }
    this.agents.set(agent.id, agent);
  }

  /** Canonical id for `id`, or undefined when no agent matches. */
  resolveId(id: string): string | undefined {
    const wanted = id.trim().toLowerCase();
    for (const key of this.agents.keys()) {
      if (key.toLowerCase() === wanted) return key;
    }
    return undefined;
  }

  get(id: string): WorkerAgent | undefined {
    const key = this.resolveId(id);
    return key ? this.agents.get(key) : undefined;
  }

  has(id: string): boolean {
    return this.resolveId(id) !== undefined;
  }

  ids(): string[] {
    return Array.from(this.agents.keys());
  }

  all(): WorkerAgent[] {
    return Array.from(this.agents.values());
  }

  info(): AgentInfo[] {
    return this.all().map((agent) => agent.info());
  }
}
