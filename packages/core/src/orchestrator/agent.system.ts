import { EventEmitter } from 'node:events';
import type {
  AgentInfo,
  AgentLock,
  AgentState,
  ProviderAdapter,
  RequestOutcome,
  ResearchReport,
  SystemPhase,
  SystemStats,
  Task,
  TickertapeConfig,
  TokenUsage,
} from '@tickertape/shared';
import { ToolRegistry } from '../tools/tool.registry.js';
import type { DataSources } from '../tools/sources/data.sources.js';
import { createSupervisorTools } from '../tools/tools/supervisor.tools.js';
import { AgentLockRegistry } from '../locks/agent.lock.js';
import { AgentRegistry, DuplicateAgentError } from '../agents/agent.registry.js';
import type { AgentDeps, WorkerAgent } from '../agents/worker.agent.js';
import { TaskLedger } from '../tasks/task.ledger.js';
import { TaskScheduler } from '../tasks/task.scheduler.js';
import { ReportMerger, renderResult } from '../tasks/report.merger.js';
import { DeepResearch } from '../research/deep.research.js';
import { ResearchSession } from '../research/research.session.js';
import type { Logger } from '../logging/logger.js';
import { createCustomWorker, createSupervisorAgent, createWorkerAgents } from './agent.factory.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface AgentSystemOptions {
  config: TickertapeConfig;
  provider: ProviderAdapter;
  sources: DataSources;
  logger: Logger;
}

export class AgentSystemBusyError extends Error {
  constructor(phase: SystemPhase) {
    super(`Busy (${phase}). Wait for the current request to finish.`);
    this.name = 'AgentSystemBusyError';
  }
}

const CUSTOM_ID_PATTERN = /^[a-z][a-z0-9_-]{1,39}$/i;

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface AgentSystem {
  /** Any ledger change. */
  on(event: 'task:update', listener: (task: Task) => void): this;
  /** Ledger and conversations were wiped. */
  on(event: 'system:reset', listener: () => void): this;
  on(event: 'agent:state', listener: (state: AgentState) => void): this;
  on(event: 'lock:update', listener: (locks: AgentLock[]) => void): this;
  on(event: 'phase', listener: (phase: SystemPhase) => void): this;

  emit(event: 'task:update', task: Task): boolean;
  emit(event: 'system:reset'): boolean;
  emit(event: 'agent:state', state: AgentState): boolean;
  emit(event: 'lock:update', locks: AgentLock[]): boolean;
  emit(event: 'phase', phase: SystemPhase): boolean;
}

// ---------------------------------------------------------------------------
// AgentSystem
// ---------------------------------------------------------------------------

/**
 * Owns the supervisor, the analysts, the task ledger and the research session.
 *
 *   processUserRequest → supervisor delegates → scheduler runs pending tasks
 *                      → merger writes the report
 *
 * One request or research step runs at a time; a second one is rejected
 * with AgentSystemBusyError rather than queued.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AgentSystem extends EventEmitter {
  readonly ledger = new TaskLedger();
  readonly workers = new AgentRegistry();

  private readonly config: TickertapeConfig;
  private readonly logger: Logger;
  private readonly locks = new AgentLockRegistry();
  private readonly tools: ToolRegistry;
  private readonly deps: AgentDeps;
  private readonly supervisor: WorkerAgent;
  private readonly scheduler: TaskScheduler;
  private readonly merger: ReportMerger;
  private readonly research: ResearchSession;
  private _phase: SystemPhase = 'idle';

  constructor(options: AgentSystemOptions) {
    super();
    this.config = options.config;
    this.logger = options.logger.child('system');
    this.tools = new ToolRegistry(options.sources);
    this.deps = { provider: options.provider, tools: this.tools, locks: this.locks, logger: options.logger };

    this.merger = new ReportMerger(options.provider, this.ledger, options.logger.child('merger'));
    this.scheduler = new TaskScheduler(this.ledger, this.workers, options.logger.child('scheduler'));

    for (const tool of createSupervisorTools({ ledger: this.ledger, agents: this.workers, merger: this.merger })) {
      this.tools.register(tool, ['supervisor']);
    }

    this.supervisor = createSupervisorAgent(this.config, this.deps);
    this.watchAgent(this.supervisor);
    for (const worker of createWorkerAgents(this.config, this.deps)) {
      this.workers.add(worker);
      this.watchAgent(worker);
    }

    const deepResearch = new DeepResearch({
      provider: options.provider,
      sources: options.sources,
      logger: options.logger,
    });
    this.research = new ResearchSession(deepResearch, (stage) => this.setPhase(stage));

    this.wireEvents();
  }

  get phase(): SystemPhase {
    return this._phase;
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  /**
   * Run one user request end to end. Tasks the supervisor creates are executed
   * and merged; a request that creates none gets the supervisor's own answer.
   */
  async processUserRequest(text: string): Promise<RequestOutcome> {
    const started = Date.now();
    return this.exclusive('planning', async () => {
      const before = new Set(this.ledger.list().map((task) => task.id));
      const answer = await this.supervisor.process(text, { holder: 'request' });
      const taskIds = this.ledger
        .list()
        .filter((task) => !before.has(task.id))
        .map((task) => task.id);

      if (taskIds.length === 0) {
        return { text: answer, taskIds, durationMs: Date.now() - started };
      }

      this.setPhase('executing');
      const outcomes = await this.scheduler.executeAllPending();
      this.logger.info(
        `executed ${outcomes.length} task(s): ${outcomes.filter((o) => o.ok).length} ok, ` +
          `${outcomes.filter((o) => !o.ok).length} failed`,
      );

      const tasks = taskIds
        .map((id) => this.ledger.get(id))
        .filter((task): task is Task => task !== undefined);

      if (!tasks.some((task) => task.status === 'completed')) {
        return { text: taskStatusListing(tasks), taskIds, durationMs: Date.now() - started };
      }

      this.setPhase('merging');
      const report = await this.merger.mergeResults(taskIds, reportTitle(text), text);
      return { text: report.structuredReport, taskIds, durationMs: Date.now() - started };
    });
  }

  startResearch(symbol: string): Promise<{ symbol: string; questions: string[] }> {
    return this.exclusive('questioning', async () => {
      const questions = await this.research.start(symbol);
      return { symbol: this.research.pendingSymbol ?? symbol.toUpperCase(), questions };
    });
  }

  answerResearch(answers: string): Promise<ResearchReport> {
    return this.exclusive('gathering', () => this.research.answer(answers));
  }

  /** Symbol awaiting research answers, if any. */
  get researchPending(): string | null {
    return this.research.pendingSymbol;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getTaskStatus(id: string): Task | { error: string } {
    return this.ledger.get(id) ?? { error: `Task ${id} not found` };
  }

  listTasks(): Task[] {
    return this.ledger.list();
  }

  /** Supervisor first, then the workers in roster order. */
  listAgents(): AgentInfo[] {
    return [this.supervisor.info(), ...this.workers.info()];
  }

  getLocks(): AgentLock[] {
    return this.locks.getLocks();
  }

  stats(): SystemStats {
    const usage = [this.supervisor, ...this.workers.all()].reduce<TokenUsage>(
      (sum, agent) => {
        const u = agent.tokenUsage;
        return {
          promptTokens: sum.promptTokens + u.promptTokens,
          completionTokens: sum.completionTokens + u.completionTokens,
          totalTokens: sum.totalTokens + u.totalTokens,
        };
      },
      { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    );

    return {
      tasks: this.ledger.stats(),
      agents: this.workers.ids().length,
      activeLocks: this.locks.getLocks().length,
      researchPending: this.research.pendingSymbol,
      tokenUsage: usage,
    };
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /** Add a worker with its own prompt and an explicit tool list. */
  createCustomAgent(id: string, systemPrompt: string, toolNames: string[]): AgentInfo {
    const agentId = id.trim();
    if (!CUSTOM_ID_PATTERN.test(agentId)) {
      throw new Error(`Invalid agent id "${agentId}": use 2-40 letters, digits, _ or -`);
    }
    if (this.workers.has(agentId) || agentId.toLowerCase() === 'supervisor') {
      throw new DuplicateAgentError(agentId);
    }

    this.tools.grant(agentId, toolNames);
    const agent = createCustomWorker(this.config, this.deps, agentId, systemPrompt);
    this.workers.add(agent);
    this.watchAgent(agent);
    this.logger.info(`custom agent ${agentId} created with ${toolNames.length} tool(s)`);
    return agent.info();
  }

  /** Forget all tasks and conversations. Custom agents stay registered. */
  resetSystem(): void {
    if (this._phase !== 'idle') {
      throw new AgentSystemBusyError(this._phase);
    }
    this.ledger.clear();
    this.supervisor.reset();
    for (const worker of this.workers.all()) {
      worker.reset();
    }
    this.research.cancel();
    this.emit('system:reset');
  }

  destroy(): void {
    this.locks.destroy();
    this.removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async exclusive<T>(phase: SystemPhase, fn: () => Promise<T>): Promise<T> {
    if (this._phase !== 'idle') {
      throw new AgentSystemBusyError(this._phase);
    }
    this.setPhase(phase);
    try {
      return await fn();
    } finally {
      this.setPhase('idle');
    }
  }

  private setPhase(phase: SystemPhase): void {
    if (this._phase === phase) return;
    this._phase = phase;
    this.emit('phase', phase);
  }

  private watchAgent(agent: WorkerAgent): void {
    agent.on('state', (state) => this.emit('agent:state', state));
  }

  private wireEvents(): void {
    this.ledger.on('task', (task) => this.emit('task:update', task));

    const emitLocks = (): void => {
      this.emit('lock:update', this.locks.getLocks());
    };
    this.locks.on('lock_acquired', emitLocks);
    this.locks.on('lock_released', emitLocks);
    this.locks.on('lock_stale', (lock) => {
      this.logger.warn(`agent ${lock.agentId} held by ${lock.holder} since ${new Date(lock.acquiredAt).toISOString()}`);
    });
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function reportTitle(request: string): string {
  const oneLine = request.replace(/\s+/g, ' ').trim();
  return oneLine.length > 60 ? `Report: ${oneLine.slice(0, 57)}...` : `Report: ${oneLine}`;
}

/** Shown when no delegated task completed. */
export function taskStatusListing(tasks: Task[]): string {
  const lines = ['No task completed.', ''];
  for (const task of tasks) {
    lines.push(`- ${task.title} (${task.assignedAgentId ?? 'unassigned'}): ${task.status}`);
    if (task.result !== null) {
      lines.push(`  ${renderResult(task.result)}`);
    }
  }
  return lines.join('\n');
}
