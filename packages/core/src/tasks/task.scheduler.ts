import type { TaskExecution } from '@tickertape/shared';
import type { TaskLedger } from './task.ledger.js';
import type { AgentRegistry } from '../agents/agent.registry.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';

/**
 * Runs ledger tasks on their assigned workers. Each task gets exactly one
 * attempt; outcomes are written back to the ledger and returned, never thrown.
 */
export class TaskScheduler {
  constructor(
    private readonly ledger: TaskLedger,
    private readonly agents: AgentRegistry,
    private readonly logger: Logger,
  ) {}

  async executeTask(taskId: string): Promise<TaskExecution> {
    const task = this.ledger.get(taskId);
    if (!task) {
      return { taskId, ok: false, error: `Task ${taskId} not found` };
    }

    try {
      const agent = task.assignedAgentId ? this.agents.get(task.assignedAgentId) : undefined;
      if (!agent) {
        const error = `Agent '${task.assignedAgentId ?? ''}' not found`;
        this.ledger.fail(taskId, error);
        return { taskId, ok: false, error };
      }

      this.ledger.markInProgress(taskId);
      this.logger.info(`task ${taskId} -> ${agent.id}: ${task.title}`);

      try {
        const result = await agent.process(task.description, { holder: taskId });
        this.ledger.complete(taskId, result);
        return { taskId, ok: true, result };
      } catch (err) {
        const error = errorMessage(err);
        this.logger.warn(`task ${taskId} failed: ${error}`);
        this.ledger.fail(taskId, error);
        return { taskId, ok: false, error };
      }
    } catch (err) {
      // Ledger refused the move, e.g. the task was already taken.
      return { taskId, ok: false, error: errorMessage(err) };
    }
  }

  /** Run every task that is pending right now, all at once, in ledger order. */
  async executeAllPending(): Promise<TaskExecution[]> {
    const ids = this.ledger.listPending().map((task) => task.id);
    if (ids.length === 0) return [];

    this.logger.debug(`executing ${ids.length} pending task(s)`);
    const settled = await Promise.allSettled(ids.map((id) => this.executeTask(id)));

    return settled.map((outcome, i): TaskExecution => {
      const taskId = ids[i] ?? '';
      return outcome.status === 'fulfilled'
        ? outcome.value
        : { taskId, ok: false, error: String(outcome.reason) };
    });
  }
}
