import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { Task, TaskResult, TaskStats, TaskStatus } from '@tickertape/shared';

export interface CreateTaskInput {
  title: string;
  description: string;
  assignedAgentId?: string | null;
  priority?: number;
  parentTaskId?: string | null;
  metadata?: Record<string, unknown>;
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskTransitionError extends Error {
  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = 'TaskTransitionError';
  }
}

/** Allowed status moves. Terminal states have none. */
const TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ['in_progress', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface TaskLedger {
  on(event: 'task', listener: (task: Task) => void): this;
  on(event: 'cleared', listener: () => void): this;
  emit(event: 'task', task: Task): boolean;
  emit(event: 'cleared'): boolean;
}

/**
 * In-memory task store. Every mutation is synchronous, so two tasks finishing
 * around the same await point cannot interleave inside an update.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TaskLedger extends EventEmitter {
  private tasks: Map<string, Task> = new Map();

  create(input: CreateTaskInput): Task {
    const now = Date.now();
    const task: Task = {
      id: randomUUID(),
      title: input.title,
      description: input.description,
      assignedAgentId: input.assignedAgentId ?? null,
      status: 'pending',
      priority: input.priority ?? 1,
      createdAt: now,
      updatedAt: now,
      result: null,
      parentTaskId: input.parentTaskId ?? null,
      subTaskIds: [],
      metadata: input.metadata ?? {},
    };
    this.tasks.set(task.id, task);

    if (task.parentTaskId) {
      const parent = this.tasks.get(task.parentTaskId);
      if (parent) {
        this.tasks.set(parent.id, { ...parent, subTaskIds: [...parent.subTaskIds, task.id] });
      }
    }

    this.emit('task', structuredClone(task));
    return structuredClone(task);
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  /** All tasks in creation order. */
  list(): Task[] {
    return Array.from(this.tasks.values(), (task) => structuredClone(task));
  }

  listPending(): Task[] {
    return this.list().filter((task) => task.status === 'pending');
  }

  markInProgress(id: string): Task {
    return this.transition(id, 'in_progress', null);
  }

  complete(id: string, result: TaskResult): Task {
    return this.transition(id, 'completed', result);
  }

  fail(id: string, error: string): Task {
    return this.transition(id, 'failed', error);
  }

  clear(): void {
    this.tasks.clear();
    this.emit('cleared');
  }

  stats(): TaskStats {
    const stats: TaskStats = { total: 0, pending: 0, inProgress: 0, completed: 0, failed: 0 };
    for (const task of this.tasks.values()) {
      stats.total++;
      switch (task.status) {
        case 'pending':
          stats.pending++;
          break;
        case 'in_progress':
          stats.inProgress++;
          break;
        case 'completed':
          stats.completed++;
          break;
        case 'failed':
          stats.failed++;
          break;
      }
    }
    return stats;
  }

  private transition(id: string, to: TaskStatus, result: TaskResult | null): Task {
    const current = this.tasks.get(id);
    if (!current) throw new TaskNotFoundError(id);
    if (!TRANSITIONS[current.status].includes(to)) {
      throw new TaskTransitionError(id, current.status, to);
    }

    const updated: Task = { ...current, status: to, result, updatedAt: Date.now() };
    this.tasks.set(id, updated);
    this.emit('task', structuredClone(updated));
    return structuredClone(updated);
  }
}
