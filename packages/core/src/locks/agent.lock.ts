import { EventEmitter } from 'node:events';
import type { AgentLock } from '@tickertape/shared';

export interface AgentLockRegistryOptions {
  /** A hold longer than this is reported through 'lock_stale'. */
  staleAfterMs?: number;
  watcherIntervalMs?: number;
}

interface Slot {
  lock: AgentLock;
  queue: Array<{ holder: string; wake: () => void }>;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface AgentLockRegistry {
  on(event: 'lock_acquired' | 'lock_released' | 'lock_stale', listener: (lock: AgentLock) => void): this;
  emit(event: 'lock_acquired' | 'lock_released' | 'lock_stale', lock: AgentLock): boolean;
}

/**
 * One mutex per worker agent. Callers queue in arrival order; the lock is
 * handed straight to the next waiter on release.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AgentLockRegistry extends EventEmitter {
  private slots: Map<string, Slot> = new Map();
  private readonly staleAfterMs: number;
  private watcherTimer: ReturnType<typeof setInterval> | null = null;
  private reported: Set<string> = new Set();

  constructor(options: AgentLockRegistryOptions = {}) {
    super();
    this.staleAfterMs = options.staleAfterMs ?? 120_000;
    this.startStaleWatcher(options.watcherIntervalMs ?? 5_000);
  }

  /** Run `fn` while holding the agent's lock. The lock is released however `fn` ends. */
  async runExclusive<T>(agentId: string, holder: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(agentId, holder);
    try {
      return await fn();
    } finally {
      this.release(agentId);
    }
  }

  getLocks(): AgentLock[] {
    return Array.from(this.slots.values(), (slot) => ({ ...slot.lock, waiting: slot.queue.length }));
  }

  destroy(): void {
    if (this.watcherTimer) {
      clearInterval(this.watcherTimer);
      this.watcherTimer = null;
    }
    this.removeAllListeners();
  }

  private acquire(agentId: string, holder: string): Promise<void> {
    const slot = this.slots.get(agentId);
    if (!slot) {
      this.grant(agentId, holder, []);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      slot.queue.push({ holder, wake: resolve });
    });
  }

  private release(agentId: string): void {
    const slot = this.slots.get(agentId);
    if (!slot) return;

    this.slots.delete(agentId);
    this.reported.delete(agentId);
    this.emit('lock_released', { ...slot.lock, waiting: slot.queue.length });

    const [next, ...rest] = slot.queue;
    if (next) {
      this.grant(agentId, next.holder, rest);
      next.wake();
    }
  }

  private grant(agentId: string, holder: string, queue: Slot['queue']): void {
    const lock: AgentLock = { agentId, holder, acquiredAt: Date.now(), waiting: queue.length };
    this.slots.set(agentId, { lock, queue });
    this.emit('lock_acquired', lock);
  }

  private startStaleWatcher(intervalMs: number): void {
    this.watcherTimer = setInterval(() => {
      const now = Date.now();
      for (const [agentId, slot] of this.slots) {
        if (now - slot.lock.acquiredAt > this.staleAfterMs && !this.reported.has(agentId)) {
          this.reported.add(agentId);
          this.emit('lock_stale', { ...slot.lock, waiting: slot.queue.length });
        }
      }
    }, intervalMs);

    this.watcherTimer.unref();
  }
}
