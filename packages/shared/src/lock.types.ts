/** A worker agent currently held by a running task. */
export interface AgentLock {
  agentId: string;
  holder: string; // task id or request label
  acquiredAt: number;
  /** Callers queued behind the holder. */
  waiting: number;
}
