export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

/** Opaque task output: plain text from a worker, or a structured record. */
export type TaskResult = string | Record<string, unknown>;

export interface Task {
  id: string;
  title: string;
  description: string;
  assignedAgentId: string | null;
  status: TaskStatus;
  /** Advisory only. The scheduler never orders by it. */
  priority: number;
  createdAt: number;
  updatedAt: number;
  result: TaskResult | null;
  parentTaskId: string | null;
  subTaskIds: string[];
  metadata: Record<string, unknown>;
}

export interface TaskStats {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

export type TaskExecution =
  | { taskId: string; ok: true; result: string }
  | { taskId: string; ok: false; error: string };

export interface TaskSummaryInfo {
  title: string;
  agent: string | null;
  status: TaskStatus;
}

export interface MergedReport {
  summaryTitle: string;
  structuredReport: string;
  rawResults: Record<string, TaskResult | null>;
  tasksInfo: Record<string, TaskSummaryInfo>;
  missingTasks: string[];
  incompleteTasks: string[];
  timestamp: number;
  usedFallback: boolean;
}

export interface RequestOutcome {
  text: string;
  taskIds: string[];
  durationMs: number;
}
