import React from 'react';
import { Box, Text } from 'ink';
import type { AgentLock, Task, TaskStatus } from '@tickertape/shared';
import { THEME } from '../theme.js';

interface TaskTableProps {
  tasks: Task[];
  locks: AgentLock[];
}

const STATUS_MARK: Record<TaskStatus, string> = {
  pending: '○',
  in_progress: '●',
  completed: '✓',
  failed: '✗',
};

/** Live view of the ledger while a request runs. */
export const TaskTable: React.FC<TaskTableProps> = ({ tasks, locks }) => {
  if (tasks.length === 0) return null;

  const agentWidth = Math.max(...tasks.map((task) => (task.assignedAgentId ?? '-').length));
  const queued = locks.filter((lock) => lock.waiting > 0);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={THEME.dimBorder} paddingX={1}>
      {tasks.map((task) => (
        <Box key={task.id} gap={1}>
          <Text color={statusColor(task.status)}>{STATUS_MARK[task.status]}</Text>
          <Text color={THEME.dim}>{task.id.slice(0, 8)}</Text>
          <Text color={THEME.primary}>{(task.assignedAgentId ?? '-').padEnd(agentWidth)}</Text>
          <Text color={THEME.text}>{task.title}</Text>
        </Box>
      ))}
      {queued.length > 0 && (
        <Text color={THEME.dim}>
          queued: {queued.map((lock) => `${lock.agentId} (${lock.waiting})`).join('  ')}
        </Text>
      )}
    </Box>
  );
};

function statusColor(status: TaskStatus): string {
  switch (status) {
    case 'completed':
      return THEME.success;
    case 'failed':
      return THEME.error;
    case 'in_progress':
      return THEME.warning;
    default:
      return THEME.dim;
  }
}
