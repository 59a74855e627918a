import type { CommandDispatcherContext } from '../command.dispatcher.js';

export function tasksHandler(ctx: CommandDispatcherContext): string {
  const tasks = ctx.system.listTasks();
  if (tasks.length === 0) return 'No tasks yet.';

  const agentWidth = Math.max(5, ...tasks.map((task) => (task.assignedAgentId ?? '-').length));
  const lines = [`${'ID'.padEnd(36)}  ${'STATUS'.padEnd(11)}  ${'AGENT'.padEnd(agentWidth)}  TITLE`];
  for (const task of tasks) {
    lines.push(
      `${task.id.padEnd(36)}  ${task.status.padEnd(11)}  ${(task.assignedAgentId ?? '-').padEnd(agentWidth)}  ${task.title}`,
    );
  }
  return lines.join('\n');
}
