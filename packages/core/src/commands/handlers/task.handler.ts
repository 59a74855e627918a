import type { Task } from '@tickertape/shared';
import { renderResult } from '../../tasks/report.merger.js';
import type { CommandDispatcherContext } from '../command.dispatcher.js';

export function taskHandler(ctx: CommandDispatcherContext, args: string): string {
  const id = args.trim();
  if (!id) return 'Usage: /task <ID>';

  const found = findTask(ctx, id);
  if (typeof found === 'string') return found;

  const lines = [
    `Task ${found.id}`,
    `  Title:       ${found.title}`,
    `  Status:      ${found.status}`,
    `  Agent:       ${found.assignedAgentId ?? '-'}`,
    `  Priority:    ${found.priority}`,
    `  Created:     ${new Date(found.createdAt).toISOString()}`,
    `  Updated:     ${new Date(found.updatedAt).toISOString()}`,
    `  Description: ${found.description}`,
  ];
  if (found.result !== null) {
    lines.push('', found.status === 'failed' ? 'Error:' : 'Result:', renderResult(found.result));
  }
  return lines.join('\n');
}

/** Exact id first, then a unique prefix. Returns the message to show when neither works. */
function findTask(ctx: CommandDispatcherContext, id: string): Task | string {
  const exact = ctx.system.getTaskStatus(id);
  if (!('error' in exact)) return exact;

  const matches = ctx.system.listTasks().filter((task) => task.id.startsWith(id));
  const [only] = matches;
  if (matches.length === 1 && only) return only;
  if (matches.length > 1) return `Ambiguous task id "${id}": ${matches.length} tasks match`;
  return exact.error;
}
