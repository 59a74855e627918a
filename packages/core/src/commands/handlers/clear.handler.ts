import type { CommandDispatcherContext } from '../command.dispatcher.js';

export function clearHandler(ctx: CommandDispatcherContext): string {
  ctx.system.resetSystem();
  return 'Cleared all tasks and agent conversations.';
}
