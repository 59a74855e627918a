import type { TickertapeConfig } from '@tickertape/shared';
import type { AgentSystem } from '../orchestrator/agent.system.js';
import { errorMessage } from '../utils/guards.js';
import { helpHandler } from './handlers/help.handler.js';
import { statusHandler } from './handlers/status.handler.js';
import { configHandler } from './handlers/config.handler.js';
import { agentsHandler } from './handlers/agents.handler.js';
import { tasksHandler } from './handlers/tasks.handler.js';
import { taskHandler } from './handlers/task.handler.js';
import { clearHandler } from './handlers/clear.handler.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandDispatcherContext {
  config: TickertapeConfig;
  system: AgentSystem;
}

// ---------------------------------------------------------------------------
// CommandDispatcher
// ---------------------------------------------------------------------------

/**
 * Routes SLASH_COMMAND messages from the WebSocket server to the appropriate
 * handler and returns the text output to send back as SLASH_RESULT.
 *
 * `/research` and the exit words never reach this class: the CLI turns them
 * into RESEARCH_START or a local exit.
 */
export class CommandDispatcher {
  constructor(private readonly ctx: CommandDispatcherContext) {}

  async dispatch(command: string, args: string): Promise<string> {
    try {
      return this.route(command, args);
    } catch (err) {
      return `Error: ${errorMessage(err)}`;
    }
  }

  private route(command: string, args: string): string {
    switch (command.toLowerCase()) {
      case '/help':
        return helpHandler();

      case '/status':
        return statusHandler(this.ctx);

      case '/config':
        return configHandler(this.ctx);

      case '/agents':
        return agentsHandler(this.ctx, args);

      case '/tasks':
        return tasksHandler(this.ctx);

      case '/task':
        return taskHandler(this.ctx, args);

      case '/clear':
        return clearHandler(this.ctx);

      default:
        return `Unknown command: ${command}. Type /help for available commands.`;
    }
  }
}
