import type { CommandDispatcherContext } from '../command.dispatcher.js';

const ADD_USAGE = 'Usage: /agents add <id> <tool,tool|-> <system prompt>';

export function agentsHandler(ctx: CommandDispatcherContext, args: string): string {
  const trimmed = args.trim();
  if (trimmed === 'add' || trimmed.startsWith('add ')) {
    return addAgent(ctx, trimmed.slice('add'.length).trim());
  }

  const agents = ctx.system.listAgents();
  const width = Math.max(...agents.map((agent) => agent.id.length)) + 2;
  const lines = [`Agents (${agents.length}):`, ''];
  for (const agent of agents) {
    lines.push(`  ${agent.id.padEnd(width)}${agent.description}`);
    lines.push(`  ${''.padEnd(width)}tools: ${agent.tools.length > 0 ? agent.tools.join(', ') : '(none)'}`);
  }
  return lines.join('\n');
}

function addAgent(ctx: CommandDispatcherContext, rest: string): string {
  const match = /^(\S+)\s+(\S+)\s+([\s\S]+)$/.exec(rest);
  if (!match) return ADD_USAGE;

  const [, id = '', toolList = '', prompt = ''] = match;
  const tools = toolList === '-' ? [] : toolList.split(',').map((name) => name.trim()).filter(Boolean);
  const info = ctx.system.createCustomAgent(id, prompt.trim(), tools);
  return `Created agent ${info.id} with tools: ${info.tools.length > 0 ? info.tools.join(', ') : '(none)'}`;
}
