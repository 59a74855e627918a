import type { CommandDispatcherContext } from '../command.dispatcher.js';

export function statusHandler(ctx: CommandDispatcherContext): string {
  const { config, system } = ctx;
  const stats = system.stats();
  const providerLine =
    config.provider.name === 'ollama'
      ? `Host:     ${config.provider.host}:${config.provider.port}`
      : `Endpoint: ${config.provider.base_url ?? 'OpenAI API'}`;

  const lines = [
    `Model:    ${config.provider.name}/${config.provider.model}`,
    providerLine,
    `Phase:    ${system.phase}`,
    `Agents:   ${stats.agents} workers + supervisor`,
    `Tasks:    ${stats.tasks.total} total, ${stats.tasks.pending} pending, ${stats.tasks.inProgress} in progress, ` +
      `${stats.tasks.completed} completed, ${stats.tasks.failed} failed`,
    `Locks:    ${stats.activeLocks} held`,
    `Tokens:   ${stats.tokenUsage.totalTokens} (${stats.tokenUsage.promptTokens} prompt, ` +
      `${stats.tokenUsage.completionTokens} completion)`,
  ];
  if (stats.researchPending) {
    lines.push(`Research: waiting for answers on ${stats.researchPending}`);
  }
  return lines.join('\n');
}
