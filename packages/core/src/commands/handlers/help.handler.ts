const SLASH_COMMANDS: Record<string, string> = {
  '/research <SYMBOL>': 'Deep research on one token; your next message answers the questions',
  '/tasks': 'List every task in the ledger',
  '/task <ID>': 'Show one task with its result (an ID prefix is enough)',
  '/agents': 'List the supervisor and the analysts',
  '/agents add <id> <tools> <prompt>': 'Create a custom analyst; tools are comma separated',
  '/status': 'Task counts, locks and token usage',
  '/config': 'Show current configuration',
  '/clear': 'Forget all tasks and conversations',
  '/help': 'Show all available commands',
  'exit | quit | q': 'Leave',
};

export function helpHandler(): string {
  const width = Math.max(...Object.keys(SLASH_COMMANDS).map((cmd) => cmd.length));
  const lines = ['Available commands:', ''];
  for (const [cmd, desc] of Object.entries(SLASH_COMMANDS)) {
    lines.push(`  ${cmd.padEnd(width)}  ${desc}`);
  }
  lines.push('', 'Anything else is sent to the supervisor as a request.');
  return lines.join('\n');
}
