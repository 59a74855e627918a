// ---------------------------------------------------------------------------
// Input routing
// ---------------------------------------------------------------------------

const EXIT_WORDS = new Set(['exit', 'quit', 'q', '/exit', '/quit']);

/** What one line typed at the prompt should do. */
export type InputIntent =
  | { kind: 'exit' }
  | { kind: 'request'; prompt: string }
  | { kind: 'research'; symbol: string }
  | { kind: 'research_answer'; answers: string }
  | { kind: 'slash'; command: string; args: string }
  | { kind: 'invalid'; message: string };

/**
 * Classify a line of input. While a research is waiting for answers, plain
 * text answers it; otherwise plain text is a request for the supervisor.
 */
export function parseInput(input: string, researchPending: boolean): InputIntent {
  const trimmed = input.trim();
  if (EXIT_WORDS.has(trimmed.toLowerCase())) return { kind: 'exit' };

  if (trimmed.startsWith('/')) {
    const [rawCommand = '', ...rest] = trimmed.split(/\s+/);
    const command = rawCommand.toLowerCase();
    const args = rest.join(' ');

    if (command === '/research') {
      const [symbol] = rest;
      if (!symbol || rest.length > 1) {
        return { kind: 'invalid', message: 'Usage: /research <SYMBOL>, e.g. /research ETH' };
      }
      return { kind: 'research', symbol: symbol.toUpperCase() };
    }
    return { kind: 'slash', command, args };
  }

  return researchPending ? { kind: 'research_answer', answers: trimmed } : { kind: 'request', prompt: trimmed };
}
