import React from 'react';
import { Box, Text } from 'ink';
import type { AgentState } from '@tickertape/shared';
import { THEME } from '../theme.js';
import { SPINNER_FRAMES } from './Header.js';

interface ThinkingPanelProps {
  agentStates: Record<string, AgentState>;
  spinnerFrame: number;
}

export const ThinkingPanel: React.FC<ThinkingPanelProps> = ({ agentStates, spinnerFrame }) => {
  const spinner = SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length] ?? '';

  const activeAgents = Object.values(agentStates).filter((a) => a.status === 'thinking' || a.status === 'acting');

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={THEME.dimBorder} paddingX={1}>
      {activeAgents.length === 0 ? (
        <Box gap={1}>
          <Text color={THEME.primary}>{spinner}</Text>
          <Text color={THEME.dim}>waiting for model...</Text>
        </Box>
      ) : (
        activeAgents.map((agent) => <AgentThought key={agent.id} agent={agent} spinner={spinner} />)
      )}
    </Box>
  );
};

// ── Per-agent row ────────────────────────────────────────────────────────────

interface AgentThoughtProps {
  agent: AgentState;
  spinner: string;
}

const AgentThought: React.FC<AgentThoughtProps> = ({ agent, spinner }) => {
  const isActing = agent.status === 'acting';
  const statusColor = isActing ? THEME.warning : THEME.primary;
  const lastTool = [...agent.log].reverse().find((entry) => entry.type === 'tool_call');
  const text = agent.currentAction?.trim() ?? '';

  return (
    <Box flexDirection="column">
      <Box gap={1}>
        <Text color={statusColor}>{spinner}</Text>
        <Text color={statusColor} bold>
          {agent.id}
        </Text>
        <Text color={THEME.dim}>[{agent.status}]</Text>
      </Box>
      {text ? (
        <Text color={THEME.textDim} dimColor>
          {tail(text, 120)}
        </Text>
      ) : lastTool ? (
        <Text color={THEME.dim} dimColor>
          ⚙ {tail(lastTool.content, 120)}
        </Text>
      ) : null}
    </Box>
  );
};

/** Return the last `n` characters of a string, collapsing newlines. */
function tail(str: string, n: number): string {
  const single = str.replace(/\n+/g, ' ').trim();
  return single.length > n ? '…' + single.slice(single.length - n) : single;
}
