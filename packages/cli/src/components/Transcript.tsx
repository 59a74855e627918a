import React from 'react';
import { Box, Text } from 'ink';
import type { TranscriptEntry, TranscriptKind } from '../store/app.store.js';
import { THEME } from '../theme.js';

interface TranscriptProps {
  entries: TranscriptEntry[];
}

/**
 * Conversation so far. Each entry is split on newlines; each line gets its own
 * Text element so long reports wrap cleanly.
 */
export const Transcript: React.FC<TranscriptProps> = ({ entries }) => {
  return (
    <Box flexDirection="column">
      {entries.map((entry) => (
        <Box
          key={entry.id}
          flexDirection="column"
          borderStyle={entry.kind === 'user' ? undefined : 'single'}
          borderColor={borderColor(entry.kind)}
          paddingX={entry.kind === 'user' ? 0 : 1}
          marginTop={1}
        >
          {entry.text.split('\n').map((line, i) => (
            <Text key={i} color={lineColor(entry.kind, line)} bold={entry.kind === 'user'}>
              {entry.kind === 'user' && i === 0 ? `> ${line}` : line}
            </Text>
          ))}
        </Box>
      ))}
    </Box>
  );
};

function borderColor(kind: TranscriptKind): string {
  switch (kind) {
    case 'error':
      return THEME.error;
    case 'questions':
      return THEME.info;
    case 'research':
    case 'answer':
      return THEME.accent;
    default:
      return THEME.dimBorder;
  }
}

function lineColor(kind: TranscriptKind, line: string): string {
  if (kind === 'error') return THEME.error;
  if (kind === 'user') return THEME.primary;
  if (line.startsWith('#')) return THEME.primary;
  if (line.startsWith('!')) return THEME.warning;
  if (line.startsWith('Recommendation: BUY')) return THEME.success;
  if (line.startsWith('Recommendation: SELL')) return THEME.error;
  return THEME.text;
}
