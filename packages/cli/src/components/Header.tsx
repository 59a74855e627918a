import React from 'react';
import { Box, Text } from 'ink';
import type { SystemPhase } from '@tickertape/shared';
import { THEME } from '../theme.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

interface HeaderProps {
  model: string;
  phase: SystemPhase;
  isBusy: boolean;
  spinnerFrame: number;
  clockTime: string;
}

export const Header: React.FC<HeaderProps> = ({ model, phase, isBusy, spinnerFrame, clockTime }) => {
  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1} justifyContent="space-between">
      <Box gap={1}>
        {isBusy && <Text color={THEME.primary}>{SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length]}</Text>}
        <Text bold color={THEME.primary}>
          TICKERTAPE
        </Text>
      </Box>
      <Box gap={2}>
        <Text color={phaseColor(phase)}>{phase}</Text>
        <Text color={THEME.accent}>model: {model}</Text>
        <Text color={THEME.dim}>{clockTime}</Text>
      </Box>
    </Box>
  );
};

function phaseColor(phase: SystemPhase): string {
  switch (phase) {
    case 'idle':
      return THEME.dim;
    case 'questioning':
    case 'gathering':
    case 'analyzing':
      return THEME.info;
    case 'merging':
      return THEME.success;
    default:
      return THEME.warning;
  }
}
