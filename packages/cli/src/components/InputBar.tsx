import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import { THEME } from '../theme.js';

export type InputMode =
  | 'idle' // requests or slash commands
  | 'research_answer' // next line answers the research questions
  | 'busy'; // waiting on the server

interface InputBarProps {
  mode: InputMode;
  onSubmit: (value: string) => void;
  researchSymbol?: string | null;
}

export const InputBar: React.FC<InputBarProps> = ({ mode, onSubmit, researchSymbol }) => {
  const [value, setValue] = useState('');

  const handleSubmit = (val: string) => {
    const trimmed = val.trim();
    setValue('');
    if (trimmed) onSubmit(trimmed);
  };

  if (mode === 'busy') {
    return (
      <Box borderStyle="single" borderColor={THEME.dimBorder} paddingX={1}>
        <Text color={THEME.dim}>Working</Text>
        <Text color={THEME.dimBorder}> · Ctrl+C to quit</Text>
      </Box>
    );
  }

  const placeholder =
    mode === 'research_answer'
      ? `Answer the questions about ${researchSymbol ?? 'the token'}…`
      : 'Ask about a token, /research <SYMBOL>, or /help…';

  const promptColor = mode === 'research_answer' ? THEME.info : THEME.primary;

  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1}>
      <Text color={promptColor} bold>
        {'> '}
      </Text>
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} placeholder={placeholder} />
    </Box>
  );
};
