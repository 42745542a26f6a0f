/**
 * Single-line guess entry. Submitted text goes to the session's line queue
 * untouched; parsing and validation belong to the timed acquisition.
 */

import React, { useCallback, useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import Spinner from 'ink-spinner';
import { themeManager } from '../themes/theme-manager.js';

interface GuessInputProps {
  onSubmit: (line: string) => void;
  paused?: boolean;
}

export const GuessInput: React.FC<GuessInputProps> = ({ onSubmit, paused = false }) => {
  const theme = themeManager.getCurrentTheme();
  const [value, setValue] = useState('');

  const handleSubmit = useCallback((line: string) => {
    onSubmit(line);
    setValue('');
  }, [onSubmit]);

  return (
    <Box>
      {paused ? (
        <Text color={theme.muted}>
          <Spinner type="dots" /> next stimulus
        </Text>
      ) : (
        <>
          <Text color={theme.muted}>steps back › </Text>
          <TextInput
            value={value}
            onChange={setValue}
            onSubmit={handleSubmit}
            placeholder="n"
          />
        </>
      )}
    </Box>
  );
};
