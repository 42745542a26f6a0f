import React from 'react';
import { Box, Text } from 'ink';
import { themeManager } from '../themes/theme-manager.js';
import { ProviderKind } from '../types/session.js';
import { TIMING } from '../constants/config.js';

interface HeaderProps {
  provider: ProviderKind;
  timeoutSeconds?: number;
  resetOnGuess: boolean;
}

export const Header: React.FC<HeaderProps> = ({ provider, timeoutSeconds, resetOnGuess }) => {
  const theme = themeManager.getCurrentTheme();
  const seconds = timeoutSeconds ?? TIMING.DEFAULT_GUESS_TIMEOUT_SEC;

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold color={theme.primary}>n-back drill</Text>
      <Text color={theme.muted}>
        {provider} stimuli · {seconds}s per guess · {resetOnGuess ? 'history resets after a guess' : 'history kept across guesses'}
      </Text>
      <Text color={theme.muted}>type how many steps back the current value last appeared, then Enter</Text>
    </Box>
  );
};
