import React from 'react';
import { Box, Text } from 'ink';
import { themeManager } from '../themes/theme-manager.js';
import { SessionCounters } from '../types/session.js';

interface TallyBarProps {
  counters: SessionCounters;
  cycle: number;
}

export const TallyBar: React.FC<TallyBarProps> = ({ counters, cycle }) => {
  const theme = themeManager.getCurrentTheme();
  return (
    <Box>
      <Text color={theme.muted}>#{cycle} </Text>
      <Text color={theme.success}>✓ {counters.correct} </Text>
      <Text color={theme.danger}>✗ {counters.incorrect} </Text>
      <Text color={theme.warning}>… {counters.missed}</Text>
    </Box>
  );
};
