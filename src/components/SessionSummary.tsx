/**
 * Final tallies once the provider runs dry
 */

import React from 'react';
import { Box, Text } from 'ink';
import { themeManager } from '../themes/theme-manager.js';
import { SessionCounters } from '../types/session.js';
import { formatSummary } from '../utils/formatters.js';

interface SessionSummaryProps {
  counters: SessionCounters;
}

export const SessionSummary: React.FC<SessionSummaryProps> = ({ counters }) => {
  const theme = themeManager.getCurrentTheme();
  const graded = counters.correct + counters.incorrect;
  const accuracy = graded > 0 ? Math.round((counters.correct / graded) * 100) : null;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold color={theme.primary}>Session complete</Text>
      <Text color={theme.foreground}>{formatSummary(counters)}</Text>
      {accuracy !== null && (
        <Text color={theme.muted}>accuracy on answered: {accuracy}%</Text>
      )}
    </Box>
  );
};
