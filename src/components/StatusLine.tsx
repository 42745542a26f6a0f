/**
 * Stimulus line: ping indicator, current value, time left in the guess window
 */

import React from 'react';
import { Box, Text } from 'ink';
import { themeManager } from '../themes/theme-manager.js';
import { StatusIndicator } from '../types/session.js';
import { formatSeconds, formatStatusLine } from '../utils/formatters.js';

interface StatusLineProps {
  value: number | null;
  indicator: StatusIndicator;
  remainingMs: number;
}

export const StatusLine: React.FC<StatusLineProps> = ({
  value,
  indicator,
  remainingMs
}) => {
  const theme = themeManager.getCurrentTheme();

  if (value === null) {
    return <Text color={theme.muted}>waiting for the first stimulus...</Text>;
  }

  return (
    <Box>
      <Text bold color={indicator === 'ping' ? theme.accent : theme.primary}>
        {formatStatusLine({ value, indicator })}
      </Text>
      {remainingMs > 0 && (
        <Text color={theme.muted}>[{formatSeconds(remainingMs)}]</Text>
      )}
    </Box>
  );
};
