/**
 * Outcome of the most recent cycle that produced one
 */

import React from 'react';
import { Box, Text } from 'ink';
import { themeManager } from '../themes/theme-manager.js';
import { LastResult } from '../hooks/useSessionState.js';
import { formatHistory, formatMiss, formatVerdict } from '../utils/formatters.js';

interface ResultLineProps {
  result: LastResult | null;
}

export const ResultLine: React.FC<ResultLineProps> = ({ result }) => {
  if (!result) return null;
  const theme = themeManager.getCurrentTheme();

  if (result.kind === 'missed') {
    return <Text color={themeManager.getVerdictColor('missed')}>{formatMiss(result.answer)}</Text>;
  }

  return (
    <Box flexDirection="column">
      {result.history && (
        <Text color={theme.muted}>{formatHistory(result.history)}</Text>
      )}
      <Text color={themeManager.getVerdictColor(result.correct ? 'correct' : 'wrong')}>
        {formatVerdict(result.correct, result.reset)}
      </Text>
    </Box>
  );
};
