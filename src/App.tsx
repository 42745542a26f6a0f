/**
 * Root Ink component for interactive sessions.
 *
 * The session loop runs outside React; this tree only mirrors its events and
 * forwards submitted guesses into the shared line queue.
 */

import React, { useCallback, useEffect } from 'react';
import { Box, useApp } from 'ink';
import { DrillConfig } from './config/drillConfig.js';
import { LineQueue } from './services/LineSource.js';
import { SessionEvents } from './services/SessionEvents.js';
import { componentLoggers } from './services/LoggingService.js';
import { useSessionState } from './hooks/useSessionState.js';
import { Header } from './components/Header.js';
import { StatusLine } from './components/StatusLine.js';
import { GuessInput } from './components/GuessInput.js';
import { ResultLine } from './components/ResultLine.js';
import { TallyBar } from './components/TallyBar.js';
import { SessionSummary } from './components/SessionSummary.js';

interface AppProps {
  events: SessionEvents;
  queue: LineQueue;
  config: DrillConfig;
}

export const App: React.FC<AppProps> = ({ events, queue, config }) => {
  const { exit } = useApp();
  const state = useSessionState(events);

  const handleGuess = useCallback((line: string) => {
    componentLoggers.ui.debug(`submitted ${JSON.stringify(line)}`);
    queue.push(line);
  }, [queue]);

  useEffect(() => {
    if (state.phase === 'finished') {
      exit();
    }
  }, [state.phase, exit]);

  return (
    <Box flexDirection="column">
      <Header
        provider={config.provider}
        timeoutSeconds={config.timeoutSeconds}
        resetOnGuess={config.resetOnGuess}
      />
      {state.phase === 'finished' ? (
        <SessionSummary counters={state.counters} />
      ) : (
        <>
          <StatusLine value={state.value} indicator={state.indicator} remainingMs={state.remainingMs} />
          <GuessInput onSubmit={handleGuess} paused={state.phase === 'paused'} />
          <ResultLine result={state.lastResult} />
          <TallyBar counters={state.counters} cycle={state.cycle} />
        </>
      )}
    </Box>
  );
};
