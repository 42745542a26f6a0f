/**
 * Folds session events into render state for the Ink UI
 */

import { useLayoutEffect, useState } from 'react';
import { SessionEvents } from '../services/SessionEvents.js';
import { SessionCounters, SessionEvent, StatusIndicator } from '../types/session.js';

export type LastResult =
  | { kind: 'graded'; guess: number; correct: boolean; history: number[] | null; reset: boolean }
  | { kind: 'missed'; answer: number | null };

export type SessionPhase = 'starting' | 'polling' | 'paused' | 'finished';

export interface SessionViewState {
  phase: SessionPhase;
  cycle: number;
  value: number | null;
  indicator: StatusIndicator;
  remainingMs: number;
  lastResult: LastResult | null;
  counters: SessionCounters;
}

export const initialSessionViewState: SessionViewState = {
  phase: 'starting',
  cycle: 0,
  value: null,
  indicator: 'steady',
  remainingMs: 0,
  lastResult: null,
  counters: { correct: 0, incorrect: 0, missed: 0 },
};

export function reduceSessionEvent(state: SessionViewState, event: SessionEvent): SessionViewState {
  switch (event.type) {
    case 'stimulus':
      return { ...state, phase: 'polling', cycle: event.cycle, value: event.value, indicator: 'ping' };
    case 'tick':
      return {
        ...state,
        value: event.tick.value,
        indicator: event.tick.indicator,
        remainingMs: event.tick.remainingMs,
      };
    case 'graded':
      return {
        ...state,
        phase: 'paused',
        remainingMs: 0,
        counters: event.counters,
        lastResult: {
          kind: 'graded',
          guess: event.guess,
          correct: event.correct,
          history: event.history,
          reset: event.reset,
        },
      };
    case 'timeout':
      return {
        ...state,
        remainingMs: 0,
        counters: event.counters,
        // a timeout with nothing owed leaves the previous result on screen
        lastResult: event.missed ? { kind: 'missed', answer: event.answer } : state.lastResult,
      };
    case 'finished':
      return { ...state, phase: 'finished', counters: event.counters };
  }
}

export function useSessionState(events: SessionEvents): SessionViewState {
  const [state, setState] = useState<SessionViewState>(initialSessionViewState);

  // subscribe during commit: the session emits its first stimulus as soon as render() returns
  useLayoutEffect(() => {
    return events.subscribe(event => {
      setState(prev => reduceSessionEvent(prev, event));
    });
  }, [events]);

  return state;
}
