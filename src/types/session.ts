/**
 * Session-wide type definitions shared by the loop and both renderers
 */

import { PROVIDER_KINDS } from '../constants/config.js';

export type ProviderKind = typeof PROVIDER_KINDS[number];

export interface SessionCounters {
  correct: number;
  incorrect: number;
  missed: number;
}

/**
 * 'ping' flashes while a stimulus is fresh, 'steady' for the rest of the window
 */
export type StatusIndicator = 'ping' | 'steady';

export interface StatusTick {
  value: number;
  indicator: StatusIndicator;
  elapsedMs: number;
  remainingMs: number;
}

export interface SessionSettings {
  /** Guess window override in whole seconds */
  timeoutSeconds?: number;
  /** Attach buffer contents to graded results */
  showBuffer: boolean;
  /** Clear the history after every graded guess */
  resetOnGuess: boolean;
  /** Pause after a graded guess before the next stimulus */
  pauseMs: number;
}

export type SessionEvent =
  | { type: 'stimulus'; cycle: number; value: number }
  | { type: 'tick'; cycle: number; tick: StatusTick }
  | {
      type: 'graded';
      cycle: number;
      guess: number;
      correct: boolean;
      history: number[] | null;
      reset: boolean;
      counters: SessionCounters;
    }
  | { type: 'timeout'; cycle: number; missed: boolean; answer: number | null; counters: SessionCounters }
  | { type: 'finished'; counters: SessionCounters };

export type SessionListener = (event: SessionEvent) => void;
