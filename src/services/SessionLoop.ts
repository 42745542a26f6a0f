/**
 * Session loop: provider -> history -> timed guess -> grading.
 *
 * Cycles run strictly one after another; the loop owns the history, the
 * counters and the provider, and renderers only see event payloads.
 */

import { LIMITS, TIMING } from '../constants/config.js';
import { HistoryBuffer } from '../utils/HistoryBuffer.js';
import { findNBack, hasAnyNBack, isGuessCorrect } from '../utils/matchEvaluator.js';
import { SessionCounters, SessionSettings } from '../types/session.js';
import { LineSource } from './LineSource.js';
import { componentLoggers } from './LoggingService.js';
import { SessionEvents } from './SessionEvents.js';
import { StimulusProvider, hasNext, nextValue } from './StimulusProvider.js';
import { Clock, TimedInputOptions, acquireGuess } from './TimedInput.js';

const log = componentLoggers.session;

export const defaultSessionSettings: SessionSettings = {
  showBuffer: true,
  resetOnGuess: true,
  pauseMs: TIMING.PAUSE_AFTER_GUESS_MS,
};

export interface SessionOptions {
  provider: StimulusProvider;
  input: LineSource;
  settings?: Partial<SessionSettings>;
  history?: HistoryBuffer<number>;
  events?: SessionEvents;
  clock?: Clock;
  sliceMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export async function runSession(options: SessionOptions): Promise<SessionCounters> {
  const settings: SessionSettings = { ...defaultSessionSettings, ...options.settings };
  const history = options.history ?? new HistoryBuffer<number>(LIMITS.HISTORY_CAPACITY);
  const events = options.events ?? new SessionEvents();
  const pause = options.sleep ?? sleep;
  const counters: SessionCounters = { correct: 0, incorrect: 0, missed: 0 };

  let cycle = 0;
  while (hasNext(options.provider)) {
    cycle += 1;
    const value = nextValue(options.provider);

    if (history.isFull()) {
      history.dequeue();
    }
    history.enqueue(value);
    events.emit({ type: 'stimulus', cycle, value });

    const inputOptions: TimedInputOptions = {
      timeoutSeconds: settings.timeoutSeconds,
      sliceMs: options.sliceMs,
      clock: options.clock,
      onTick: tick => events.emit({ type: 'tick', cycle, tick }),
    };
    const result = await acquireGuess(options.input, value, inputOptions);

    if (result.state === 'received') {
      const snapshot = settings.showBuffer ? history.toArray() : null;
      const correct = isGuessCorrect(history, result.guess);
      if (correct) {
        counters.correct += 1;
      } else {
        counters.incorrect += 1;
      }
      if (settings.resetOnGuess) {
        history.clear();
      }

      log.debug(`cycle ${cycle}: guessed ${result.guess} for ${value}, ${correct ? 'correct' : 'wrong'}`);
      events.emit({
        type: 'graded',
        cycle,
        guess: result.guess,
        correct,
        history: snapshot,
        reset: settings.resetOnGuess,
        counters: { ...counters },
      });

      if (settings.pauseMs > 0) {
        await pause(settings.pauseMs);
      }
    } else {
      // a match left unanswered is a miss; no match means nothing was owed
      const answer = findNBack(history);
      const missed = hasAnyNBack(history);
      if (missed) {
        counters.missed += 1;
      }
      log.debug(`cycle ${cycle}: no guess for ${value}${missed ? `, missed ${answer}-back` : ''}`);
      events.emit({ type: 'timeout', cycle, missed, answer, counters: { ...counters } });
    }
  }

  log.info(`session finished after ${cycle} stimuli`, counters);
  events.emit({ type: 'finished', counters: { ...counters } });
  return counters;
}
