/**
 * Timed guess acquisition.
 *
 * Polls a LineSource in short slices until a numeric line arrives or the guess
 * window closes. Each slice first reports a status tick so the renderer can
 * redraw the stimulus line while the player is thinking.
 */

import { performance } from 'node:perf_hooks';
import { TIMING } from '../constants/config.js';
import { DrillError, Errors } from '../utils/errorHandler.js';
import { LineSource, WaitOutcome } from './LineSource.js';
import { componentLoggers } from './LoggingService.js';
import { StatusTick } from '../types/session.js';

const log = componentLoggers.timedInput;

export type AcquisitionState = 'polling' | 'received' | 'timed_out';

export type GuessResult =
  | { state: Extract<AcquisitionState, 'received'>; guess: number }
  | { state: Extract<AcquisitionState, 'timed_out'> };

export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

export interface TimedInputOptions {
  /** Whole seconds; falls back to TIMING.DEFAULT_GUESS_TIMEOUT_SEC */
  timeoutSeconds?: number;
  /** Upper bound of a single wait on the source */
  sliceMs?: number;
  /** Share of the window during which the indicator pings */
  pingFraction?: number;
  clock?: Clock;
  onTick?: (tick: StatusTick) => void;
}

/**
 * Read a guess the way a line-oriented terminal would: leading whitespace and
 * an optional sign, then digits. Anything after the digits is ignored.
 */
export function parseGuess(line: string): number | null {
  const match = /^\s*([+-]?\d+)/.exec(line);
  if (!match) return null;
  const value = Number.parseInt(match[1] ?? '', 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function resolveTimeoutMs(timeoutSeconds?: number): number {
  const seconds = timeoutSeconds ?? TIMING.DEFAULT_GUESS_TIMEOUT_SEC;
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw Errors.configuration(`guess timeout must be a positive whole number of seconds, got ${seconds}`);
  }
  return seconds * 1000;
}

export async function acquireGuess(
  source: LineSource,
  value: number,
  options: TimedInputOptions = {}
): Promise<GuessResult> {
  const clock = options.clock ?? monotonicClock;
  const sliceMs = options.sliceMs ?? TIMING.POLL_SLICE_MS;
  const pingFraction = options.pingFraction ?? TIMING.PING_FRACTION;
  const timeoutMs = resolveTimeoutMs(options.timeoutSeconds);

  if (sliceMs <= 0) {
    throw Errors.configuration(`poll slice must be positive, got ${sliceMs}`);
  }

  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  const pingUntil = startedAt + timeoutMs * pingFraction;

  // state: polling until a numeric line (received) or the deadline (timed_out)
  for (;;) {
    const now = clock.now();
    if (now >= deadline) {
      return { state: 'timed_out' };
    }

    options.onTick?.({
      value,
      indicator: now < pingUntil ? 'ping' : 'steady',
      elapsedMs: now - startedAt,
      remainingMs: deadline - now,
    });

    let outcome: WaitOutcome;
    try {
      outcome = await source.waitForLine(Math.min(sliceMs, deadline - now));
    } catch (error) {
      if (error instanceof DrillError) throw error;
      throw Errors.io('waiting for guess input failed', error, { component: 'TimedInput' });
    }

    switch (outcome.kind) {
      case 'line': {
        const guess = parseGuess(outcome.text);
        if (guess !== null) {
          return { state: 'received', guess };
        }
        log.debug(`ignoring non-numeric input ${JSON.stringify(outcome.text)}`);
        break;
      }
      case 'interrupted':
        log.debug('wait interrupted, retrying slice');
        break;
      case 'idle':
        break;
    }
  }
}
