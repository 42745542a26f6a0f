import { describe, it, expect } from '@jest/globals';
import { acquireGuess, parseGuess, resolveTimeoutMs, Clock } from '../../../src/services/TimedInput.js';
import { LineSource, WaitOutcome } from '../../../src/services/LineSource.js';
import { DrillError, ErrorCategory } from '../../../src/utils/errorHandler.js';
import { StatusTick } from '../../../src/types/session.js';

/**
 * Scripted source over a manual clock: each wait consumes the next scripted
 * outcome, advancing the clock by the full slice when it is idle
 */
class ScriptedSource implements LineSource {
  public waits: number[] = [];

  constructor(
    private readonly clock: ManualClock,
    private readonly script: Array<WaitOutcome | Error> = []
  ) {}

  async waitForLine(timeoutMs: number): Promise<WaitOutcome> {
    this.waits.push(timeoutMs);
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    if (!next || next.kind === 'idle') {
      this.clock.advance(timeoutMs);
      return { kind: 'idle' };
    }
    this.clock.advance(1);
    return next;
  }
}

class ManualClock implements Clock {
  private current = 1000;
  now(): number {
    return this.current;
  }
  advance(ms: number): void {
    this.current += ms;
  }
}

describe('parseGuess', () => {
  it('reads integers with surrounding whitespace', () => {
    expect(parseGuess('7')).toBe(7);
    expect(parseGuess('  3  ')).toBe(3);
    expect(parseGuess('-2')).toBe(-2);
    expect(parseGuess('+4')).toBe(4);
  });

  it('keeps the leading digits and drops trailing text', () => {
    expect(parseGuess('5 back')).toBe(5);
  });

  it('returns null for lines without a leading number', () => {
    expect(parseGuess('')).toBeNull();
    expect(parseGuess('abc')).toBeNull();
    expect(parseGuess('back 5')).toBeNull();
  });
});

describe('resolveTimeoutMs', () => {
  it('defaults to three seconds', () => {
    expect(resolveTimeoutMs()).toBe(3000);
  });

  it('uses the override', () => {
    expect(resolveTimeoutMs(2)).toBe(2000);
  });

  it('rejects non-positive and fractional overrides', () => {
    expect(() => resolveTimeoutMs(0)).toThrow(DrillError);
    expect(() => resolveTimeoutMs(1.5)).toThrow(DrillError);
  });
});

describe('acquireGuess', () => {
  it('times out after the deadline when no input arrives', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock);

    const result = await acquireGuess(source, 5, { timeoutSeconds: 2, sliceMs: 50, clock });

    expect(result).toEqual({ state: 'timed_out' });
    expect(clock.now() - 1000).toBe(2000);
    expect(source.waits).toHaveLength(40);
    expect(source.waits.every(ms => ms === 50)).toBe(true);
  });

  it('returns the guess from the first slice without waiting out the window', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock, [{ kind: 'line', text: '7\n' }]);

    const result = await acquireGuess(source, 5, { timeoutSeconds: 2, clock });

    expect(result).toEqual({ state: 'received', guess: 7 });
    expect(source.waits).toHaveLength(1);
  });

  it('ignores non-numeric lines and keeps the original deadline', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock, [
      { kind: 'idle' },
      { kind: 'line', text: 'what?' },
      { kind: 'idle' },
      { kind: 'line', text: '3' },
    ]);

    const result = await acquireGuess(source, 9, { timeoutSeconds: 1, sliceMs: 100, clock });

    expect(result).toEqual({ state: 'received', guess: 3 });
    // 100 + 1 + 100 elapsed before the last wait
    expect(source.waits).toEqual([100, 100, 100, 100]);
    expect(clock.now() - 1000).toBe(202);
  });

  it('retries the slice after an interruption', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock, [
      { kind: 'interrupted' },
      { kind: 'line', text: '2' },
    ]);

    const result = await acquireGuess(source, 4, { timeoutSeconds: 1, clock });
    expect(result).toEqual({ state: 'received', guess: 2 });
  });

  it('shortens the final slice to the remaining time', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock);

    await acquireGuess(source, 1, { timeoutSeconds: 1, sliceMs: 300, clock });

    expect(source.waits).toEqual([300, 300, 300, 100]);
  });

  it('pings for the configured share of the window, then goes steady', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock);
    const ticks: StatusTick[] = [];

    await acquireGuess(source, 6, {
      timeoutSeconds: 1,
      sliceMs: 50,
      pingFraction: 0.1,
      clock,
      onTick: tick => ticks.push(tick),
    });

    expect(ticks).toHaveLength(20);
    expect(ticks.slice(0, 2).map(t => t.indicator)).toEqual(['ping', 'ping']);
    expect(ticks.slice(2).every(t => t.indicator === 'steady')).toBe(true);
    expect(ticks[0]).toEqual({ value: 6, indicator: 'ping', elapsedMs: 0, remainingMs: 1000 });
    expect(ticks[19]).toEqual({ value: 6, indicator: 'steady', elapsedMs: 950, remainingMs: 50 });
  });

  it('turns a failed wait into a fatal io error', async () => {
    const clock = new ManualClock();
    const source = new ScriptedSource(clock, [new Error('EIO: read failed')]);

    const failure = await acquireGuess(source, 1, { clock }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(DrillError);
    if (failure instanceof DrillError) {
      expect(failure.category).toBe(ErrorCategory.IO);
      expect(failure.recoverable).toBe(false);
      expect(failure.cause).toBeInstanceOf(Error);
    }
  });
});
