import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConsoleRenderer, TextSink } from '../../../src/services/ConsoleRenderer.js';
import { SessionEvents } from '../../../src/services/SessionEvents.js';

class MemorySink implements TextSink {
  chunks: string[] = [];
  write(chunk: string): void {
    this.chunks.push(chunk);
  }
  text(): string {
    return this.chunks.join('');
  }
}

const counters = { correct: 0, incorrect: 0, missed: 0 };

describe('ConsoleRenderer', () => {
  let sink: MemorySink;
  let renderer: ConsoleRenderer;

  beforeEach(() => {
    sink = new MemorySink();
    renderer = new ConsoleRenderer(sink);
  });

  it('rewrites the status line only when its text changes', () => {
    renderer.render({ type: 'stimulus', cycle: 1, value: 7 });
    renderer.render({ type: 'tick', cycle: 1, tick: { value: 7, indicator: 'ping', elapsedMs: 0, remainingMs: 3000 } });
    renderer.render({ type: 'tick', cycle: 1, tick: { value: 7, indicator: 'ping', elapsedMs: 50, remainingMs: 2950 } });
    renderer.render({ type: 'tick', cycle: 1, tick: { value: 7, indicator: 'steady', elapsedMs: 150, remainingMs: 2850 } });

    expect(sink.chunks).toEqual(['\r* 7: ', '\r  7: ']);
  });

  it('redraws for a new stimulus even when the text repeats', () => {
    const tick = { value: 4, indicator: 'ping' as const, elapsedMs: 0, remainingMs: 3000 };
    renderer.render({ type: 'stimulus', cycle: 1, value: 4 });
    renderer.render({ type: 'tick', cycle: 1, tick });
    renderer.render({ type: 'stimulus', cycle: 2, value: 4 });
    renderer.render({ type: 'tick', cycle: 2, tick });

    expect(sink.chunks).toEqual(['\r* 4: ', '\r* 4: ']);
  });

  it('prints history and verdict after a graded guess', () => {
    renderer.render({
      type: 'graded',
      cycle: 3,
      guess: 2,
      correct: true,
      history: [3, 4, 3],
      reset: true,
      counters: { correct: 1, incorrect: 0, missed: 0 },
    });
    expect(sink.text()).toBe('\n3, 4, 3\ncorrect! starting over.\n');
  });

  it('skips the history line when none is attached', () => {
    renderer.render({ type: 'graded', cycle: 1, guess: 1, correct: false, history: null, reset: false, counters });
    expect(sink.text()).toBe('\nwrong!\n');
  });

  it('announces misses and stays quiet on empty timeouts', () => {
    renderer.render({ type: 'timeout', cycle: 1, missed: false, answer: null, counters });
    expect(sink.chunks).toEqual([]);

    renderer.render({ type: 'timeout', cycle: 2, missed: true, answer: 1, counters: { ...counters, missed: 1 } });
    expect(sink.text()).toBe('\nmissed! it was 1-back.\n');
  });

  it('prints the summary when attached to a finished session', () => {
    const events = new SessionEvents();
    const detach = renderer.attach(events);
    events.emit({ type: 'finished', counters: { correct: 2, incorrect: 1, missed: 0 } });
    detach();
    events.emit({ type: 'finished', counters });

    expect(sink.text()).toBe('\ncorrect: 2, incorrect: 1, missed: 0\n');
  });
});
