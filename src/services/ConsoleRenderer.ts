/**
 * Plain-text renderer for non-interactive runs (pipes, scripts, dumb terminals).
 * The status line is rewritten in place with a carriage return.
 */

import { SessionEvent } from '../types/session.js';
import {
  formatHistory,
  formatMiss,
  formatStatusLine,
  formatSummary,
  formatVerdict,
} from '../utils/formatters.js';
import { SessionEvents } from './SessionEvents.js';

export interface TextSink {
  write(chunk: string): unknown;
}

export class ConsoleRenderer {
  private lastStatus = '';

  constructor(private readonly out: TextSink) {}

  attach(events: SessionEvents): () => void {
    return events.subscribe(event => this.render(event));
  }

  render(event: SessionEvent): void {
    switch (event.type) {
      case 'stimulus':
        this.lastStatus = '';
        break;

      case 'tick': {
        const line = formatStatusLine(event.tick);
        // only redraw when the visible text changes
        if (line !== this.lastStatus) {
          this.out.write(`\r${line}`);
          this.lastStatus = line;
        }
        break;
      }

      case 'graded':
        this.out.write('\n');
        if (event.history) {
          this.out.write(`${formatHistory(event.history)}\n`);
        }
        this.out.write(`${formatVerdict(event.correct, event.reset)}\n`);
        break;

      case 'timeout':
        if (event.missed) {
          this.out.write(`\n${formatMiss(event.answer)}\n`);
        }
        break;

      case 'finished':
        this.out.write(`\n${formatSummary(event.counters)}\n`);
        break;
    }
  }
}
