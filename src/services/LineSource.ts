/**
 * Line-oriented input for guesses.
 *
 * A LineSource answers one question per polling slice: did a line arrive
 * within `timeoutMs`? The Ink UI pushes submitted text into a LineQueue; the
 * headless mode feeds the same queue from a readable stream via readline.
 */

import readline from 'node:readline';
import { ContractViolationError, toError } from '../utils/errorHandler.js';
import { componentLoggers } from './LoggingService.js';

const log = componentLoggers.lineSource;

export type WaitOutcome =
  | { kind: 'line'; text: string }
  | { kind: 'idle' }
  | { kind: 'interrupted' };

export interface LineSource {
  /**
   * Resolve with the next line, `idle` once `timeoutMs` elapses without one,
   * or `interrupted` after a benign interruption. Rejects on unrecoverable
   * input failure.
   */
  waitForLine(timeoutMs: number): Promise<WaitOutcome>;
}

const IDLE: WaitOutcome = { kind: 'idle' };

export class LineQueue implements LineSource {
  private lines: string[] = [];
  private interrupts = 0;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  push(line: string): void {
    this.lines.push(line.replace(/\r?\n$/, ''));
    this.notify();
  }

  interrupt(): void {
    this.interrupts += 1;
    this.notify();
  }

  fail(error: Error): void {
    this.failure = error;
    this.notify();
  }

  pending(): number {
    return this.lines.length;
  }

  waitForLine(timeoutMs: number): Promise<WaitOutcome> {
    const ready = this.take();
    if (ready) return Promise.resolve(ready);
    if (this.failure) return Promise.reject(this.failure);
    if (this.wake) {
      return Promise.reject(new ContractViolationError('LineQueue allows one pending wait at a time'));
    }

    return new Promise<WaitOutcome>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve(IDLE);
      }, Math.max(0, timeoutMs));

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        const next = this.take();
        if (next) {
          resolve(next);
        } else if (this.failure) {
          reject(this.failure);
        } else {
          resolve(IDLE);
        }
      };
    });
  }

  private take(): WaitOutcome | null {
    if (this.interrupts > 0) {
      this.interrupts -= 1;
      return { kind: 'interrupted' };
    }
    const text = this.lines.shift();
    return text === undefined ? null : { kind: 'line', text };
  }

  private notify(): void {
    if (this.wake) this.wake();
  }
}

/**
 * Feed a queue from a readable stream, one entry per line.
 * Returns a function that detaches the stream again.
 */
export function attachReadable(queue: LineQueue, input: NodeJS.ReadableStream): () => void {
  const rl = readline.createInterface({ input, terminal: false });

  rl.on('line', (line: string) => queue.push(line));
  rl.on('close', () => log.debug('input stream closed'));

  // resumed after a job-control stop: the pending slice simply retries.
  // readline only reports SIGCONT in terminal mode, so listen on the process.
  const onContinue = () => {
    log.debug('resumed after SIGCONT');
    queue.interrupt();
  };
  process.on('SIGCONT', onContinue);

  // readline re-emits input errors on the interface; either path fails the queue once
  let failed = false;
  const onError = (error: unknown) => {
    if (failed) return;
    failed = true;
    log.error('input stream failed', error);
    queue.fail(toError(error));
  };
  rl.on('error', onError);
  input.on('error', onError);

  return () => {
    process.removeListener('SIGCONT', onContinue);
    input.removeListener('error', onError);
    rl.close();
  };
}
