/**
 * Fixed-capacity history of recent stimuli.
 *
 * A queue, not an overwriting ring: enqueue into a full buffer and dequeue from
 * an empty one are contract violations, so the owner decides what to evict.
 * Both traversals hide physical slot positions; callers only see values in
 * logical order.
 */

import { ContractViolationError } from './errorHandler.js';

type Occupancy =
  | { kind: 'empty' }
  | { kind: 'occupied'; head: number; tail: number };

interface Slot<T> {
  value: T;
}

const EMPTY: Occupancy = { kind: 'empty' };

/**
 * Lazy view over a buffer. Every `for...of` restarts from the first logical
 * position, and the walk ends early if the buffer shrinks underneath it.
 */
export class HistoryView<T> implements Iterable<T> {
  constructor(private readonly walk: () => Iterator<T>) {}

  [Symbol.iterator](): Iterator<T> {
    return this.walk();
  }

  toArray(): T[] {
    return Array.from(this);
  }
}

export class HistoryBuffer<T> {
  private readonly slots: Array<Slot<T> | undefined>;
  private occupancy: Occupancy = EMPTY;
  private count = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ContractViolationError(`HistoryBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Slot<T> | undefined>(capacity);
  }

  getCount(): number {
    return this.count;
  }

  getCapacity(): number {
    return this.capacity;
  }

  isEmpty(): boolean {
    return this.occupancy.kind === 'empty';
  }

  isFull(): boolean {
    const state = this.occupancy;
    return state.kind === 'occupied' && (state.head + 1) % this.capacity === state.tail;
  }

  enqueue(value: T): void {
    if (this.count >= this.capacity) {
      throw new ContractViolationError('enqueue on a full HistoryBuffer; dequeue first', {
        component: 'HistoryBuffer',
        metadata: { capacity: this.capacity },
      });
    }

    const state = this.occupancy;
    if (state.kind === 'empty') {
      this.occupancy = { kind: 'occupied', head: 0, tail: 0 };
      this.slots[0] = { value };
    } else {
      const head = (state.head + 1) % this.capacity;
      this.occupancy = { kind: 'occupied', head, tail: state.tail };
      this.slots[head] = { value };
    }
    this.count += 1;
  }

  dequeue(): T {
    const state = this.occupancy;
    if (state.kind === 'empty') {
      throw new ContractViolationError('dequeue on an empty HistoryBuffer', {
        component: 'HistoryBuffer',
      });
    }

    const value = this.read(state.tail);
    if (state.tail === state.head) {
      // last element out: back to the canonical empty state
      this.clear();
    } else {
      this.occupancy = { kind: 'occupied', head: state.head, tail: (state.tail + 1) % this.capacity };
      this.count -= 1;
    }
    return value;
  }

  clear(): void {
    this.occupancy = EMPTY;
    this.count = 0;
  }

  /**
   * Oldest to newest
   */
  iterate(): HistoryView<T> {
    return new HistoryView(() => this.walkForward());
  }

  /**
   * Newest to oldest
   */
  iterateReverse(): HistoryView<T> {
    return new HistoryView(() => this.walkReverse());
  }

  toArray(): T[] {
    return this.iterate().toArray();
  }

  private *walkForward(): Generator<T, void, undefined> {
    for (let offset = 0; offset < this.count; offset++) {
      const state = this.occupancy;
      if (state.kind === 'empty') return;
      yield this.read((state.tail + offset) % this.capacity);
    }
  }

  private *walkReverse(): Generator<T, void, undefined> {
    for (let offset = 0; offset < this.count; offset++) {
      const state = this.occupancy;
      if (state.kind === 'empty') return;
      // once wrapped, lift head past tail so head - offset never goes negative
      const virtualHead = state.head < state.tail ? state.head + this.capacity : state.head;
      yield this.read((virtualHead - offset) % this.capacity);
    }
  }

  private read(index: number): T {
    const slot = this.slots[index];
    if (!slot) {
      throw new ContractViolationError(`HistoryBuffer slot ${index} read before it was written`);
    }
    return slot.value;
  }
}
