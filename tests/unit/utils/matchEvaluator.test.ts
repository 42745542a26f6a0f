import { describe, it, expect } from '@jest/globals';
import { HistoryBuffer } from '../../../src/utils/HistoryBuffer.js';
import { findNBack, hasAnyNBack, isGuessCorrect } from '../../../src/utils/matchEvaluator.js';

const historyOf = (values: number[], capacity = 7) => {
  const buf = new HistoryBuffer<number>(capacity);
  values.forEach(v => buf.enqueue(v));
  return buf;
};

describe('isGuessCorrect', () => {
  const buf = historyOf([5, 6, 7, 8, 9, 4, 5]);

  it('accepts the step count of the matching value', () => {
    expect(isGuessCorrect(buf, 6)).toBe(true);
  });

  it('rejects a step count pointing at a different value', () => {
    // newest 5 against 8
    expect(isGuessCorrect(buf, 3)).toBe(false);
  });

  it('never scores a guess at or beyond the history length', () => {
    expect(isGuessCorrect(buf, 7)).toBe(false);
    expect(isGuessCorrect(buf, 100)).toBe(false);
    expect(isGuessCorrect(historyOf([3, 3]), 2)).toBe(false);
  });

  it('never scores zero, negative or fractional guesses', () => {
    const repeated = historyOf([4, 4, 4]);
    expect(isGuessCorrect(repeated, 0)).toBe(false);
    expect(isGuessCorrect(repeated, -1)).toBe(false);
    expect(isGuessCorrect(repeated, 1.5)).toBe(false);
    expect(isGuessCorrect(repeated, 1)).toBe(true);
  });

  it('tolerates empty and single-element histories', () => {
    expect(isGuessCorrect(historyOf([]), 1)).toBe(false);
    expect(isGuessCorrect(historyOf([9]), 1)).toBe(false);
  });

  it('grades against logical order after wrap-around', () => {
    const wrapped = historyOf([1, 2, 3], 3);
    wrapped.dequeue();
    wrapped.enqueue(2);
    // history is now 2, 3, 2
    expect(isGuessCorrect(wrapped, 2)).toBe(true);
    expect(isGuessCorrect(wrapped, 1)).toBe(false);
  });
});

describe('hasAnyNBack', () => {
  it('is false without repeats', () => {
    expect(hasAnyNBack(historyOf([1, 2, 3]))).toBe(false);
  });

  it('is true when an earlier value repeats the newest', () => {
    expect(hasAnyNBack(historyOf([3, 1, 3]))).toBe(true);
  });

  it('ignores repeats that do not involve the newest value', () => {
    expect(hasAnyNBack(historyOf([2, 2, 5]))).toBe(false);
  });

  it('is false for empty and single-element histories', () => {
    expect(hasAnyNBack(historyOf([]))).toBe(false);
    expect(hasAnyNBack(historyOf([4]))).toBe(false);
  });
});

describe('findNBack', () => {
  it('returns the nearest matching step count', () => {
    expect(findNBack(historyOf([5, 1, 5, 2, 5]))).toBe(2);
    expect(findNBack(historyOf([3, 1, 3]))).toBe(2);
  });

  it('returns null when nothing matches', () => {
    expect(findNBack(historyOf([1, 2, 3]))).toBeNull();
  });
});
