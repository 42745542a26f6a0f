/**
 * n-back grading over the stimulus history.
 * Position 0 is the newest value; position k is the value seen k steps earlier.
 */

import { HistoryBuffer } from './HistoryBuffer.js';

/**
 * Whether the value `stepsBack` positions before the newest equals the newest.
 * Guesses outside 1..count-1 never score.
 */
export function isGuessCorrect<T>(history: HistoryBuffer<T>, stepsBack: number): boolean {
  if (!Number.isInteger(stepsBack) || stepsBack <= 0 || stepsBack >= history.getCount()) {
    return false;
  }

  let position = 0;
  let newest: T | undefined;
  for (const value of history.iterateReverse()) {
    if (position === 0) {
      newest = value;
    } else if (position === stepsBack) {
      return value === newest;
    }
    position++;
  }
  return false;
}

/**
 * Smallest k >= 1 whose value repeats the newest one, or null.
 */
export function findNBack<T>(history: HistoryBuffer<T>): number | null {
  let position = 0;
  let newest: T | undefined;
  for (const value of history.iterateReverse()) {
    if (position === 0) {
      newest = value;
    } else if (value === newest) {
      return position;
    }
    position++;
  }
  return null;
}

/**
 * Whether any earlier value in the history repeats the newest one.
 * An unanswered stimulus only counts as a miss when this holds.
 */
export function hasAnyNBack<T>(history: HistoryBuffer<T>): boolean {
  return findNBack(history) !== null;
}
