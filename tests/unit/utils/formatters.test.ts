import { describe, it, expect } from '@jest/globals';
import {
  formatHistory,
  formatMiss,
  formatSeconds,
  formatStatusLine,
  formatSummary,
  formatVerdict,
  indicatorGlyph,
} from '../../../src/utils/formatters.js';

describe('formatters', () => {
  it('pads the stimulus to two columns behind the indicator', () => {
    expect(formatStatusLine({ value: 5, indicator: 'ping' })).toBe('* 5: ');
    expect(formatStatusLine({ value: 5, indicator: 'steady' })).toBe('  5: ');
    expect(formatStatusLine({ value: 10, indicator: 'ping' })).toBe('*10: ');
  });

  it('maps indicators to glyphs', () => {
    expect(indicatorGlyph('ping')).toBe('*');
    expect(indicatorGlyph('steady')).toBe(' ');
  });

  it('lists the history oldest first', () => {
    expect(formatHistory([3, 4, 3])).toBe('3, 4, 3');
    expect(formatHistory([])).toBe('');
  });

  it('words the verdict', () => {
    expect(formatVerdict(true, true)).toBe('correct! starting over.');
    expect(formatVerdict(false, true)).toBe('wrong! starting over.');
    expect(formatVerdict(true, false)).toBe('correct!');
    expect(formatVerdict(false, false)).toBe('wrong!');
  });

  it('names the distance of a miss when known', () => {
    expect(formatMiss(2)).toBe('missed! it was 2-back.');
    expect(formatMiss(null)).toBe('missed.');
  });

  it('summarises the counters', () => {
    expect(formatSummary({ correct: 3, incorrect: 1, missed: 2 })).toBe('correct: 3, incorrect: 1, missed: 2');
  });

  it('shows seconds with one decimal and never negative', () => {
    expect(formatSeconds(2960)).toBe('3.0s');
    expect(formatSeconds(1240)).toBe('1.2s');
    expect(formatSeconds(-5)).toBe('0.0s');
  });
});
