import React from 'react';
import { describe, it, expect } from '@jest/globals';
import { renderWithProviders } from '../test-utils.js';
import { ResultLine } from '../../../src/components/ResultLine.js';

describe('ResultLine', () => {
  it('renders nothing before any result', () => {
    const { lastFrame } = renderWithProviders(<ResultLine result={null} />);
    expect(lastFrame()).toBe('');
  });

  it('shows the graded history and verdict', () => {
    const { lastFrame } = renderWithProviders(
      <ResultLine result={{ kind: 'graded', guess: 2, correct: true, history: [3, 4, 3], reset: true }} />
    );
    expect(lastFrame()).toContain('3, 4, 3');
    expect(lastFrame()).toContain('correct! starting over.');
  });

  it('shows a wrong verdict without history', () => {
    const { lastFrame } = renderWithProviders(
      <ResultLine result={{ kind: 'graded', guess: 6, correct: false, history: null, reset: false }} />
    );
    expect(lastFrame()).toContain('wrong!');
    expect(lastFrame()).not.toContain('starting over');
  });

  it('names the distance of a miss', () => {
    const { lastFrame } = renderWithProviders(<ResultLine result={{ kind: 'missed', answer: 3 }} />);
    expect(lastFrame()).toContain('missed! it was 3-back.');
  });
});
