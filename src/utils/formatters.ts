/**
 * Text shared by the Ink UI and the headless console renderer
 */

import { INDICATOR_GLYPHS } from '../constants/config.js';
import { SessionCounters, StatusIndicator, StatusTick } from '../types/session.js';

export function indicatorGlyph(indicator: StatusIndicator): string {
  return INDICATOR_GLYPHS[indicator];
}

/**
 * `"* 5: "` while the stimulus is fresh, `"  5: "` afterwards
 */
export function formatStatusLine(tick: Pick<StatusTick, 'value' | 'indicator'>): string {
  return `${indicatorGlyph(tick.indicator)}${String(tick.value).padStart(2)}: `;
}

export function formatHistory(values: readonly number[]): string {
  return values.join(', ');
}

export function formatVerdict(correct: boolean, reset: boolean): string {
  const verdict = correct ? 'correct!' : 'wrong!';
  return reset ? `${verdict} starting over.` : verdict;
}

export function formatMiss(answer: number | null): string {
  return answer === null ? 'missed.' : `missed! it was ${answer}-back.`;
}

export function formatSummary(counters: SessionCounters): string {
  return `correct: ${counters.correct}, incorrect: ${counters.incorrect}, missed: ${counters.missed}`;
}

export function formatSeconds(ms: number): string {
  return `${(Math.max(0, ms) / 1000).toFixed(1)}s`;
}
