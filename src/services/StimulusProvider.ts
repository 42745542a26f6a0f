/**
 * Stimulus providers as a closed union.
 *
 * deck   - 1..10 four times over, shuffled once, drawn without replacement
 * random - unbounded, uniform in 1..10
 * fixed  - the deterministic sequence used for smoke runs
 */

import { STIMULUS } from '../constants/config.js';
import { ContractViolationError } from '../utils/errorHandler.js';
import { ProviderKind } from '../types/session.js';

export type RandomSource = () => number;

export type StimulusProvider =
  | { kind: 'deck'; cards: number[]; next: number }
  | { kind: 'random'; random: RandomSource }
  | { kind: 'fixed'; sequence: readonly number[]; next: number };

export interface ProviderOptions {
  random?: RandomSource;
  /** Replaces the built-in fixed sequence */
  sequence?: readonly number[];
}

/**
 * Uniform integer in [min, max] from a [0, 1) source
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Fisher-Yates, in place
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

export function buildDeck(): number[] {
  const cards: number[] = [];
  for (let suit = 0; suit < STIMULUS.DECK_SUITS; suit++) {
    for (let value: number = STIMULUS.MIN_VALUE; value <= STIMULUS.MAX_VALUE; value++) {
      cards.push(value);
    }
  }
  return cards;
}

export function createStimulusProvider(kind: ProviderKind, options: ProviderOptions = {}): StimulusProvider {
  const random = options.random ?? Math.random;
  switch (kind) {
    case 'deck':
      return { kind, cards: shuffleInPlace(buildDeck(), random), next: 0 };
    case 'random':
      return { kind, random };
    case 'fixed':
      return { kind, sequence: options.sequence ?? STIMULUS.FIXED_SEQUENCE, next: 0 };
  }
}

export function hasNext(provider: StimulusProvider): boolean {
  switch (provider.kind) {
    case 'deck':
      return provider.next < provider.cards.length;
    case 'random':
      return true;
    case 'fixed':
      return provider.next < provider.sequence.length;
  }
}

export function nextValue(provider: StimulusProvider): number {
  switch (provider.kind) {
    case 'deck':
      return take(provider.cards, provider);
    case 'random':
      return randomInt(provider.random, STIMULUS.MIN_VALUE, STIMULUS.MAX_VALUE);
    case 'fixed':
      return take(provider.sequence, provider);
  }
}
