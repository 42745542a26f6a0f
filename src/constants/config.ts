/**
 * Configuration constants - centralized defaults and limits
 */

// Timing (milliseconds unless noted)
export const TIMING = {
  POLL_SLICE_MS: 50,
  DEFAULT_GUESS_TIMEOUT_SEC: 3,
  PING_FRACTION: 0.05, // first 150ms of the default 3s window
  PAUSE_AFTER_GUESS_MS: 2000,
} as const;

// Limits
export const LIMITS = {
  HISTORY_CAPACITY: 7,
  MAX_TIMEOUT_SEC: 3600,
  MAX_PAUSE_MS: 60000,
} as const;

// Stimulus generation
export const STIMULUS = {
  MIN_VALUE: 1,
  MAX_VALUE: 10,
  DECK_SUITS: 4,
  FIXED_SEQUENCE: [5, 6, 7, 8, 9, 4, 5, 3],
} as const;

export const PROVIDER_KINDS = ['deck', 'random', 'fixed'] as const;

// Status indicator glyphs
export const INDICATOR_GLYPHS = {
  ping: '*',
  steady: ' ',
} as const;

export const ENV_VARS = {
  SECONDS: 'NBACK_SECONDS',
  PROVIDER: 'NBACK_PROVIDER',
  DEBUG: 'NBACK_DEBUG',
  THEME: 'NBACK_THEME',
  INK: 'NBACK_INK',
} as const;
