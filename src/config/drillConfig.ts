/**
 * Drill configuration: defaults, environment overrides and CLI flags merged
 * into one validated object before the session starts.
 */

import { ENV_VARS, LIMITS, PROVIDER_KINDS, TIMING } from '../constants/config.js';
import { Errors } from '../utils/errorHandler.js';
import { ProviderKind, SessionSettings } from '../types/session.js';

export interface DrillConfig extends SessionSettings {
  provider: ProviderKind;
  headless: boolean;
  debug: boolean;
}

/**
 * Raw CLI flags as they come off the parser; every field optional
 */
export interface DrillFlags {
  seconds?: number;
  provider?: string;
  test?: boolean;
  showBuffer?: boolean;
  reset?: boolean;
  pause?: number;
  headless?: boolean;
  debug?: boolean;
}

export const defaultDrillConfig: DrillConfig = {
  provider: 'random',
  timeoutSeconds: undefined,
  showBuffer: true,
  resetOnGuess: true,
  pauseMs: TIMING.PAUSE_AFTER_GUESS_MS,
  headless: false,
  debug: false,
};

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some(kind => kind === value);
}

function parseProvider(raw: string, source: string): ProviderKind {
  const normalized = raw.trim().toLowerCase();
  if (!isProviderKind(normalized)) {
    throw Errors.configuration(
      `${source}: unknown provider "${raw}" (expected one of ${PROVIDER_KINDS.join(', ')})`
    );
  }
  return normalized;
}

function parseSeconds(raw: number | string, source: string): number {
  const seconds = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(seconds) || seconds <= 0 || seconds > LIMITS.MAX_TIMEOUT_SEC) {
    throw Errors.configuration(
      `${source}: guess timeout must be a whole number of seconds between 1 and ${LIMITS.MAX_TIMEOUT_SEC}, got "${raw}"`
    );
  }
  return seconds;
}

function parsePause(raw: number, source: string): number {
  if (!Number.isInteger(raw) || raw < 0 || raw > LIMITS.MAX_PAUSE_MS) {
    throw Errors.configuration(
      `${source}: pause must be a whole number of milliseconds between 0 and ${LIMITS.MAX_PAUSE_MS}, got "${raw}"`
    );
  }
  return raw;
}

/**
 * Precedence: flags, then environment, then defaults
 */
export function resolveDrillConfig(
  flags: DrillFlags = {},
  env: NodeJS.ProcessEnv = process.env
): DrillConfig {
  const config: DrillConfig = { ...defaultDrillConfig };

  const envSeconds = env[ENV_VARS.SECONDS];
  if (envSeconds !== undefined && envSeconds.trim() !== '') {
    config.timeoutSeconds = parseSeconds(envSeconds, ENV_VARS.SECONDS);
  }
  const envProvider = env[ENV_VARS.PROVIDER];
  if (envProvider !== undefined && envProvider.trim() !== '') {
    config.provider = parseProvider(envProvider, ENV_VARS.PROVIDER);
  }
  if (env[ENV_VARS.DEBUG] === 'true') {
    config.debug = true;
  }

  if (flags.seconds !== undefined) {
    config.timeoutSeconds = parseSeconds(flags.seconds, '--seconds');
  }
  if (flags.provider !== undefined) {
    config.provider = parseProvider(flags.provider, '--provider');
  }
  if (flags.test) {
    if (flags.provider !== undefined && config.provider !== 'fixed') {
      throw Errors.configuration('--test selects the fixed sequence and cannot be combined with another --provider');
    }
    config.provider = 'fixed';
  }
  if (flags.showBuffer !== undefined) config.showBuffer = flags.showBuffer;
  if (flags.reset !== undefined) config.resetOnGuess = flags.reset;
  if (flags.pause !== undefined) config.pauseMs = parsePause(flags.pause, '--pause');
  if (flags.headless !== undefined) config.headless = flags.headless;
  if (flags.debug) config.debug = true;

  return config;
}

export function toSessionSettings(config: DrillConfig): SessionSettings {
  return {
    timeoutSeconds: config.timeoutSeconds,
    showBuffer: config.showBuffer,
    resetOnGuess: config.resetOnGuess,
    pauseMs: config.pauseMs,
  };
}
