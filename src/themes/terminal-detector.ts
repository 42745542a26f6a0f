/**
 * Terminal Background Detection
 *
 * Detects whether the terminal is using a light or dark background
 * to automatically select the appropriate theme.
 */

import { ENV_VARS } from '../constants/config.js';

export type BackgroundType = 'dark' | 'light' | 'unknown';

/**
 * Methods used (in order of preference):
 * 1. Explicit NBACK_THEME preference
 * 2. COLORFGBG environment variable
 * 3. Fallback to unknown
 */
export function detectTerminalBackground(env: NodeJS.ProcessEnv = process.env): BackgroundType {
  const preference = env[ENV_VARS.THEME]?.toLowerCase();
  if (preference === 'light' || preference === 'dark') {
    return preference;
  }

  // Format: "foreground;background", background 0-7 dark, 8-15 light
  const colorFgBg = env.COLORFGBG;
  if (colorFgBg) {
    const parts = colorFgBg.split(';');
    const bg = parseInt(parts[parts.length - 1] ?? '', 10);
    if (!isNaN(bg)) {
      if (bg >= 0 && bg <= 7) {
        return 'dark';
      } else if (bg >= 8 && bg <= 15) {
        return 'light';
      }
    }
  }

  return 'unknown';
}

/**
 * Light only when we positively detect it; dark works on unknown terminals
 */
export function getRecommendedThemeType(env: NodeJS.ProcessEnv = process.env): 'dark' | 'light' {
  return detectTerminalBackground(env) === 'light' ? 'light' : 'dark';
}
