/**
 * Theme Management System
 * Picks the palette from the detected terminal background
 */

import { DrillTheme } from './types.js';
import { DrillDark } from './drill-dark.js';
import { DrillLight } from './drill-light.js';
import { getRecommendedThemeType } from './terminal-detector.js';

export class ThemeManager {
  private readonly theme: DrillTheme;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.theme = getRecommendedThemeType(env) === 'light' ? DrillLight : DrillDark;
  }

  getCurrentTheme(): DrillTheme {
    return this.theme;
  }

  /**
   * Color for a verdict, consistent across palettes
   */
  getVerdictColor(verdict: 'correct' | 'wrong' | 'missed'): string {
    const theme = this.theme;
    switch (verdict) {
      case 'correct':
        return theme.success;
      case 'wrong':
        return theme.danger;
      case 'missed':
        return theme.warning;
    }
  }
}

export const themeManager = new ThemeManager();
