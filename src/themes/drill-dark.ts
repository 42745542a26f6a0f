import { DrillTheme } from './types.js';

export const DrillDark: DrillTheme = {
  type: 'dark',
  name: 'Drill Dark',
  foreground: '#FFFFFF',
  primary: '#00D9FF',
  accent: '#FFD60A',
  success: '#30D158',
  danger: '#FF453A',
  warning: '#FF9F0A',
  muted: '#98989D',
};
