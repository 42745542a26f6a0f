import { DrillTheme } from './types.js';

export const DrillLight: DrillTheme = {
  type: 'light',
  name: 'Drill Light',
  foreground: '#1C1C1E',
  primary: '#0060DF',
  accent: '#B25000',
  success: '#248A3D',
  danger: '#D70015',
  warning: '#C93400',
  muted: '#6E6E73',
};
