/**
 * Theme definitions for the drill's terminal UI
 */

export interface DrillTheme {
  type: 'dark' | 'light';
  name: string;
  foreground: string;
  primary: string;      // stimulus value
  accent: string;       // ping indicator
  success: string;      // correct guesses
  danger: string;       // wrong guesses
  warning: string;      // misses
  muted: string;        // secondary text
}
