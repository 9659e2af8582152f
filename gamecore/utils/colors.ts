//gamecore/utils/colors.ts

// ANSI helpers for console output. NO_COLOR (any value) turns them off.

export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
  BrightMagenta: "\x1b[95m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

export function colorsEnabled(): boolean {
  return process.env.NO_COLOR === undefined;
}

export function colorize(text: string, color?: ColorCode): string {
  if (!color || !colorsEnabled()) return text;
  return `${color}${text}${Colors.Reset}`;
}
