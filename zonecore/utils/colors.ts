// zonecore/utils/colors.ts

export const Colors = {
  Reset: "\x1b[0m",
  Dim: "\x1b[2m",
  Red: "\x1b[31m",
  Green: "\x1b[32m",
  Yellow: "\x1b[33m",
  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

/** ANSI colors only on a terminal, and never with NO_COLOR set. */
export function colorEnabled(stream: NodeJS.WriteStream): boolean {
  return Boolean(stream.isTTY) && !process.env.NO_COLOR;
}

export function colorize(text: string, color: ColorCode, enabled: boolean): string {
  return enabled ? `${color}${text}${Colors.Reset}` : text;
}
