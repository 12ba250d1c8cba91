/**
 * Installer palette. Every color maps to one kind of console line:
 * brand for headers and steps, muted for details, and one color each for
 * errors, notices, warnings and completed steps.
 */

export const colors = {
  brand: "#7C5CFF",
  text: "#FFFFFF",
  muted: "#585858", // ANSI 240
  error: "#ff5f5f", // ANSI 203
  info: "#5B9CF5",
  warn: "#ffaf00", // ANSI 214
  success: "#00d787", // ANSI 42
} as const;

export type Color = (typeof colors)[keyof typeof colors];

/**
 * Converts a hex color to ANSI escape code for true color (24-bit) terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";

/**
 * Wraps `text` in a color unless colors are disabled (NO_COLOR or a
 * non-TTY stream).
 */
export const paint = (color: Color, text: string, enabled: boolean): string =>
  enabled ? `${hexToAnsi(color)}${text}${ANSI_RESET}` : text;

export const supportsColor = (
  stream: { isTTY?: boolean },
  env: Readonly<Record<string, string | undefined>> = process.env
): boolean => !env.NO_COLOR && stream.isTTY === true;
