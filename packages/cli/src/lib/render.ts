/**
 * Output rendering: JSON on stdout, ANSI color on terminals
 */

const ANSI = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
} as const;

const RESET = "\x1b[0m";

export type Color = keyof typeof ANSI;

/**
 * Float keys can be NaN or infinite; JSON has no literal for them, so they
 * are written as the strings the path templates accept.
 */
function nonFiniteAsText(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

export function renderJson(data: unknown, raw = false): string {
  return JSON.stringify(data, nonFiniteAsText, raw ? undefined : 2);
}

export function printJson(data: unknown, options: { raw?: boolean } = {}): void {
  console.log(renderJson(data, options.raw));
}

/**
 * Wrap text in a color code when the stream is a terminal
 */
export function colorize(text: string, color: Color, stream: { isTTY?: boolean } = process.stdout): string {
  return stream.isTTY ? `${ANSI[color]}${text}${RESET}` : text;
}
