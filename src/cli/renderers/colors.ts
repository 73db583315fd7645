/**
 * Terminal color utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when color is not supported.
 */

/** Whether ANSI color escape codes should be used on the given stream. */
export function colorsSupported(stream: NodeJS.WriteStream = process.stdout): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return stream.isTTY === true;
}

export interface Palette {
  bold(text: string): string;
  dim(text: string): string;
  red(text: string): string;
  green(text: string): string;
  yellow(text: string): string;
}

function wrap(code: string, enabled: boolean): (text: string) => string {
  return (text) => (enabled ? `${code}${text}\x1b[0m` : text);
}

export function createPalette(enabled: boolean): Palette {
  return {
    bold: wrap('\x1b[1m', enabled),
    dim: wrap('\x1b[2m', enabled),
    red: wrap('\x1b[0;31m', enabled),
    green: wrap('\x1b[0;32m', enabled),
    yellow: wrap('\x1b[1;33m', enabled),
  };
}
