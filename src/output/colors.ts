/**
 * ANSI styling for the CLI's own messages
 */

import { COLOR_CODES, STYLE_ADD_CODES } from '../compiler/tables.js';
import { sgr } from './builder.js';

export const colors = Object.freeze({
  reset: sgr(STYLE_ADD_CODES.Reset),
  dim: sgr(STYLE_ADD_CODES.Dim),
  yellow: sgr(COLOR_CODES.YellowFg),
  red: sgr(COLOR_CODES.RedFg),
  magenta: sgr(COLOR_CODES.MagentaFg),
});

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, len: number): string {
  if (str.length <= len) {
    return str;
  }
  return str.slice(0, len) + '...';
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const mins = Math.floor(totalSeconds / 60);
  const secs = Math.round(totalSeconds % 60);
  return `${mins}m${secs}s`;
}

/**
 * Format current timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Print an [sgr] informational message with timestamp
 * Goes to stderr so compiled output on stdout stays clean
 */
export function printInfo(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.magenta}[sgr]${colors.reset} ${message}`
  );
}

/**
 * Print an [sgr] warning with timestamp
 */
export function printWarning(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.yellow}[sgr]${colors.reset} ${message}`
  );
}

/**
 * Print an [sgr] error with timestamp
 */
export function printError(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.red}[sgr]${colors.reset} ${message}`
  );
}
