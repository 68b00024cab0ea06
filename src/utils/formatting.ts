/**
 * Shared formatting utilities
 */

import { SIZE_THRESHOLD_K, SIZE_THRESHOLD_M } from './constants.js';

const NAMED_CONTROLS: Readonly<Record<string, string>> = {
  '\x1b': '\\x1b',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\0': '\\0',
  '\\': '\\\\',
};

/**
 * Format character count for display
 * @param chars - Number of characters
 * @returns Formatted string: "N chars", "N.NK chars", or "N.NM chars"
 */
export function formatSize(chars: number): string {
  if (chars < SIZE_THRESHOLD_K) {
    return `${chars} chars`;
  } else if (chars < SIZE_THRESHOLD_M) {
    return `${(chars / SIZE_THRESHOLD_K).toFixed(1)}K chars`;
  }
  return `${(chars / SIZE_THRESHOLD_M).toFixed(1)}M chars`;
}

/**
 * Make control characters visible, e.g. ESC[1m -> \x1b[1m
 * Backslashes are doubled so the result reads back unambiguously
 */
export function escapeControls(text: string): string {
  let result = '';
  for (const ch of text) {
    const named = NAMED_CONTROLS[ch];
    if (named !== undefined) {
      result += named;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      result += `\\x${code.toString(16).padStart(2, '0')}`;
    } else {
      result += ch;
    }
  }
  return result;
}
