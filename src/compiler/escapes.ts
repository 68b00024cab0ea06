/**
 * Backslash escape resolution
 *
 * Supported escapes:
 * - \' \" \\ \0
 * - \n \r \t
 * - \xHH (7-bit only)
 * - \u{H..H} (1-6 hex digits, any Unicode scalar)
 * - \ followed by a newline: skips all following whitespace
 */

import {
  MAX_7BIT,
  MAX_UNICODE,
  MAX_UNICODE_DIGITS,
  SURROGATE_END,
  SURROGATE_START,
} from '../utils/constants.js';
import type { Cursor } from './cursor.js';
import { TemplateError } from './errors.js';

/**
 * Outcome of resolving one escape
 * - char: emit `value`
 * - continue: a line continuation consumed input but emits nothing
 */
export type EscapeResult =
  | { type: 'char'; value: string }
  | { type: 'continue' };

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "'": "'",
  '"': '"',
  '\\': '\\',
  '0': '\0',
  n: '\n',
  r: '\r',
  t: '\t',
};

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

/** Whitespace skipped after a line continuation */
export function isContinuationWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t';
}

function parseHex(digits: string): number | null {
  return HEX_PATTERN.test(digits) ? parseInt(digits, 16) : null;
}

/**
 * Decode \xHH; the cursor sits after the `x`
 */
function resolveHexEscape(cursor: Cursor, start: number): string {
  const digits = cursor.next() + cursor.next();
  const value = digits.length === 2 ? parseHex(digits) : null;
  if (value === null || value > MAX_7BIT) {
    throw TemplateError.invalidEscape(cursor.slice(start), start);
  }
  return String.fromCharCode(value);
}

/**
 * Decode \u{H..H}; the cursor sits after the `u`
 */
function resolveUnicodeEscape(cursor: Cursor, start: number): string {
  if (cursor.next() !== '{') {
    throw TemplateError.invalidEscape(cursor.slice(start), start);
  }

  let digits = '';
  while (!cursor.done && cursor.peek() !== '}') {
    digits += cursor.next();
  }
  if (cursor.next() !== '}') {
    throw TemplateError.invalidEscape(cursor.slice(start), start);
  }

  const value =
    digits.length > 0 && digits.length <= MAX_UNICODE_DIGITS
      ? parseHex(digits)
      : null;
  if (
    value === null ||
    value > MAX_UNICODE ||
    (value >= SURROGATE_START && value <= SURROGATE_END)
  ) {
    throw TemplateError.invalidEscape(cursor.slice(start), start);
  }
  return String.fromCodePoint(value);
}

/**
 * Resolve the escape whose backslash sat at `start`
 * The cursor must be positioned just after the backslash
 */
export function resolveEscape(cursor: Cursor, start: number): EscapeResult {
  const ch = cursor.next();

  const simple = SIMPLE_ESCAPES[ch];
  if (simple !== undefined) {
    return { type: 'char', value: simple };
  }

  switch (ch) {
    case 'x':
      return { type: 'char', value: resolveHexEscape(cursor, start) };
    case 'u':
      return { type: 'char', value: resolveUnicodeEscape(cursor, start) };
    case '\n':
      while (isContinuationWhitespace(cursor.peek())) {
        cursor.next();
      }
      return { type: 'continue' };
    default:
      throw TemplateError.invalidEscape(cursor.slice(start), start);
  }
}
