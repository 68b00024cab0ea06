/**
 * Quoted literal unwrapping and re-wrapping
 *
 * Normal literals are "..." with backslash escapes. Raw literals are
 * r"...", r#"..."#, r##"..."## and so on; the body may not contain the
 * closing quote followed by the same number of hashes.
 */

import type { UnwrappedLiteral } from '../types/template.js';

const RAW_PATTERN = /^r(#*)"([\s\S]*)"(#*)$/;

/**
 * True when a normal literal body has no unescaped double quote
 */
function hasBalancedQuotes(body: string): boolean {
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '"') {
      return false;
    }
  }
  return true;
}

/**
 * Strip the quoting from a literal, or return null if `source` is not one
 */
export function unwrapLiteral(source: string): UnwrappedLiteral | null {
  const rawMatch = RAW_PATTERN.exec(source);
  if (rawMatch) {
    const [, open = '', body = '', close = ''] = rawMatch;
    if (open.length !== close.length || body.includes(`"${open}`)) {
      return null;
    }
    return { kind: 'raw', body, hashes: open.length };
  }

  if (source.length < 2 || !source.startsWith('"') || !source.endsWith('"')) {
    return null;
  }
  const body = source.slice(1, -1);
  if (!hasBalancedQuotes(body) || endsWithOddBackslashes(body)) {
    return null;
  }
  return { kind: 'normal', body };
}

function endsWithOddBackslashes(body: string): boolean {
  let count = 0;
  for (let i = body.length - 1; i >= 0 && body[i] === '\\'; i--) {
    count++;
  }
  return count % 2 === 1;
}

/**
 * Quote compiled text the same way as the literal it came from
 * Normal literals become JSON string literals, valid in JS and TS source
 */
export function wrapLiteral(text: string, source: UnwrappedLiteral): string {
  if (source.kind === 'normal') {
    return JSON.stringify(text);
  }
  const hashes = '#'.repeat(source.hashes);
  return `r${hashes}"${text}"${hashes}`;
}
