/**
 * Template compiler entry points
 */

import type {
  CompileOptions,
  UnwrappedLiteral,
} from '../types/template.js';
import { Cursor } from './cursor.js';
import { parseGroup, renderGroup } from './directives.js';
import { isTemplateError, TemplateError } from './errors.js';
import { resolveEscape } from './escapes.js';
import { unwrapLiteral, wrapLiteral } from './literal.js';

/**
 * Result of compiling a quoted literal
 */
export type CompileResult =
  | {
      ok: true;
      /** Compiled text with literal escape sequences */
      output: string;
      /** `output` re-quoted the same way as the input literal */
      literal: string;
      source: UnwrappedLiteral;
    }
  | { ok: false; error: TemplateError };

/**
 * Compile a template body (quotes already removed)
 *
 * @throws TemplateError on the first defect; no partial output is returned
 */
export function compileTemplate(
  template: string,
  options: CompileOptions = {}
): string {
  const raw = options.raw ?? false;
  const cursor = new Cursor(template);
  let output = '';

  while (!cursor.done) {
    const start = cursor.position;
    const ch = cursor.next();

    if (ch === '\\' && !raw) {
      const escape = resolveEscape(cursor, start);
      if (escape.type === 'char') {
        output += escape.value;
      }
    } else if (ch === '{') {
      output += renderGroup(parseGroup(cursor, start));
    } else if (ch === '}') {
      // }} collapses to one brace; a lone } is kept as-is
      if (cursor.peek() === '}') {
        cursor.next();
      }
      output += '}';
    } else {
      output += ch;
    }
  }

  return output;
}

/**
 * Compile a template written as a quoted literal, e.g. "{+Bold}hi" or
 * r#"{#RedFg}C:\path"#
 *
 * Raw literals skip escape processing but still parse brace groups.
 */
export function compileLiteral(source: string): CompileResult {
  const unwrapped = unwrapLiteral(source);
  if (unwrapped === null) {
    return { ok: false, error: TemplateError.notAStringLiteral() };
  }

  try {
    const output = compileTemplate(unwrapped.body, {
      raw: unwrapped.kind === 'raw',
    });
    return {
      ok: true,
      output,
      literal: wrapLiteral(output, unwrapped),
      source: unwrapped,
    };
  } catch (error) {
    if (isTemplateError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
