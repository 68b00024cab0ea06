/**
 * Compile failures
 */

import type { TemplateErrorKind } from '../types/template.js';

/**
 * A template rejected by the compiler
 *
 * `position` is the code point index into the template body where the
 * defect starts, or null when the failure is not tied to a location.
 */
export class TemplateError extends Error {
  readonly kind: TemplateErrorKind;
  readonly position: number | null;

  constructor(
    kind: TemplateErrorKind,
    message: string,
    position: number | null = null
  ) {
    super(message);
    this.name = 'TemplateError';
    this.kind = kind;
    this.position = position;
  }

  static notAStringLiteral(): TemplateError {
    return new TemplateError(
      'not-a-string-literal',
      'not a string literal: expected "..." or a raw r#"..."# literal'
    );
  }

  static invalidEscape(sequence: string, position: number): TemplateError {
    return new TemplateError(
      'invalid-escape',
      `invalid escape '${sequence}' at position ${position}`,
      position
    );
  }

  static invalidKeyword(keyword: string, position: number): TemplateError {
    return new TemplateError(
      'invalid-keyword',
      `invalid keyword '${keyword}' at position ${position}`,
      position
    );
  }

  static invalidColor(color: string, position: number): TemplateError {
    return new TemplateError(
      'invalid-color',
      `invalid color '${color}' at position ${position}`,
      position
    );
  }

  static missingCloseBracket(position: number): TemplateError {
    return new TemplateError(
      'missing-close-bracket',
      `missing close bracket for '{' at position ${position}`,
      position
    );
  }
}

/**
 * Narrow an unknown thrown value to a TemplateError
 */
export function isTemplateError(error: unknown): error is TemplateError {
  return error instanceof TemplateError;
}
