/**
 * Types shared by the template compiler
 */

/**
 * Defect classes reported by the compiler
 */
export type TemplateErrorKind =
  | 'not-a-string-literal'
  | 'invalid-escape'
  | 'invalid-keyword'
  | 'invalid-color'
  | 'missing-close-bracket';

/** Which color plane an extended color targets */
export type ColorLayer = 'fg' | 'bg';

/**
 * Parsed payload of a # directive
 */
export type ColorSpec =
  | { type: 'named'; name: string; code: number }
  | { type: 'indexed'; layer: ColorLayer; index: number }
  | {
      type: 'truecolor';
      layer: ColorLayer;
      red: number;
      green: number;
      blue: number;
    };

/**
 * One directive inside a brace group
 */
export type Directive =
  | { type: 'style-add'; keyword: string; codes: readonly number[] }
  | { type: 'style-remove'; keyword: string; codes: readonly number[] }
  | { type: 'color'; spec: ColorSpec; codes: readonly number[] }
  | { type: 'passthrough'; text: string };

/**
 * Result of parsing one {...} group
 *
 * - literal: escaped brace, empty braces or a plain placeholder, emitted as-is
 * - chain: style/color directives with an optional trailing placeholder name
 */
export type BraceGroup =
  | { type: 'literal'; text: string }
  | { type: 'chain'; name: string | null; directives: Directive[] };

/**
 * Options for compiling a template body
 */
export interface CompileOptions {
  /** Skip backslash escape processing (braces are still parsed) */
  raw?: boolean;
}

/**
 * A quoted literal with its quoting removed
 */
export type UnwrappedLiteral =
  | { kind: 'normal'; body: string }
  | { kind: 'raw'; body: string; hashes: number };
