/**
 * Compiler module - escapes, directives, colors and literal handling
 */

// Types
export type {
  BraceGroup,
  ColorLayer,
  ColorSpec,
  CompileOptions,
  Directive,
  TemplateErrorKind,
  UnwrappedLiteral,
} from '../types/template.js';
export type { CompileResult } from './compile.js';
export type { Delimiter, DirectiveSymbol } from './directives.js';
export type { EscapeResult } from './escapes.js';

// Entry points
export { compileLiteral, compileTemplate } from './compile.js';
export { isTemplateError, TemplateError } from './errors.js';
export { unwrapLiteral, wrapLiteral } from './literal.js';

// Building blocks (for direct use if needed)
export { colorCodes, decodeColor } from './color.js';
export { Cursor } from './cursor.js';
export {
  findDelimiter,
  parseDirective,
  parseGroup,
  renderGroup,
} from './directives.js';
export { resolveEscape } from './escapes.js';
export {
  COLOR_CODES,
  lookupAddStyle,
  lookupColor,
  lookupRemoveStyle,
  STYLE_ADD_CODES,
  STYLE_REMOVE_CODES,
} from './tables.js';
