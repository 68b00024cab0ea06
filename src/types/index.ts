/**
 * Shared type exports
 */

export type {
  CompilerConfig,
  OutputFormat,
  ParsedArgs,
  Subcommand,
  Verbosity,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
  BraceGroup,
  ColorLayer,
  ColorSpec,
  CompileOptions,
  Directive,
  TemplateErrorKind,
  UnwrappedLiteral,
} from './template.js';
