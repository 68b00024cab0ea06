/**
 * CLI configuration and argument types
 */

import { DEFAULT_LOG_DIR } from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export type Subcommand = 'compile' | 'literal' | 'file';

/**
 * How compiled output is printed
 * - text: the compiled string itself
 * - literal: a quoted replacement literal
 * - escaped: the compiled string with control characters made visible
 */
export type OutputFormat = 'text' | 'literal' | 'escaped';

/**
 * Compiler host configuration
 */
export interface CompilerConfig {
  raw: boolean;
  output: OutputFormat;
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
}

/**
 * Default compiler host configuration
 */
export const DEFAULT_CONFIG: CompilerConfig = {
  raw: false,
  output: 'text',
  verbosity: 'normal',
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  subcommand: Subcommand;
  /** Template text, literal source, or file path depending on subcommand */
  input: string;
  /** Flags given on the command line, applied over file config */
  config: Partial<CompilerConfig>;
}
